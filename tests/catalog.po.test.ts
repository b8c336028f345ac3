import test from 'node:test'
import assert from 'node:assert/strict'
import { CatalogSyntaxError } from '../src/modules/catalog/errors'
import { emptyCatalog, emptyEntry, parsePo, PoCatalog, pluralCountFromHeader, serializePo } from '../src/modules/catalog/po'

const SAMPLE = [
  '# Translator note',
  'msgid ""',
  'msgstr ""',
  '"Language: es\\n"',
  '"Plural-Forms: nplurals=2; plural=(n != 1);\\n"',
  '',
  '# keep short',
  '#. Shown on the home page',
  '#: src/a.ts:3 src/b.ts:9',
  '#, fuzzy',
  'msgctxt "menu"',
  'msgid "Open"',
  'msgstr "Abrir"',
  '',
  'msgid "Line one\\n"',
  '"line two"',
  'msgstr ""',
  '"Línea uno\\n"',
  '"línea dos"',
  '',
  'msgid "{{count}} file"',
  'msgid_plural "{{count}} files"',
  'msgstr[0] "{{count}} archivo"',
  'msgstr[1] "{{count}} archivos"',
  '',
  '#~ msgid "Gone"',
  '#~ msgstr "Ido"',
  '',
].join('\n')

test('parsePo reads the header block', () => {
  const catalog = parsePo(SAMPLE)

  assert.deepEqual(catalog.headerComments, ['Translator note'])
  assert.deepEqual(catalog.headers, { Language: 'es', 'Plural-Forms': 'nplurals=2; plural=(n != 1);' })
  assert.equal(pluralCountFromHeader(catalog.headers), 2)
})

test('parsePo reads comments, flags, context and continuation lines', () => {
  const catalog = parsePo(SAMPLE)

  assert.equal(catalog.entries.length, 3)
  assert.deepEqual(catalog.entries[0], {
    msgctxt: 'menu',
    msgid: 'Open',
    msgstr: ['Abrir'],
    translatorComments: ['keep short'],
    extractedComments: ['Shown on the home page'],
    references: ['src/a.ts:3', 'src/b.ts:9'],
    flags: ['fuzzy'],
    line: 7,
  })
  assert.equal(catalog.entries[1].msgid, 'Line one\nline two')
  assert.deepEqual(catalog.entries[1].msgstr, ['Línea uno\nlínea dos'])
})

test('parsePo reads plural forms and obsolete entries', () => {
  const catalog = parsePo(SAMPLE)

  assert.equal(catalog.entries[2].msgidPlural, '{{count}} files')
  assert.deepEqual(catalog.entries[2].msgstr, ['{{count}} archivo', '{{count}} archivos'])
  assert.equal(catalog.obsolete.length, 1)
  assert.equal(catalog.obsolete[0].msgid, 'Gone')
  assert.deepEqual(catalog.obsolete[0].msgstr, ['Ido'])
})

test('serializePo writes what parsePo reads back', () => {
  const withoutLines = (catalog: PoCatalog) => ({
    ...catalog,
    entries: catalog.entries.map(({ line: _line, ...e }) => e),
    obsolete: catalog.obsolete.map(({ line: _line, ...e }) => e),
  })
  const first = parsePo(SAMPLE)
  const second = parsePo(serializePo(first))

  assert.deepEqual(withoutLines(second), withoutLines(first))
})

test('serializePo escapes quotes and tabs', () => {
  const catalog = emptyCatalog({ Language: 'es' })
  catalog.entries.push({ ...emptyEntry('Say "hi"\tnow'), msgstr: ['Di "hola"'], references: ['a.ts:1'] })

  assert.equal(serializePo(catalog), [
    'msgid ""',
    'msgstr ""',
    '"Language: es\\n"',
    '',
    '#: a.ts:1',
    'msgid "Say \\"hi\\"\\tnow"',
    'msgstr "Di \\"hola\\""',
    '',
  ].join('\n'))
})

test('serializePo splits multi-line strings after each newline', () => {
  const catalog = emptyCatalog()
  catalog.entries.push(emptyEntry('a\nb'))

  const lines = serializePo(catalog).split('\n')
  assert.deepEqual(lines.slice(3, 7), ['msgid ""', '"a\\n"', '"b"', 'msgstr ""'])
})

test('parsePo rejects an entry without msgstr', () => {
  assert.throws(() => parsePo('msgid "x"\n', 'locale/es/x.po'), (err: unknown) => {
    assert.ok(err instanceof CatalogSyntaxError)
    assert.equal(err.line, 1)
    assert.equal(err.message, 'locale/es/x.po:1: missing msgstr for "x"')
    return true
  })
})

test('parsePo rejects duplicate messages', () => {
  assert.throws(() => parsePo('msgid "a"\nmsgstr "b"\n\nmsgid "a"\nmsgstr "c"\n'), (err: unknown) => {
    assert.ok(err instanceof CatalogSyntaxError)
    assert.equal(err.line, 4)
    return true
  })
})

test('parsePo rejects unknown escapes and stray lines', () => {
  assert.throws(() => parsePo('msgid "a\\q"\nmsgstr ""\n'), /<input>:1: unknown escape sequence \\q/)
  assert.throws(() => parsePo('msgfoo "x"\n'), /<input>:1: unrecognized line/)
  assert.throws(() => parsePo('msgid "a"\nmsgstr[1] "b"\n'), /msgstr\[n\] without msgid_plural/)
})

test('serializePo keeps the header comments and flags', () => {
  const text = [
    '# hdr',
    '#, fuzzy',
    'msgid ""',
    'msgstr ""',
    '"Language: es\\n"',
    '',
  ].join('\n')

  const catalog = parsePo(text)
  assert.deepEqual(catalog.headerFlags, ['fuzzy'])
  assert.equal(serializePo(catalog), text)
})

test('parsePo drops previous-msgid comments', () => {
  const catalog = parsePo([
    '#| msgid "Old text"',
    'msgid "New text"',
    'msgstr "Texto nuevo"',
    '',
  ].join('\n'))

  assert.deepEqual(catalog.entries[0], { ...emptyEntry('New text'), msgstr: ['Texto nuevo'], line: 1 })
  assert.equal(serializePo(catalog).includes('#|'), false)
})

test('parsePo reads obsolete entries spread over several lines', () => {
  const catalog = parsePo([
    '#~ msgid ""',
    '#~ "Old one\\n"',
    '#~ "old two"',
    '#~ msgstr "Viejo"',
    '',
  ].join('\n'))

  assert.equal(catalog.obsolete[0].msgid, 'Old one\nold two')
  assert.deepEqual(serializePo(catalog).split('\n').slice(3), [
    '#~ msgid ""',
    '#~ "Old one\\n"',
    '#~ "old two"',
    '#~ msgstr "Viejo"',
    '',
  ])
  assert.throws(() => parsePo('msgid "a"\n#~ "b"\nmsgstr ""\n'), /<input>:2: continuation line mixes obsolete and active text/)
})

test('parsePo rejects gaps and out-of-range plural indices', () => {
  assert.throws(
    () => parsePo('msgid "x"\nmsgid_plural "xs"\nmsgstr[0] "a"\nmsgstr[2] "c"\n'),
    /<input>:1: gap in plural translations for "x"/,
  )
  assert.throws(
    () => parsePo('msgid "x"\nmsgid_plural "xs"\nmsgstr[999999999] ""\n'),
    /<input>:3: plural index 999999999 out of range/,
  )
})
