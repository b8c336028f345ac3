import test from 'node:test'
import assert from 'node:assert/strict'
import { extractFromSource, extractMessages } from '../src/modules/catalog/extract'

const PAGE = {
  fileName: 'web/src/Page.tsx',
  text: [
    "import { useTranslation } from 'react-i18next'",
    'export function Page({ n }: { n: number }) {',
    '  const { t, i18n } = useTranslation()',
    '  // translators: Title of the settings page',
    "  const title = t('Settings')",
    "  const files = t('{{count}} file', { count: n, defaultValue_other: '{{count}} files' })",
    "  const verb = t('Open', { context: 'verb' })",
    '  const dyn = t(title)',
    '  return <h1>{title}{files}{verb}{dyn}{t(\'Settings\')}{i18n.t(`Done`)}</h1>',
    '}',
  ].join('\n'),
}

const ROUTE = {
  fileName: 'src/routes/x.ts',
  text: "app.get('/', async (req) => ({ msg: req.t('Settings'), other: req.t('Open') }))\n",
}

test('extractFromSource collects literal t() calls with context, plurals and comments', () => {
  const { messages, warnings } = extractFromSource(PAGE)

  assert.deepEqual(messages, [
    { msgid: 'Settings', references: ['web/src/Page.tsx:5'], comments: ['Title of the settings page'] },
    { msgid: '{{count}} file', msgidPlural: '{{count}} files', references: ['web/src/Page.tsx:6'], comments: [] },
    { msgid: 'Open', msgctxt: 'verb', references: ['web/src/Page.tsx:7'], comments: [] },
    { msgid: 'Settings', references: ['web/src/Page.tsx:9'], comments: [] },
    { msgid: 'Done', references: ['web/src/Page.tsx:9'], comments: [] },
  ])
  assert.deepEqual(warnings, [
    { reference: 'web/src/Page.tsx:8', message: 'message id is not a string literal; skipped' },
  ])
})

test('extractMessages merges duplicates across files and keeps contexts apart', () => {
  const { messages } = extractMessages([PAGE, ROUTE])

  assert.deepEqual(messages.map(m => [m.msgctxt ?? null, m.msgid]), [
    [null, 'Settings'],
    [null, '{{count}} file'],
    ['verb', 'Open'],
    [null, 'Done'],
    [null, 'Open'],
  ])
  assert.deepEqual(messages[0].references, ['web/src/Page.tsx:5', 'web/src/Page.tsx:9', 'src/routes/x.ts:1'])
  assert.deepEqual(messages[0].comments, ['Title of the settings page'])
})

test('extractFromSource only looks at the configured function names', () => {
  const { messages } = extractFromSource(
    { fileName: 'a.ts', text: "gettext('Hi')\nt('No')\n" },
    { functions: ['gettext'] },
  )

  assert.deepEqual(messages.map(m => m.msgid), ['Hi'])
})

test('extractFromSource reads translator notes from block comments', () => {
  const { messages } = extractFromSource({ fileName: 'a.ts', text: "/* translators: Button label */\nt('Save')\n" })

  assert.deepEqual(messages[0].comments, ['Button label'])
})

test('extractFromSource warns about empty ids and dynamic contexts', () => {
  const { messages, warnings } = extractFromSource({
    fileName: 'a.ts',
    text: "t('')\nt('Post', { context: kind })\n",
  })

  assert.deepEqual(messages, [{ msgid: 'Post', references: ['a.ts:2'], comments: [] }])
  assert.deepEqual(warnings.map(w => w.reference), ['a.ts:1', 'a.ts:2'])
})
