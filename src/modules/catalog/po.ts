import { CatalogSyntaxError } from './errors'

export type PoEntry = {
  msgctxt?: string
  msgid: string
  msgidPlural?: string
  msgstr: string[]
  translatorComments: string[]
  extractedComments: string[]
  references: string[]
  flags: string[]
  // first line of the entry in the file it was parsed from
  line?: number
}

export type PoCatalog = {
  headerComments: string[]
  headerFlags: string[]
  headers: Record<string, string>
  entries: PoEntry[]
  obsolete: PoEntry[]
}

type Keyword = 'msgctxt' | 'msgid' | 'msgid_plural' | 'msgstr'

type Draft = {
  entry: PoEntry
  line: number
  obsolete: boolean
  hasId: boolean
  hasStr: boolean
  last: { keyword: Keyword; index: number } | null
}

const KEYWORDS: Record<string, Keyword> = {
  msgctxt: 'msgctxt',
  msgid: 'msgid',
  msgid_plural: 'msgid_plural',
  msgstr: 'msgstr',
}

// msgstr[0] to msgstr[5], one per CLDR plural category
const MAX_PLURAL_INDEX = 5

const KEYWORD_LINE = /^(msgctxt|msgid_plural|msgid|msgstr)(?:\[(\d+)\])?\s+(".*")\s*$/

export function emptyCatalog(headers: Record<string, string> = {}): PoCatalog {
  return { headerComments: [], headerFlags: [], headers, entries: [], obsolete: [] }
}

export function emptyEntry(msgid: string): PoEntry {
  return {
    msgid,
    msgstr: [''],
    translatorComments: [],
    extractedComments: [],
    references: [],
    flags: [],
  }
}

// Context and id joined the way gettext does in compiled catalogs.
export function messageKey(entry: { msgctxt?: string; msgid: string }) {
  return entry.msgctxt === undefined ? entry.msgid : `${entry.msgctxt}\u0004${entry.msgid}`
}

export function isFuzzy(entry: PoEntry) {
  return entry.flags.includes('fuzzy')
}

export function isTranslated(entry: PoEntry) {
  return entry.msgstr.length > 0 && entry.msgstr.every(s => s.length > 0)
}

export function parsePo(text: string, file = '<input>'): PoCatalog {
  const catalog = emptyCatalog()
  const seen = new Set<string>()
  let draft: Draft | null = null
  let headerDone = false

  const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/)

  const start = (lineNo: number): Draft => ({
    entry: emptyEntry(''),
    line: lineNo,
    obsolete: false,
    hasId: false,
    hasStr: false,
    last: null,
  })

  const finish = () => {
    if (!draft) return
    const d = draft
    draft = null
    // a comment block with no message attached
    if (!d.hasId && !d.hasStr) return
    if (!d.hasId) throw new CatalogSyntaxError(file, d.line, 'missing msgid')
    if (!d.hasStr) throw new CatalogSyntaxError(file, d.line, `missing msgstr for "${d.entry.msgid}"`)

    const entry = d.entry
    entry.line = d.line
    if (entry.msgidPlural === undefined && entry.msgstr.length > 1) {
      throw new CatalogSyntaxError(file, d.line, `plural translations without msgid_plural for "${entry.msgid}"`)
    }
    if (Array.from(entry.msgstr).some(s => s === undefined)) {
      throw new CatalogSyntaxError(file, d.line, `gap in plural translations for "${entry.msgid}"`)
    }

    if (!d.obsolete && !headerDone && entry.msgid === '' && entry.msgctxt === undefined) {
      headerDone = true
      catalog.headerComments = entry.translatorComments
      catalog.headerFlags = entry.flags
      catalog.headers = parseHeaders(entry.msgstr[0] ?? '')
      return
    }
    if (entry.msgid === '') {
      throw new CatalogSyntaxError(file, d.line, 'empty msgid outside the header')
    }
    if (d.obsolete) {
      catalog.obsolete.push(entry)
      return
    }
    const key = messageKey(entry)
    if (seen.has(key)) throw new CatalogSyntaxError(file, d.line, `duplicate message "${entry.msgid}"`)
    seen.add(key)
    catalog.entries.push(entry)
  }

  lines.forEach((raw, idx) => {
    const lineNo = idx + 1
    let line = raw.trim()
    if (!line) {
      finish()
      return
    }

    let obsolete = false
    if (line.startsWith('#~')) {
      obsolete = true
      line = line.slice(2).trim()
      if (!line) return
    }
    if (line.startsWith('#')) {
      if (draft && draft.hasStr) finish()
      if (!draft) draft = start(lineNo)
      readComment(draft.entry, line)
      return
    }

    if (line.startsWith('"')) {
      if (!draft || !draft.last) throw new CatalogSyntaxError(file, lineNo, 'continuation line without a keyword')
      if (draft.obsolete !== obsolete) throw new CatalogSyntaxError(file, lineNo, 'continuation line mixes obsolete and active text')
      appendTo(draft, draft.last.keyword, draft.last.index, unquote(line, file, lineNo))
      return
    }

    const m = KEYWORD_LINE.exec(line)
    if (!m) throw new CatalogSyntaxError(file, lineNo, `unrecognized line: ${line}`)
    const keyword = KEYWORDS[m[1]]
    const index = m[2] === undefined ? -1 : Number(m[2])
    if (index > MAX_PLURAL_INDEX) throw new CatalogSyntaxError(file, lineNo, `plural index ${index} out of range`)
    const value = unquote(m[3], file, lineNo)

    if ((keyword === 'msgctxt' || keyword === 'msgid') && draft && draft.hasStr) finish()
    if (!draft) draft = start(lineNo)
    if (obsolete) draft.obsolete = true

    const entry = draft.entry
    switch (keyword) {
      case 'msgctxt':
        if (draft.hasId) throw new CatalogSyntaxError(file, lineNo, 'msgctxt after msgid')
        entry.msgctxt = value
        break
      case 'msgid':
        if (draft.hasId) throw new CatalogSyntaxError(file, lineNo, 'duplicate msgid in entry')
        entry.msgid = value
        draft.hasId = true
        break
      case 'msgid_plural':
        if (!draft.hasId || draft.hasStr) throw new CatalogSyntaxError(file, lineNo, 'msgid_plural out of place')
        entry.msgidPlural = value
        break
      case 'msgstr':
        if (!draft.hasId) throw new CatalogSyntaxError(file, lineNo, 'msgstr before msgid')
        if (entry.msgidPlural !== undefined && index < 0) throw new CatalogSyntaxError(file, lineNo, 'plural entry needs msgstr[n]')
        if (entry.msgidPlural === undefined && index > 0) throw new CatalogSyntaxError(file, lineNo, 'msgstr[n] without msgid_plural')
        if (!draft.hasStr) entry.msgstr = []
        entry.msgstr[Math.max(index, 0)] = value
        draft.hasStr = true
        break
    }
    draft.last = { keyword, index: Math.max(index, 0) }
  })
  finish()

  return catalog
}

function readComment(entry: PoEntry, line: string) {
  const kind = line.charAt(1)
  const body = line.slice(2).trim()
  switch (kind) {
    case '.':
      entry.extractedComments.push(body)
      return
    case ':':
      entry.references.push(...body.split(/\s+/).filter(Boolean))
      return
    case ',':
      for (const flag of body.split(',').map(f => f.trim()).filter(Boolean)) {
        if (!entry.flags.includes(flag)) entry.flags.push(flag)
      }
      return
    case '|':
      // previous msgid; dropped, merge does not track renamed messages
      return
    default:
      entry.translatorComments.push(line.slice(1).replace(/^ /, ''))
  }
}

function appendTo(draft: Draft, keyword: Keyword, index: number, value: string) {
  const entry = draft.entry
  switch (keyword) {
    case 'msgctxt':
      entry.msgctxt = (entry.msgctxt ?? '') + value
      return
    case 'msgid':
      entry.msgid += value
      return
    case 'msgid_plural':
      entry.msgidPlural = (entry.msgidPlural ?? '') + value
      return
    case 'msgstr':
      entry.msgstr[index] = (entry.msgstr[index] ?? '') + value
  }
}

const ESCAPES: Record<string, string> = { n: '\n', t: '\t', r: '\r', '"': '"', '\\': '\\', a: '\x07', b: '\b', f: '\f', v: '\v' }

function unquote(token: string, file: string, line: number): string {
  if (token.length < 2 || !token.startsWith('"') || !token.endsWith('"')) {
    throw new CatalogSyntaxError(file, line, `malformed string ${token}`)
  }
  const body = token.slice(1, -1)
  let out = ''
  for (let i = 0; i < body.length; i++) {
    const ch = body[i]
    if (ch === '"') throw new CatalogSyntaxError(file, line, 'unescaped quote inside string')
    if (ch !== '\\') {
      out += ch
      continue
    }
    const next = body[i + 1]
    if (next === undefined || !(next in ESCAPES)) {
      throw new CatalogSyntaxError(file, line, `unknown escape sequence \\${next ?? ''}`)
    }
    out += ESCAPES[next]
    i++
  }
  return out
}

function quote(value: string) {
  return '"' + value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\t/g, '\\t')
    .replace(/\r/g, '\\r')
    .replace(/\n/g, '\\n') + '"'
}

function formatString(keyword: string, value: string): string[] {
  const newline = value.indexOf('\n')
  if (newline === -1 || newline === value.length - 1) return [`${keyword} ${quote(value)}`]
  const parts = value.split(/(?<=\n)/)
  return [`${keyword} ""`, ...parts.map(quote)]
}

const MAX_REFERENCE_LINE = 79

function formatReferences(refs: string[]): string[] {
  const lines: string[] = []
  let current = '#:'
  for (const ref of refs) {
    if (current.length > 2 && current.length + 1 + ref.length > MAX_REFERENCE_LINE) {
      lines.push(current)
      current = '#:'
    }
    current += ` ${ref}`
  }
  if (current.length > 2) lines.push(current)
  return lines
}

function formatEntry(entry: PoEntry, obsolete: boolean): string[] {
  const out: string[] = []
  for (const c of entry.translatorComments) out.push(c ? `# ${c}` : '#')
  for (const c of entry.extractedComments) out.push(`#. ${c}`)
  out.push(...formatReferences(entry.references))
  if (entry.flags.length) out.push(`#, ${entry.flags.join(', ')}`)

  const body: string[] = []
  if (entry.msgctxt !== undefined) body.push(...formatString('msgctxt', entry.msgctxt))
  body.push(...formatString('msgid', entry.msgid))
  if (entry.msgidPlural !== undefined) {
    body.push(...formatString('msgid_plural', entry.msgidPlural))
    entry.msgstr.forEach((s, i) => body.push(...formatString(`msgstr[${i}]`, s ?? '')))
  } else {
    body.push(...formatString('msgstr', entry.msgstr[0] ?? ''))
  }
  out.push(...(obsolete ? body.map(l => `#~ ${l}`) : body))
  return out
}

export function serializePo(catalog: PoCatalog): string {
  const blocks: string[][] = []

  const header: string[] = catalog.headerComments.map(c => (c ? `# ${c}` : '#'))
  if (catalog.headerFlags.length) header.push(`#, ${catalog.headerFlags.join(', ')}`)
  header.push('msgid ""', 'msgstr ""')
  for (const line of formatHeaders(catalog.headers).split(/(?<=\n)/).filter(Boolean)) {
    header.push(quote(line))
  }
  blocks.push(header)

  for (const entry of catalog.entries) blocks.push(formatEntry(entry, false))
  for (const entry of catalog.obsolete) blocks.push(formatEntry(entry, true))

  return blocks.map(b => b.join('\n')).join('\n\n') + '\n'
}

export function parseHeaders(raw: string): Record<string, string> {
  const headers: Record<string, string> = {}
  for (const line of raw.split('\n')) {
    const idx = line.indexOf(':')
    if (idx <= 0) continue
    headers[line.slice(0, idx).trim()] = line.slice(idx + 1).trim()
  }
  return headers
}

export function formatHeaders(headers: Record<string, string>): string {
  return Object.entries(headers).map(([k, v]) => `${k}: ${v}\n`).join('')
}

// "nplurals=2; plural=(n != 1);" -> 2
export function pluralCountFromHeader(headers: Record<string, string>): number | null {
  const m = /nplurals\s*=\s*(\d+)/.exec(headers['Plural-Forms'] ?? '')
  return m ? Number(m[1]) : null
}
