import { ExtractedMessage } from './extract'
import { emptyEntry, isTranslated, messageKey, PoCatalog, PoEntry, pluralCountFromHeader } from './po'
import { pluralRulesFor } from './plurals'

export type MergeOptions = {
  language: string
  keepObsolete?: boolean
  now?: Date
}

export type MergeResult = {
  catalog: PoCatalog
  added: number
  kept: number
  revived: number
  obsoleted: number
}

export function formatPoDate(date: Date) {
  const pad = (n: number) => String(n).padStart(2, '0')
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}+0000`
}

export function defaultHeaders(language: string): Record<string, string> {
  return {
    'Content-Type': 'text/plain; charset=UTF-8',
    'Content-Transfer-Encoding': '8bit',
    Language: language,
    'Plural-Forms': pluralRulesFor(language).pluralForms,
  }
}

function resize(msgstr: string[], size: number) {
  const out = msgstr.slice(0, size)
  while (out.length < size) out.push('')
  return out
}

// line numbers belong to the file an entry was read from, not the merged catalog
function detach({ line: _line, ...entry }: PoEntry): PoEntry {
  return entry
}

function addFlag(entry: PoEntry, flag: string) {
  if (!entry.flags.includes(flag)) entry.flags.push(flag)
}

export function mergeCatalog(existing: PoCatalog | null, extracted: ExtractedMessage[], options: MergeOptions): MergeResult {
  const keepObsolete = options.keepObsolete ?? true
  const headers = { ...defaultHeaders(options.language), ...(existing?.headers ?? {}) }
  if (options.now) headers['POT-Creation-Date'] = formatPoDate(options.now)
  const nplurals = pluralCountFromHeader(headers) ?? pluralRulesFor(options.language).categories.length

  const active = new Map<string, PoEntry>()
  const obsolete = new Map<string, PoEntry>()
  for (const entry of existing?.entries ?? []) active.set(messageKey(entry), entry)
  for (const entry of existing?.obsolete ?? []) obsolete.set(messageKey(entry), entry)

  const result: MergeResult = {
    catalog: {
      headerComments: existing?.headerComments ?? [],
      headerFlags: existing?.headerFlags ?? [],
      headers,
      entries: [],
      obsolete: [],
    },
    added: 0,
    kept: 0,
    revived: 0,
    obsoleted: 0,
  }

  for (const msg of extracted) {
    const key = messageKey(msg)
    const previous = active.get(key) ?? obsolete.get(key)
    let entry: PoEntry
    if (previous) {
      if (active.has(key)) result.kept += 1
      else result.revived += 1
      active.delete(key)
      obsolete.delete(key)
      entry = {
        ...detach(previous),
        msgstr: [...previous.msgstr],
        flags: [...previous.flags],
        references: [...msg.references],
        extractedComments: [...msg.comments],
      }
      if (previous.msgidPlural !== msg.msgidPlural) {
        const wasTranslated = isTranslated(previous)
        entry.msgidPlural = msg.msgidPlural
        entry.msgstr = msg.msgidPlural === undefined ? [previous.msgstr[0] ?? ''] : resize(previous.msgstr, nplurals)
        if (wasTranslated) addFlag(entry, 'fuzzy')
      }
    } else {
      result.added += 1
      entry = emptyEntry(msg.msgid)
      entry.references = [...msg.references]
      entry.extractedComments = [...msg.comments]
      if (msg.msgctxt !== undefined) entry.msgctxt = msg.msgctxt
      if (msg.msgidPlural !== undefined) {
        entry.msgidPlural = msg.msgidPlural
        entry.msgstr = resize([], nplurals)
      }
    }
    if (entry.msgidPlural === undefined) delete entry.msgidPlural
    result.catalog.entries.push(entry)
  }

  if (keepObsolete) {
    for (const entry of active.values()) {
      result.obsoleted += 1
      result.catalog.obsolete.push({ ...detach(entry), references: [], extractedComments: [] })
    }
    result.catalog.obsolete.push(...Array.from(obsolete.values(), detach))
  } else {
    result.obsoleted = active.size
  }

  return result
}
