import { PluralFormsError } from './errors'
import { isFuzzy, isTranslated, PoCatalog, PoEntry, pluralCountFromHeader } from './po'
import { cldrCategories, PluralCategory, pluralRulesFor } from './plurals'

export type Bundle = Record<string, string>

export type CompileStats = {
  translated: number
  fuzzy: number
  untranslated: number
}

export type CompileOptions = {
  // named in errors
  file?: string
  useFuzzy?: boolean
  // emit msgid/msgid_plural for untranslated plurals, used for the source language
  fillFromSource?: boolean
}

export type CompileResult = { bundle: Bundle; stats: CompileStats }

export function bundleKey(msgid: string, context?: string) {
  return context === undefined ? msgid : `${msgid}_${context}`
}

// msgstr[n] -> i18next plural suffixes, preferring the catalog's own nplurals when the table disagrees
export function pluralSlots(catalog: PoCatalog, language: string, file = '<input>'): PluralCategory[][] {
  const rules = pluralRulesFor(language)
  const declared = pluralCountFromHeader(catalog.headers)
  if (declared === null || declared === rules.categories.length) return rules.categories
  const cldr = cldrCategories(language)
  if (declared === cldr.length) return cldr.map(c => [c])
  throw new PluralFormsError(file, null, null, `Plural-Forms declares ${declared} forms but "${language}" uses ${rules.categories.length}`)
}

function emitPlural(bundle: Bundle, base: string, forms: string[], slots: PluralCategory[][]) {
  slots.forEach((categories, i) => {
    for (const category of categories) bundle[`${base}_${category}`] = forms[i]
  })
}

function sourceForms(entry: PoEntry, slots: PluralCategory[][]) {
  const plural = entry.msgidPlural ?? entry.msgid
  if (slots.length === 1) return [plural]
  return slots.map((_, i) => (i === 0 ? entry.msgid : plural))
}

export function compileCatalog(catalog: PoCatalog, language: string, options: CompileOptions = {}): CompileResult {
  const bundle: Bundle = {}
  const stats: CompileStats = { translated: 0, fuzzy: 0, untranslated: 0 }
  const hasPlurals = catalog.entries.some(e => e.msgidPlural !== undefined)
  const file = options.file ?? '<input>'
  const slots = hasPlurals ? pluralSlots(catalog, language, file) : []

  for (const entry of catalog.entries) {
    const base = bundleKey(entry.msgid, entry.msgctxt)
    const plural = entry.msgidPlural !== undefined

    if (isFuzzy(entry) && !options.useFuzzy) {
      stats.fuzzy += 1
      if (plural && options.fillFromSource) emitPlural(bundle, base, sourceForms(entry, slots), slots)
      continue
    }
    if (!isTranslated(entry)) {
      stats.untranslated += 1
      if (plural && options.fillFromSource) emitPlural(bundle, base, sourceForms(entry, slots), slots)
      continue
    }

    stats.translated += 1
    if (!plural) {
      bundle[base] = entry.msgstr[0]
      continue
    }
    if (entry.msgstr.length !== slots.length) {
      throw new PluralFormsError(file, entry.line ?? null, entry.msgid, `has ${entry.msgstr.length} plural forms, expected ${slots.length}`)
    }
    emitPlural(bundle, base, entry.msgstr, slots)
  }

  return { bundle, stats }
}

export function sortBundle(bundle: Bundle): Bundle {
  const sorted: Bundle = {}
  for (const key of Object.keys(bundle).sort()) sorted[key] = bundle[key]
  return sorted
}

export function formatBundle(bundle: Bundle) {
  return JSON.stringify(sortBundle(bundle), null, 2) + '\n'
}
