import { z } from 'zod'
import table from './plural-forms.json'

export type PluralCategory = 'zero' | 'one' | 'two' | 'few' | 'many' | 'other'

const CLDR_ORDER: PluralCategory[] = ['zero', 'one', 'two', 'few', 'many', 'other']

const CategorySchema = z.enum(['zero', 'one', 'two', 'few', 'many', 'other'])

const TableSchema = z.record(z.string(), z.object({
  pluralForms: z.string(),
  categories: z.array(z.array(CategorySchema).min(1)).min(1),
}))

const KNOWN = TableSchema.parse(table)

export type PluralRules = {
  // gettext header value, e.g. "nplurals=2; plural=(n != 1);"
  pluralForms: string
  // i18next suffixes covered by each msgstr[n]
  categories: PluralCategory[][]
}

export function cldrCategories(language: string): PluralCategory[] {
  const reported = new Intl.PluralRules(language).resolvedOptions().pluralCategories
  return CLDR_ORDER.filter(c => reported.includes(c))
}

export function pluralRulesFor(language: string): PluralRules {
  const known = KNOWN[language] ?? KNOWN[language.split('-')[0]]
  if (known) return known
  // unknown to the table: one msgstr per CLDR category, the expression is only a placeholder
  const categories = cldrCategories(language)
  return {
    pluralForms: `nplurals=${categories.length}; plural=0;`,
    categories: categories.map(c => [c]),
  }
}
