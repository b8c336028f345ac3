import pino from 'pino'
import { Bundle } from '../src/modules/catalog/compile'
import { LocaleRepo } from '../src/modules/locales/repo'

export type MemoryBundles = Record<string, Record<string, Bundle>>

export function memoryRepo(data: MemoryBundles): LocaleRepo & { data: MemoryBundles } {
  return {
    data,
    async listNamespaces(language) {
      return Object.keys(data[language] ?? {}).sort()
    },
    async readBundle(language, namespace) {
      const bundle = data[language]?.[namespace]
      return bundle ? { ...bundle } : null
    },
    async writeBundle(language, namespace, bundle) {
      data[language] = { ...(data[language] ?? {}), [namespace]: { ...bundle } }
    },
  }
}

export const silentLogger = pino({ level: 'silent' })
