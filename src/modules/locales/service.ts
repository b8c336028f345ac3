import i18next, { i18n as I18n, Resource, TFunction } from 'i18next'
import { AppConfig } from '../../core/config'
import { ChangeTopic } from '../../lib/events'
import { Bundle } from '../catalog/compile'
import { LocaleRepo } from './repo'

export type LocaleSettings = Pick<AppConfig, 'defaultLanguage' | 'fallbackLanguage' | 'supportedLanguages' | 'defaultNamespace'>

export type LocaleServiceDeps = {
  repo: LocaleRepo
  settings: LocaleSettings
  emitChange: (topic: ChangeTopic, extra?: { languages?: string[] }) => void
}

export type LanguageBundle = { lng: string; resources: Record<string, Bundle> }

export type LoadSummary = Array<{ language: string; namespaces: string[]; keys: number }>

export class LocaleNotLoadedError extends Error {
  constructor() {
    super('locale bundles have not been loaded')
    this.name = 'LocaleNotLoadedError'
  }
}

export type LocaleService = ReturnType<typeof createLocaleService>

export function createLocaleService(deps: LocaleServiceDeps) {
  const { repo, settings } = deps
  let instance: I18n | null = null
  let loaded: Record<string, Record<string, Bundle>> = {}

  const current = () => {
    if (!instance) throw new LocaleNotLoadedError()
    return instance
  }

  async function readAll() {
    const data: Record<string, Record<string, Bundle>> = {}
    for (const language of settings.supportedLanguages) {
      data[language] = {}
      for (const namespace of await repo.listNamespaces(language)) {
        const bundle = await repo.readBundle(language, namespace)
        if (bundle) data[language][namespace] = bundle
      }
    }
    return data
  }

  async function load(): Promise<LoadSummary> {
    const data = await readAll()
    const namespaces = new Set([settings.defaultNamespace])
    for (const byNs of Object.values(data)) Object.keys(byNs).forEach(ns => namespaces.add(ns))

    const resources: Resource = data
    const next = i18next.createInstance()
    await next.init({
      resources,
      lng: settings.defaultLanguage,
      fallbackLng: settings.fallbackLanguage,
      supportedLngs: settings.supportedLanguages,
      ns: Array.from(namespaces),
      defaultNS: settings.defaultNamespace,
      // keys are the source strings themselves
      keySeparator: false,
      nsSeparator: false,
      interpolation: { escapeValue: false },
      initImmediate: false,
    })

    // in-flight requests keep the fixed t they were given
    instance = next
    loaded = data
    return Object.entries(data).map(([language, byNs]) => ({
      language,
      namespaces: Object.keys(byNs),
      keys: Object.values(byNs).reduce((sum, b) => sum + Object.keys(b).length, 0),
    }))
  }

  return {
    load,

    async reload() {
      const summary = await load()
      deps.emitChange('locales', { languages: summary.map(s => s.language) })
      return summary
    },

    isLoaded() {
      return instance !== null
    },

    fixedT(language: string): TFunction {
      return current().getFixedT(language)
    },

    isSupported(language: string) {
      return settings.supportedLanguages.includes(language)
    },

    languages() {
      return {
        defaultLanguage: settings.defaultLanguage,
        fallbackLanguage: settings.fallbackLanguage,
        supported: [...settings.supportedLanguages],
      }
    },

    bundle(language: string): LanguageBundle {
      current()
      return { lng: language, resources: loaded[language] ?? {} }
    },
  }
}
