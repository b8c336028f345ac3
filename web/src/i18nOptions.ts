import type { InitOptions } from 'i18next'
import type { HttpBackendOptions } from 'i18next-http-backend'
import type { DetectorOptions } from 'i18next-browser-languagedetector'

export const SUPPORTED_LANGUAGES = ['en', 'es']
export const FALLBACK_LANGUAGE = 'en'
export const DEFAULT_NAMESPACE = 'translation'
// same query parameter the API reads, so ?lang=es switches both sides
export const LANG_PARAM = 'lang'
export const LOAD_PATH = '/locales/{{lng}}/{{ns}}.json'

export type I18nOptionsInput = {
  debug?: boolean
  supported?: string[]
}

export function buildDetection(): DetectorOptions {
  return {
    order: ['querystring', 'localStorage', 'navigator'],
    lookupQuerystring: LANG_PARAM,
    lookupLocalStorage: 'i18nextLng',
    caches: ['localStorage'],
  }
}

export function buildI18nOptions({ debug = false, supported = SUPPORTED_LANGUAGES }: I18nOptionsInput = {}): InitOptions<HttpBackendOptions> {
  return {
    fallbackLng: FALLBACK_LANGUAGE,
    supportedLngs: supported,
    nonExplicitSupportedLngs: true,
    load: 'languageOnly',
    ns: [DEFAULT_NAMESPACE],
    defaultNS: DEFAULT_NAMESPACE,
    // keys are the English source strings, which contain dots and colons
    keySeparator: false,
    nsSeparator: false,
    debug,
    detection: buildDetection(),
    backend: { loadPath: LOAD_PATH },
    interpolation: { escapeValue: false },
    react: { bindI18nStore: 'added', useSuspense: false },
  }
}
