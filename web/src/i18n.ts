import i18n from 'i18next'
import { initReactI18next } from 'react-i18next'
import LanguageDetector from 'i18next-browser-languagedetector'
import HttpBackend from 'i18next-http-backend'
import { buildI18nOptions } from './i18nOptions'

i18n
  .use(HttpBackend)
  .use(LanguageDetector)
  .use(initReactI18next)
  .init(buildI18nOptions({ debug: __I18N_DEBUG__ }))
  .catch((err) => {
    // eslint-disable-next-line no-console
    console.error('i18n init failed', err)
  })

export default i18n
