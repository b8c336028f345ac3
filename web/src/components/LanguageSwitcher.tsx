import { useTranslation } from 'react-i18next'
import { SUPPORTED_LANGUAGES } from '../i18nOptions'
import { languageName } from '../lib/api'

export default function LanguageSwitcher() {
  const { t, i18n } = useTranslation()
  const current = i18n.resolvedLanguage ?? i18n.language

  return (
    <label className="inline-flex items-center gap-2 text-sm">
      <span>{t('Language')}</span>
      <select
        className="rounded border border-neutral-600 bg-neutral-900 px-2 py-1"
        value={current}
        onChange={(e) => {
          i18n.changeLanguage(e.target.value).catch((err) => {
            // eslint-disable-next-line no-console
            console.warn('changing language failed', err)
          })
        }}
      >
        {SUPPORTED_LANGUAGES.map(code => (
          <option key={code} value={code}>{languageName(code, code)}</option>
        ))}
      </select>
    </label>
  )
}
