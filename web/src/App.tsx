import { useEffect, useState } from 'react'
import { useTranslation } from 'react-i18next'
import LanguageSwitcher from './components/LanguageSwitcher'
import useLocaleReload from './hooks/useLocaleReload'
import { SUPPORTED_LANGUAGES } from './i18nOptions'
import { fetchGreeting } from './lib/api'

export default function App() {
  const { t, i18n, ready } = useTranslation()
  const lang = i18n.resolvedLanguage ?? i18n.language
  const [greeting, setGreeting] = useState<string | null>(null)
  const [failed, setFailed] = useState(false)

  useLocaleReload()

  useEffect(() => {
    let cancelled = false
    setFailed(false)
    fetchGreeting(lang)
      .then(message => { if (!cancelled) setGreeting(message) })
      .catch(() => { if (!cancelled) setFailed(true) })
    return () => { cancelled = true }
  }, [lang])

  if (!ready) return null

  return (
    <div className="min-h-screen bg-neutral-950 text-neutral-100 p-8 space-y-6">
      <header className="flex items-center justify-between">
        <h1 className="text-3xl font-semibold">{t('Welcome to our application.')}</h1>
        <LanguageSwitcher />
      </header>
      <section className="space-y-2">
        <h2 className="text-lg font-medium">{t('From the server')}</h2>
        {failed
          ? <p className="text-red-400">{t('Could not reach the server.')}</p>
          : <p>{greeting ?? t('Loading…')}</p>}
      </section>
      <footer className="text-sm text-neutral-400">
        {t('{{count}} language available', { count: SUPPORTED_LANGUAGES.length, defaultValue_other: '{{count}} languages available' })}
      </footer>
    </div>
  )
}
