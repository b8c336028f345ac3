import test from 'node:test'
import assert from 'node:assert/strict'
import { createLocaleService, LocaleNotLoadedError } from '../src/modules/locales/service'
import { ChangeTopic } from '../src/lib/events'
import { memoryRepo, MemoryBundles } from './helpers'

const SETTINGS = {
  defaultLanguage: 'en',
  fallbackLanguage: 'en',
  supportedLanguages: ['en', 'es'],
  defaultNamespace: 'translation',
}

function fixtures(): MemoryBundles {
  return {
    en: { translation: { 'Only in English': 'Only in English' } },
    es: {
      translation: {
        Hello: 'Hola',
        'Loading... please wait.': 'Cargando... espere por favor.',
        'Note: saved': 'Nota: guardado',
        '{{count}} file_one': '{{count}} archivo',
        '{{count}} file_other': '{{count}} archivos',
      },
      admin: { Dashboard: 'Panel' },
    },
    fr: { translation: { Hello: 'Bonjour' } },
  }
}

function setup() {
  const repo = memoryRepo(fixtures())
  const events: Array<{ topic: ChangeTopic; languages?: string[] }> = []
  const service = createLocaleService({
    repo,
    settings: SETTINGS,
    emitChange: (topic, extra) => { events.push({ topic, ...extra }) },
  })
  return { repo, events, service }
}

test('fixedT refuses to translate before bundles are loaded', () => {
  const { service } = setup()
  assert.equal(service.isLoaded(), false)
  assert.throws(() => service.fixedT('es'), LocaleNotLoadedError)
})

test('load reads every supported language and reports what it found', async () => {
  const { service } = setup()
  const summary = await service.load()

  assert.deepEqual(summary, [
    { language: 'en', namespaces: ['translation'], keys: 1 },
    { language: 'es', namespaces: ['admin', 'translation'], keys: 6 },
  ])
  assert.equal(service.isLoaded(), true)
})

test('fixedT translates source strings and falls back to the fallback language', async () => {
  const { service } = setup()
  await service.load()
  const t = service.fixedT('es')

  assert.equal(t('Hello'), 'Hola')
  assert.equal(t('Loading... please wait.'), 'Cargando... espere por favor.')
  assert.equal(t('Note: saved'), 'Nota: guardado')
  assert.equal(t('Dashboard', { ns: 'admin' }), 'Panel')
  assert.equal(t('Only in English'), 'Only in English')
  assert.equal(t('Never translated'), 'Never translated')
  assert.equal(t('{{count}} file', { count: 1 }), '1 archivo')
  assert.equal(t('{{count}} file', { count: 3 }), '3 archivos')
})

test('fixed translators for different languages do not affect each other', async () => {
  const { service } = setup()
  await service.load()
  const es = service.fixedT('es')
  const en = service.fixedT('en')

  assert.equal(es('Hello'), 'Hola')
  assert.equal(en('Hello'), 'Hello')
  assert.equal(es('Hello'), 'Hola')
})

test('bundle returns the loaded resources of one language', async () => {
  const { service } = setup()
  await service.load()

  assert.deepEqual(service.bundle('es').resources.admin, { Dashboard: 'Panel' })
  assert.deepEqual(service.bundle('fr'), { lng: 'fr', resources: {} })
  assert.equal(service.isSupported('es'), true)
  assert.equal(service.isSupported('fr'), false)
  assert.deepEqual(service.languages(), { defaultLanguage: 'en', fallbackLanguage: 'en', supported: ['en', 'es'] })
})

test('reload swaps bundles without changing translators already handed out', async () => {
  const { repo, events, service } = setup()
  await service.load()
  const before = service.fixedT('es')

  repo.data.es.translation = { ...repo.data.es.translation, Hello: '¡Hola!' }
  await service.reload()

  assert.equal(before('Hello'), 'Hola')
  assert.equal(service.fixedT('es')('Hello'), '¡Hola!')
  assert.deepEqual(events, [{ topic: 'locales', languages: ['en', 'es'] }])
})
