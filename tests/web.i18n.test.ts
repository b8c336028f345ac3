import test from 'node:test'
import assert from 'node:assert/strict'
import { buildDetection, buildI18nOptions, LOAD_PATH } from '../web/src/i18nOptions'
import { fetchGreeting, greetingUrl, languageName } from '../web/src/lib/api'

test('buildI18nOptions keeps source-string keys intact and reads ?lang first', () => {
  const options = buildI18nOptions({ supported: ['en', 'es', 'de'] })

  assert.equal(options.fallbackLng, 'en')
  assert.deepEqual(options.supportedLngs, ['en', 'es', 'de'])
  assert.equal(options.keySeparator, false)
  assert.equal(options.nsSeparator, false)
  assert.equal(options.load, 'languageOnly')
  assert.equal(options.debug, false)
  assert.deepEqual(options.backend, { loadPath: LOAD_PATH })
  assert.deepEqual(options.detection, buildDetection())
  assert.deepEqual(buildDetection().order, ['querystring', 'localStorage', 'navigator'])
  assert.equal(buildDetection().lookupQuerystring, 'lang')
})

test('greetingUrl encodes the language', () => {
  assert.equal(greetingUrl('es'), '/api/greeting?lang=es')
  assert.equal(greetingUrl('pt BR'), '/api/greeting?lang=pt%20BR')
})

test('fetchGreeting returns the translated message', async () => {
  const seen: string[] = []
  const message = await fetchGreeting('es', async (input) => {
    seen.push(input)
    return new Response(JSON.stringify({ message: 'Hola' }), { status: 200, headers: { 'content-type': 'application/json' } })
  })

  assert.equal(message, 'Hola')
  assert.deepEqual(seen, ['/api/greeting?lang=es'])
})

test('fetchGreeting rejects failed or malformed responses', async () => {
  await assert.rejects(
    fetchGreeting('es', async () => new Response('{}', { status: 503 })),
    { message: 'greeting request failed with 503' },
  )
  await assert.rejects(
    fetchGreeting('es', async () => new Response(JSON.stringify({ text: 'Hola' }), { status: 200 })),
    { message: 'greeting response has no message' },
  )
})

test('languageName shows a language in the given display language', () => {
  assert.equal(languageName('es', 'en'), 'Spanish')
  assert.equal(languageName('en', 'es'), 'inglés')
})
