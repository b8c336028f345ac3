import { FastifyInstance } from 'fastify'
import { TFunction } from 'i18next'
import { LocaleService } from './service'

declare module 'fastify' {
  interface FastifyRequest {
    locale: string
    t: TFunction
  }
}

export type LanguageOptions = {
  supported: string[]
  defaultLanguage: string
}

export type LocaleHookOptions = {
  param: string
}

// exact code, then its primary subtag ("es-MX" -> "es"), then the default
export function resolveLanguage(raw: string | null | undefined, options: LanguageOptions): string {
  const requested = (raw ?? '').trim().replace(/_/g, '-')
  if (!requested) return options.defaultLanguage
  const lower = requested.toLowerCase()
  const exact = options.supported.find(s => s.toLowerCase() === lower)
  if (exact) return exact
  const primary = lower.split('-')[0]
  const base = options.supported.find(s => s.toLowerCase() === primary)
  return base ?? options.defaultLanguage
}

export function readLangParam(query: unknown, param: string): string | null {
  if (typeof query !== 'object' || query === null) return null
  const value: unknown = Reflect.get(query, param)
  if (typeof value === 'string') return value
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0]
  return null
}

export function registerLocaleHooks(app: FastifyInstance, service: LocaleService, options: LocaleHookOptions) {
  app.decorateRequest('locale', '')
  app.decorateRequest('t', null)

  app.addHook('onRequest', async (req) => {
    const { supported, defaultLanguage } = service.languages()
    const locale = resolveLanguage(readLangParam(req.query, options.param), { supported, defaultLanguage })
    req.locale = locale
    req.t = service.fixedT(locale)
  })

  app.addHook('onSend', async (req, reply, payload) => {
    if (req.locale) reply.header('Content-Language', req.locale)
    return payload
  })
}
