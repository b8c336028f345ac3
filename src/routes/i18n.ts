import { FastifyInstance } from 'fastify'
import { requireAdmin } from '../auth'
import { httpError, parseParams, route } from '../core/http'
import { LocaleService } from '../modules/locales/service'
import { LocaleParamsSchema } from '../modules/locales/schema'

export type I18nRouteOptions = { adminToken: string | null }

export async function registerI18nRoutes(app: FastifyInstance, service: LocaleService, options: I18nRouteOptions) {
  app.get('/api/i18n/languages', route(async () => service.languages()))

  app.get('/api/i18n/:locale', route(async (req) => {
    const { locale } = parseParams(req, LocaleParamsSchema)
    if (!service.isSupported(locale)) throw httpError(404, `Unsupported language: ${locale}`)
    return service.bundle(locale)
  }))

  app.post('/api/i18n/reload', { preHandler: requireAdmin(options.adminToken) }, route(async (req) => {
    const summary = await service.reload()
    req.log.info({ summary }, 'locale bundles reloaded')
    return { ok: true, languages: summary }
  }))
}
