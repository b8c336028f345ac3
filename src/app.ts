import path from 'node:path'
import fs from 'node:fs'
import Fastify, { FastifyInstance } from 'fastify'
import fastifyCors from '@fastify/cors'
import fastifyStatic from '@fastify/static'
import { Server as IOServer } from 'socket.io'
import { registerGreetingRoutes } from './routes/greeting'
import { registerI18nRoutes } from './routes/i18n'
import { emitChange, onChange } from './lib/events'
import { AppConfig, loadConfig } from './core/config'
import { route } from './core/http'
import { createFsLocaleRepo, LocaleRepo } from './modules/locales/repo'
import { createLocaleService } from './modules/locales/service'
import { registerLocaleHooks } from './modules/locales/hooks'

export type BuildAppOptions = {
  config?: Partial<AppConfig>
  env?: NodeJS.ProcessEnv
  localeRepo?: LocaleRepo
  sockets?: boolean
}

export async function buildApp(options: BuildAppOptions = {}) {
  const config = loadConfig(options.config ?? {}, options.env)
  const app = Fastify({ logger: { level: config.logLevel } })

  await app.register(fastifyCors, { origin: true })

  const locales = createLocaleService({
    repo: options.localeRepo ?? createFsLocaleRepo(config.localesDir),
    settings: config,
    emitChange,
  })
  const summary = await locales.load()
  app.log.info({ summary }, 'locale bundles loaded')

  registerLocaleHooks(app, locales, { param: config.langParam })

  app.get('/api/health', route(async () => ({ status: 'ok' })))

  await registerGreetingRoutes(app)
  await registerI18nRoutes(app, locales, { adminToken: config.adminToken })

  await registerLocaleStatic(app, config)
  await registerWebStatic(app, config)
  registerSpaFallback(app, config)

  const io = options.sockets === false ? null : setupLocaleSockets(app)

  return { app, config, io, locales }
}

// /locales/{lng}/{ns}.json, the same files the server loaded
async function registerLocaleStatic(app: FastifyInstance, config: AppConfig) {
  if (!fs.existsSync(config.localesDir)) {
    app.log.warn({ root: config.localesDir }, 'locales dir not found; /locales/* will be unavailable')
    return
  }
  await app.register(fastifyStatic, {
    root: config.localesDir,
    prefix: '/locales/',
    decorateReply: false,
    // revalidate every time so a reload reaches browsers that fetched the old bundle
    cacheControl: false,
    setHeaders: (res) => {
      res.setHeader('Cache-Control', 'no-cache')
    },
  })
}

async function registerWebStatic(app: FastifyInstance, config: AppConfig) {
  const webDistDir = path.join(config.webRoot, 'dist')
  if (fs.existsSync(webDistDir)) {
    await app.register(fastifyStatic, {
      root: webDistDir,
      prefix: '/',
      decorateReply: false,
    })
  } else {
    app.log.debug({ root: webDistDir }, 'web/dist not found; skipping static serving (dev mode)')
  }
}

function registerSpaFallback(app: FastifyInstance, config: AppConfig) {
  const indexPath = path.join(config.webRoot, 'dist', 'index.html')
  app.setNotFoundHandler((req, reply) => {
    if (req.url.startsWith('/api') || req.url.startsWith('/locales') || req.url.startsWith('/socket.io')) {
      reply.code(404).send({ error: 'Not found' })
      return
    }
    if (!fs.existsSync(indexPath)) {
      reply.code(404).send({ error: 'Not found' })
      return
    }
    reply.type('text/html').send(fs.readFileSync(indexPath, 'utf8'))
  })
}

function setupLocaleSockets(app: FastifyInstance) {
  const io = new IOServer(app.server, { cors: { origin: true } })

  io.on('connection', (socket) => {
    app.log.debug({ id: socket.id }, 'socket connected')
    socket.on('disconnect', () => {
      app.log.debug({ id: socket.id }, 'socket disconnected')
    })
  })

  const off = onChange((p) => {
    io.emit('changed', p)
  })

  app.addHook('preClose', async () => {
    off()
    io.disconnectSockets(true)
    io.engine.close()
  })

  return io
}
