import { buildApp } from './app'
import { createLogger } from './core/logger'

export async function start() {
  const { app, config } = await buildApp()
  await app.listen({ port: config.port, host: config.host })
  app.log.info({ port: config.port, host: config.host, languages: config.supportedLanguages }, 'Server ready')

  const shutdown = (signal: string) => {
    app.log.info({ signal }, 'shutting down')
    app.close().then(
      () => process.exit(0),
      (err) => {
        app.log.error({ err }, 'shutdown failed')
        process.exit(1)
      },
    )
  }
  process.once('SIGINT', shutdown)
  process.once('SIGTERM', shutdown)
  return app
}

if (require.main === module) {
  start().catch((err) => {
    createLogger({ logLevel: 'fatal' }).fatal({ err }, 'failed to start')
    process.exit(1)
  })
}
