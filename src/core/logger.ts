import pino, { Logger } from 'pino'
import { AppConfig } from './config'

export function createLogger(config: Pick<AppConfig, 'logLevel'>, name = 'tandem-i18n'): Logger {
  return pino({ name, level: config.logLevel })
}
