import path from 'node:path'
import { z } from 'zod'

export type AppConfig = {
  port: number
  host: string
  logLevel: string
  defaultLanguage: string
  fallbackLanguage: string
  supportedLanguages: string[]
  langParam: string
  defaultNamespace: string
  webRoot: string
  localesDir: string
  catalogDir: string
  sourceDirs: string[]
  adminToken: string | null
}

export const LANGUAGE_CODE = /^[a-z]{2,3}(-[A-Za-z0-9]{2,8})*$/

const languageCode = z.string().regex(LANGUAGE_CODE, 'expected a language code such as "en" or "pt-BR"')

const commaList = z.string().transform(v => v.split(',').map(s => s.trim()).filter(Boolean))

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  DEFAULT_LANGUAGE: languageCode.default('en'),
  FALLBACK_LANGUAGE: languageCode.optional(),
  SUPPORTED_LANGUAGES: commaList.pipe(z.array(languageCode).min(1)).default('en,es'),
  LANG_PARAM: z.string().min(1).default('lang'),
  LOCALES_DIR: z.string().min(1).optional(),
  CATALOG_DIR: z.string().min(1).optional(),
  SOURCE_DIRS: commaList.pipe(z.array(z.string()).min(1)).default('src,web/src'),
  ADMIN_TOKEN: z.string().min(1).optional(),
})

export class ConfigError extends Error {
  keys: string[]

  constructor(keys: string[], message: string) {
    super(message)
    this.name = 'ConfigError'
    this.keys = keys
  }
}

export function loadConfig(overrides: Partial<AppConfig> = {}, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const fields = Object.entries(parsed.error.flatten().fieldErrors)
    const detail = fields.map(([k, msgs]) => `${k}: ${(msgs ?? []).join(', ')}`).join('; ')
    throw new ConfigError(fields.map(([k]) => k), `Invalid environment: ${detail}`)
  }
  const e = parsed.data
  const cwd = process.cwd()
  const webRoot = path.join(cwd, 'web')

  const base: AppConfig = {
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    defaultLanguage: e.DEFAULT_LANGUAGE,
    fallbackLanguage: e.FALLBACK_LANGUAGE ?? e.DEFAULT_LANGUAGE,
    supportedLanguages: e.SUPPORTED_LANGUAGES,
    langParam: e.LANG_PARAM,
    defaultNamespace: 'translation',
    webRoot,
    localesDir: path.resolve(cwd, e.LOCALES_DIR ?? path.join('web', 'public', 'locales')),
    catalogDir: path.resolve(cwd, e.CATALOG_DIR ?? 'locale'),
    sourceDirs: e.SOURCE_DIRS.map(d => path.resolve(cwd, d)),
    adminToken: e.ADMIN_TOKEN ?? null,
  }

  const config = { ...base, ...overrides }
  for (const lng of [config.fallbackLanguage, config.defaultLanguage]) {
    if (!config.supportedLanguages.includes(lng)) config.supportedLanguages = [lng, ...config.supportedLanguages]
  }
  return config
}
