#!/usr/bin/env node
import { Command } from 'commander'
import { AppConfig, loadConfig } from './core/config'
import { createLogger } from './core/logger'
import { catalogStats, compileMessages, makeMessages } from './modules/catalog/commands'
import { DEFAULT_FUNCTIONS } from './modules/catalog/extract'
import { createFsLocaleRepo } from './modules/locales/repo'
import { start } from './server'

type CommonOptions = { language?: string[] }

function languagesFrom(config: AppConfig, opts: CommonOptions) {
  return opts.language && opts.language.length ? opts.language : config.supportedLanguages
}

function collect(value: string, previous: string[] = []) {
  return [...previous, value]
}

export function buildProgram(config: AppConfig = loadConfig()) {
  const logger = createLogger(config)
  const program = new Command()

  program
    .name('tandem-i18n')
    .description('Extract, compile and serve the message catalogs shared by the API and the web client')

  program
    .command('extract')
    .description('Scan sources for t() calls and update locale/{lng}/{ns}.po')
    .option('-l, --language <code>', 'only this language (repeatable)', collect)
    .option('-n, --namespace <ns>', 'catalog namespace', config.defaultNamespace)
    .option('-f, --function <name>', 'translation function to look for (repeatable)', collect)
    .option('--no-keep-obsolete', 'drop entries that no longer appear in the sources')
    .action(async (opts: CommonOptions & { namespace: string; function?: string[]; keepObsolete: boolean }) => {
      const report = await makeMessages({
        rootDir: process.cwd(),
        sourceDirs: config.sourceDirs,
        catalogDir: config.catalogDir,
        languages: languagesFrom(config, opts),
        namespace: opts.namespace,
        functions: opts.function ?? DEFAULT_FUNCTIONS,
        keepObsolete: opts.keepObsolete,
        now: new Date(),
      }, logger)
      logger.info({ messages: report.messages, warnings: report.warnings }, 'extraction finished')
    })

  program
    .command('compile')
    .description('Compile locale/{lng}/{ns}.po into the JSON bundles served under /locales')
    .option('-l, --language <code>', 'only this language (repeatable)', collect)
    .option('--use-fuzzy', 'include entries flagged fuzzy', false)
    .action(async (opts: CommonOptions & { useFuzzy: boolean }) => {
      const report = await compileMessages({
        catalogDir: config.catalogDir,
        sourceLanguage: config.defaultLanguage,
        languages: opts.language,
        useFuzzy: opts.useFuzzy,
      }, createFsLocaleRepo(config.localesDir), logger)
      logger.info({ bundles: report.length }, 'compile finished')
    })

  program
    .command('stats')
    .description('Report translated, fuzzy and untranslated counts per catalog')
    .option('-l, --language <code>', 'only this language (repeatable)', collect)
    .action(async (opts: CommonOptions) => {
      for (const row of await catalogStats(config.catalogDir, opts.language)) {
        logger.info({ language: row.language, namespace: row.namespace, ...row.stats }, 'catalog stats')
      }
    })

  program
    .command('serve')
    .description('Start the HTTP server')
    .action(async () => {
      await start()
    })

  return { program, logger }
}

if (require.main === module) {
  Promise.resolve()
    .then(() => buildProgram())
    .then(({ program }) => program.parseAsync(process.argv))
    .catch((err) => {
      createLogger({ logLevel: 'error' }).error({ err }, 'command failed')
      process.exitCode = 1
    })
}
