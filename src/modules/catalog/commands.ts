import path from 'node:path'
import { Dirent, promises as fs } from 'node:fs'
import { Logger } from 'pino'
import { LocaleRepo } from '../locales/repo'
import { CompileStats, compileCatalog } from './compile'
import { ExtractOptions, extractMessages, SOURCE_EXTENSIONS, SourceInput } from './extract'
import { mergeCatalog } from './merge'
import { parsePo, PoCatalog, serializePo } from './po'

const SKIP_DIRS = new Set(['node_modules', 'dist', 'build', 'coverage'])

export type MakeMessagesOptions = ExtractOptions & {
  rootDir: string
  sourceDirs: string[]
  catalogDir: string
  languages: string[]
  namespace: string
  keepObsolete?: boolean
  now?: Date
}

export type MakeMessagesReport = {
  messages: number
  warnings: number
  catalogs: Array<{ language: string; file: string; added: number; kept: number; revived: number; obsoleted: number }>
}

export type CompileMessagesOptions = {
  catalogDir: string
  sourceLanguage: string
  languages?: string[]
  useFuzzy?: boolean
}

export type CompileReport = Array<{ language: string; namespace: string; stats: CompileStats }>

export async function listSourceFiles(dir: string): Promise<string[]> {
  let dirents: Dirent[]
  try {
    dirents = await fs.readdir(dir, { withFileTypes: true })
  } catch (err) {
    if (isMissing(err)) return []
    throw err
  }
  const out: string[] = []
  for (const d of dirents) {
    if (d.name.startsWith('.')) continue
    const full = path.join(dir, d.name)
    if (d.isDirectory()) {
      if (!SKIP_DIRS.has(d.name)) out.push(...await listSourceFiles(full))
    } else if (d.isFile() && SOURCE_EXTENSIONS.includes(path.extname(d.name)) && !d.name.endsWith('.d.ts')) {
      out.push(full)
    }
  }
  return out.sort()
}

function isMissing(err: unknown) {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

export function catalogPath(catalogDir: string, language: string, namespace: string) {
  return path.join(catalogDir, language, `${namespace}.po`)
}

export async function readCatalog(file: string): Promise<PoCatalog | null> {
  try {
    return parsePo(await fs.readFile(file, 'utf8'), file)
  } catch (err) {
    if (isMissing(err)) return null
    throw err
  }
}

export async function makeMessages(options: MakeMessagesOptions, logger: Logger): Promise<MakeMessagesReport> {
  const files: string[] = []
  for (const dir of options.sourceDirs) files.push(...await listSourceFiles(dir))
  const inputs: SourceInput[] = await Promise.all(files.map(async file => ({
    fileName: path.relative(options.rootDir, file).split(path.sep).join('/'),
    text: await fs.readFile(file, 'utf8'),
  })))
  logger.debug({ files: inputs.length }, 'scanning sources')

  const { messages, warnings } = extractMessages(inputs, options)
  for (const w of warnings) logger.warn({ reference: w.reference }, w.message)

  const report: MakeMessagesReport = { messages: messages.length, warnings: warnings.length, catalogs: [] }
  for (const language of options.languages) {
    const file = catalogPath(options.catalogDir, language, options.namespace)
    const existing = await readCatalog(file)
    const merged = mergeCatalog(existing, messages, { language, keepObsolete: options.keepObsolete, now: options.now })
    await fs.mkdir(path.dirname(file), { recursive: true })
    await fs.writeFile(file, serializePo(merged.catalog), 'utf8')
    const { catalog: _catalog, ...counts } = merged
    report.catalogs.push({ language, file, ...counts })
    logger.info({ language, file, ...counts }, 'catalog updated')
  }
  return report
}

async function listCatalogs(catalogDir: string, languages?: string[]) {
  const found: Array<{ language: string; namespace: string; file: string }> = []
  const langs = languages ?? (await fs.readdir(catalogDir, { withFileTypes: true }))
    .filter(d => d.isDirectory())
    .map(d => d.name)
    .sort()
  for (const language of langs) {
    let names: string[]
    try {
      names = await fs.readdir(path.join(catalogDir, language))
    } catch (err) {
      if (isMissing(err)) continue
      throw err
    }
    for (const name of names.filter(n => n.endsWith('.po')).sort()) {
      found.push({ language, namespace: name.slice(0, -3), file: path.join(catalogDir, language, name) })
    }
  }
  return found
}

export async function compileMessages(options: CompileMessagesOptions, output: LocaleRepo, logger: Logger): Promise<CompileReport> {
  const report: CompileReport = []
  for (const { language, namespace, file } of await listCatalogs(options.catalogDir, options.languages)) {
    const catalog = parsePo(await fs.readFile(file, 'utf8'), file)
    const { bundle, stats } = compileCatalog(catalog, language, {
      file,
      useFuzzy: options.useFuzzy,
      fillFromSource: language === options.sourceLanguage,
    })
    await output.writeBundle(language, namespace, bundle)
    report.push({ language, namespace, stats })
    logger.info({ language, namespace, source: file, ...stats }, 'bundle compiled')
  }
  return report
}

export async function catalogStats(catalogDir: string, languages?: string[]): Promise<CompileReport> {
  const report: CompileReport = []
  for (const { language, namespace, file } of await listCatalogs(catalogDir, languages)) {
    const catalog = parsePo(await fs.readFile(file, 'utf8'), file)
    report.push({ language, namespace, stats: compileCatalog(catalog, language, { file }).stats })
  }
  return report
}
