import path from 'node:path'
import { Dirent, promises as fs } from 'node:fs'
import { z } from 'zod'
import { Bundle, formatBundle } from '../catalog/compile'
import { BundleFormatError } from '../catalog/errors'
import { LANGUAGE_CODE } from '../../core/config'

export const BundleSchema = z.record(z.string(), z.string())

const NAMESPACE = /^[A-Za-z0-9_.-]+$/

export interface LocaleRepo {
  listNamespaces(language: string): Promise<string[]>
  readBundle(language: string, namespace: string): Promise<Bundle | null>
  writeBundle(language: string, namespace: string, bundle: Bundle): Promise<void>
}

export function parseBundle(text: string, file: string): Bundle {
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (err) {
    throw new BundleFormatError(file, `invalid JSON (${err instanceof Error ? err.message : String(err)})`)
  }
  const parsed = BundleSchema.safeParse(raw)
  if (!parsed.success) {
    const first = parsed.error.issues[0]
    throw new BundleFormatError(file, `expected a flat object of strings, ${first.message} at "${first.path.join('.')}"`)
  }
  return parsed.data
}

async function readDir(dir: string): Promise<Dirent[]> {
  try {
    return await fs.readdir(dir, { withFileTypes: true })
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return []
    throw err
  }
}

export function createFsLocaleRepo(localesDir: string): LocaleRepo {
  const fileFor = (language: string, namespace: string) => {
    if (!LANGUAGE_CODE.test(language) || !NAMESPACE.test(namespace)) {
      throw new BundleFormatError(`${language}/${namespace}`, 'invalid language or namespace name')
    }
    return path.join(localesDir, language, `${namespace}.json`)
  }

  return {
    async listNamespaces(language) {
      if (!LANGUAGE_CODE.test(language)) return []
      return (await readDir(path.join(localesDir, language)))
        .filter(d => d.isFile() && d.name.endsWith('.json'))
        .map(d => d.name.slice(0, -5))
        .filter(n => NAMESPACE.test(n))
        .sort()
    },
    async readBundle(language, namespace) {
      const file = fileFor(language, namespace)
      let text: string
      try {
        text = await fs.readFile(file, 'utf8')
      } catch (err) {
        if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null
        throw err
      }
      return parseBundle(text, file)
    },
    async writeBundle(language, namespace, bundle) {
      const file = fileFor(language, namespace)
      await fs.mkdir(path.dirname(file), { recursive: true })
      await fs.writeFile(file, formatBundle(bundle), 'utf8')
    },
  }
}
