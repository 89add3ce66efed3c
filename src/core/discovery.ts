/**
 * Provider Discovery
 *
 * Loads provider modules from a directory into a ProviderNamespace.
 * Only the immediate children of the directory are read; sub-directories are
 * separate namespaces and must be loaded explicitly.
 */

import { readdir } from 'node:fs/promises'
import path from 'node:path'
import { pathToFileURL } from 'node:url'
import type { ProviderModule, ProviderNamespace } from './providers.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('discovery')

export interface ProviderLoaderOptions {
  /** Directory holding provider modules */
  rootDir: string
  /** Namespace name (default: directory name) */
  name?: string
  /** Allowed file extensions (default: .js, .mjs, .ts) */
  extensions?: string[]
  /** Optional ignore predicate (receives absolute path) */
  ignore?: (filePath: string) => boolean
}

const DEFAULT_EXTENSIONS = ['.js', '.mjs', '.ts']
const IGNORED_SUFFIXES = ['.d.ts', '.test.ts', '.test.js', '.spec.ts', '.spec.js']

function normalizeExtensions(extensions?: string[]): string[] {
  if (!extensions || extensions.length === 0) return DEFAULT_EXTENSIONS
  return extensions.map((ext) => (ext.startsWith('.') ? ext : `.${ext}`))
}

async function collectProviderFiles(
  rootDir: string,
  extensions: string[],
  ignore?: (filePath: string) => boolean
): Promise<string[]> {
  const entries = await readdir(rootDir, { withFileTypes: true })
  const files: string[] = []

  for (const entry of entries) {
    if (!entry.isFile()) continue

    const fullPath = path.join(rootDir, entry.name)
    if (ignore?.(fullPath)) continue
    if (IGNORED_SUFFIXES.some((suffix) => entry.name.endsWith(suffix))) continue

    if (extensions.includes(path.extname(entry.name))) {
      files.push(fullPath)
    }
  }

  // Directory listing order is platform dependent
  return files.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
}

/**
 * Load every provider module directly under a directory.
 *
 * Modules are ordered by file name, so prefix names ('01-db.ts') where one
 * provider needs another one registered first.
 */
export async function loadProviderNamespace(options: ProviderLoaderOptions): Promise<ProviderNamespace> {
  const rootDir = path.resolve(options.rootDir)
  const extensions = normalizeExtensions(options.extensions)
  const files = await collectProviderFiles(rootDir, extensions, options.ignore)
  const modules: ProviderModule[] = []

  for (const filePath of files) {
    const exports: object = await import(pathToFileURL(filePath).href)
    modules.push({ name: path.parse(filePath).name, exports })
  }

  const name = options.name ?? path.basename(rootDir)
  logger.debug({ namespace: name, modules: modules.map((m) => m.name) }, 'Loaded provider namespace')

  return { name, modules }
}
