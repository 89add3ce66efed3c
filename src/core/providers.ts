/**
 * Provider Declarations
 *
 * A provider is a named initializer producing one component. Declarations
 * are plain tagged objects; modules export them and a ProviderNamespace lists
 * those modules in the order they must be registered.
 *
 * @example
 * ```typescript
 * // providers/cache.ts
 * export const cache = defineProvider(
 *   'cache',
 *   ({ context, loop }) => {
 *     const cache = new Map<string, unknown>()
 *     loop.defer(() => cache.clear())
 *     context.logger.debug('cache ready')
 *     return cache
 *   },
 *   { inject: ['context', 'loop'] }
 * )
 * ```
 */

import type { Ambient, AmbientKey } from '../types/index.js'

/**
 * Provider declaration
 */
export interface ProviderDeclaration<T = unknown, K extends AmbientKey = AmbientKey> {
  readonly kind: 'provider'

  /** Component name the result is registered under */
  readonly name: string

  /** Ambient handles the initializer receives */
  readonly inject: readonly K[]

  /** Creates the component; may suspend */
  initializer(ambient: Pick<Ambient, K>): T | Promise<T>

  /** Called on registry shutdown with the created component */
  onShutdown?(instance: T): void | Promise<void>
}

export interface ProviderOptions<T, K extends AmbientKey> {
  /** Ambient handles to pass to the initializer */
  inject?: readonly K[]

  onShutdown?: (instance: T) => void | Promise<void>
}

/**
 * One module of a provider namespace (its exports are scanned for declarations)
 */
export interface ProviderModule {
  readonly name: string
  readonly exports: object
}

/**
 * Ordered set of provider modules, registered depth-one in list order
 */
export interface ProviderNamespace {
  readonly name: string
  readonly modules: readonly ProviderModule[]
}

const AMBIENT_KEYS: readonly AmbientKey[] = ['context', 'loop']

/**
 * Declare a provider
 */
export function defineProvider<T, K extends AmbientKey = never>(
  name: string,
  initializer: (ambient: Pick<Ambient, K>) => T | Promise<T>,
  options: ProviderOptions<T, K> = {}
): ProviderDeclaration<T, K> {
  if (!name) {
    throw new Error('Provider name must not be empty')
  }

  const inject = [...new Set(options.inject ?? [])]
  for (const key of inject) {
    if (!AMBIENT_KEYS.includes(key)) {
      throw new Error(`Provider '${name}' asks for unknown ambient '${String(key)}'`)
    }
  }

  const onShutdown = options.onShutdown

  return Object.freeze({
    kind: 'provider' as const,
    name,
    inject: Object.freeze(inject),
    initializer,
    ...(onShutdown && { onShutdown }),
  })
}

export function isProviderDeclaration(value: unknown): value is ProviderDeclaration {
  if (!value || typeof value !== 'object') return false
  if (!('kind' in value) || value.kind !== 'provider') return false
  if (!('name' in value) || typeof value.name !== 'string') return false
  if (!('initializer' in value) || typeof value.initializer !== 'function') return false
  return 'inject' in value && Array.isArray(value.inject)
}

/**
 * Create a namespace from an ordered list of modules
 *
 * @example
 * ```typescript
 * import * as database from './database.js'
 * import * as cache from './cache.js'
 *
 * export const providers = createProviderNamespace('providers', { database, cache })
 * ```
 */
export function createProviderNamespace(name: string, modules: Record<string, object>): ProviderNamespace {
  return {
    name,
    modules: Object.entries(modules).map(([moduleName, exports]) => ({ name: moduleName, exports })),
  }
}
