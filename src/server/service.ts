/**
 * Service Lifecycle
 *
 * Builds the component registry at startup, serves requests against the
 * frozen registry and tears it down on shutdown.
 *
 * @example
 * ```typescript
 * const service = await startService({ namespaces: [providers] })
 *
 * const outcome = await service.handle(listPosts, { path: '/posts', query: { limit: ['10'] } })
 *
 * await service.shutdown()
 * ```
 */

import { loadConfig, type ServiceConfig } from '../config/index.js'
import { loadProviderNamespace } from '../core/discovery.js'
import type { ProviderNamespace } from '../core/providers.js'
import { createComponentRegistry, type FrozenRegistry } from '../core/registry.js'
import { runHandler, type Outcome } from '../http/outcome.js'
import { createRequestContext } from '../types/index.js'
import type { Handler, HandlerArgs, RequestContext, RequestContextInit } from '../types/index.js'
import { createLogger, type Logger } from '../utils/logger.js'

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface ServiceOptions {
  /** Configuration (default: loaded from the environment) */
  config?: ServiceConfig

  /** Provider namespaces, registered in order */
  namespaces?: readonly ProviderNamespace[]

  /** Prebuilt components, registered before any namespace */
  instances?: Readonly<Record<string, unknown>>

  logger?: Logger
}

/**
 * Request fields a caller supplies; the registry comes from the service
 */
export type ServiceRequestInit = Omit<RequestContextInit, 'components'>

export interface Service {
  readonly config: ServiceConfig

  /** Frozen registry shared by every request */
  readonly components: FrozenRegistry

  createRequest(init?: ServiceRequestInit): RequestContext

  /** Run a handler for one request and map the result to an outcome */
  handle<TResult>(handler: Handler<TResult>, init?: ServiceRequestInit, args?: HandlerArgs): Promise<Outcome>

  shutdown(): Promise<void>
}

// ─────────────────────────────────────────────────────────────────────────────
// Startup
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Register every provider and freeze the registry.
 *
 * A provider failure aborts startup: whatever was registered is shut down
 * and the STARTUP_FAILED error propagates.
 */
export async function startService(options: ServiceOptions = {}): Promise<Service> {
  const config = options.config ?? loadConfig()
  const logger = options.logger ?? createLogger('service')
  const builder = createComponentRegistry({ config, logger: options.logger?.child({ component: 'registry' }) })

  const namespaces = [...(options.namespaces ?? [])]

  try {
    for (const [name, instance] of Object.entries(options.instances ?? {})) {
      builder.registerInstance(name, instance)
    }

    if (config.registry.providersDir) {
      namespaces.push(await loadProviderNamespace({ rootDir: config.registry.providersDir }))
    }

    for (const namespace of namespaces) {
      await builder.registerBulk(namespace)
    }
  } catch (err) {
    logger.error({ err }, 'Service startup failed')
    await builder.freeze().shutdown()
    throw err
  }

  const components = builder.freeze()
  logger.info({ components: components.names() }, 'Service started')

  const createRequest = (init: ServiceRequestInit = {}): RequestContext => createRequestContext({ ...init, components })

  return {
    config,
    components,
    createRequest,

    handle(handler, init, args) {
      return runHandler(handler, createRequest(init), args)
    },

    async shutdown() {
      if (components.phase === 'closed') return
      await components.shutdown()
      logger.info('Service stopped')
    },
  }
}
