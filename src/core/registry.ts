/**
 * Registry - Component Registration
 *
 * Holds named singleton components. The registry moves through three phases:
 *
 * - startup: providers are initialized one at a time, in declared order
 * - serving: after freeze(), the registry is read-only and shared by requests
 * - closed: after shutdown(), teardown hooks have run and the registry is empty
 *
 * The handle type follows the phase: RegistryBuilder during startup,
 * FrozenRegistry afterwards.
 */

import type { Ambient, AmbientKey, LoopHandle, ServiceContext } from '../types/index.js'
import type { ServiceConfig, DuplicatePolicy } from '../config/index.js'
import { defineConfig } from '../config/index.js'
import { Errors, isServiceError } from '../errors/index.js'
import { createLogger, type Logger } from '../utils/logger.js'
import type { ProviderDeclaration, ProviderModule, ProviderNamespace } from './providers.js'
import { isProviderDeclaration } from './providers.js'

export type RegistryPhase = 'startup' | 'serving' | 'closed'

/**
 * Read-only registry interface
 */
export interface ComponentRegistry {
  /**
   * Get a component by name
   *
   * @throws ServiceError COMPONENT_MISSING when nothing is registered under the name
   */
  get(name: string): unknown

  /**
   * Get a component and check its shape
   *
   * @throws ServiceError COMPONENT_MISSING, or INTERNAL_ERROR when the guard rejects it
   */
  resolve<T>(name: string, guard: (value: unknown) => value is T): T

  /** Check if a component is registered */
  exists(name: string): boolean

  /** Registered names, in registration order */
  names(): string[]
}

/**
 * Registry handle during the startup phase
 */
export interface RegistryBuilder extends ComponentRegistry {
  readonly phase: RegistryPhase

  /** Initialize a provider and store its component */
  register<T>(declaration: ProviderDeclaration<T, AmbientKey>): Promise<T>

  /** Register every declaration exported by one module */
  registerModule(module: ProviderModule): Promise<void>

  /** Register every declaration of every module of a namespace, in order */
  registerBulk(namespace: ProviderNamespace): Promise<void>

  /** Store an already-built component */
  registerInstance(name: string, instance: unknown): void

  /** End the startup phase */
  freeze(): FrozenRegistry
}

/**
 * Registry handle during the serving phase
 */
export interface FrozenRegistry extends ComponentRegistry {
  readonly phase: RegistryPhase

  /** Run teardown hooks and discard every component */
  shutdown(): Promise<void>
}

/**
 * Registry creation options
 */
export interface RegistryOptions {
  /** Configuration handed to providers through the service context */
  config?: ServiceConfig

  /** What a second registration under an existing name does (default from config) */
  duplicates?: DuplicatePolicy

  logger?: Logger
}

type TeardownHook = {
  name: string
  run: () => void | Promise<void>
}

/**
 * Create a new registry in its startup phase
 */
export function createComponentRegistry(options: RegistryOptions = {}): RegistryBuilder {
  const config = options.config ?? defineConfig()
  const duplicates = options.duplicates ?? config.registry.duplicates
  const logger = options.logger ?? createLogger('registry')

  const components = new Map<string, unknown>()
  const teardown: TeardownHook[] = []
  const shutdownController = new AbortController()
  let phase: RegistryPhase = 'startup'

  function assertStartup(operation: string): void {
    if (phase !== 'startup') {
      throw Errors.preconditionFailed(`Cannot ${operation}: registry is ${phase === 'serving' ? 'frozen' : 'closed'}`)
    }
  }

  function assertUnique(name: string): void {
    if (duplicates === 'error' && components.has(name)) {
      throw Errors.preconditionFailed(`Component '${name}' is already registered`)
    }
  }

  function store(name: string, instance: unknown): void {
    assertUnique(name)
    if (components.has(name)) {
      logger.warn({ name }, 'Overwriting registered component')
      // Re-insert so names() reflects the latest registration
      components.delete(name)
    }
    components.set(name, instance)
  }

  const view: ComponentRegistry = {
    get(name: string): unknown {
      logger.trace({ name }, 'Get component')
      if (!components.has(name)) {
        throw Errors.componentMissing(name)
      }
      return components.get(name)
    },

    resolve<T>(name: string, guard: (value: unknown) => value is T): T {
      const value = view.get(name)
      if (!guard(value)) {
        throw Errors.internal(`Component '${name}' does not have the expected shape`, { name })
      }
      return value
    },

    exists(name: string): boolean {
      return components.has(name)
    },

    names(): string[] {
      return Array.from(components.keys())
    },
  }

  const serviceContext: ServiceContext = {
    config,
    logger,
    components: view,
  }

  function loopFor(name: string): LoopHandle {
    return {
      signal: shutdownController.signal,
      defer(hook) {
        teardown.push({ name, run: hook })
      },
    }
  }

  /**
   * Ambient object exposing only the handles the declaration asked for.
   * Reading an undeclared handle fails instead of silently supplying it.
   */
  function ambientFor(declaration: ProviderDeclaration<unknown>): Ambient {
    const allowed = new Set<string>(declaration.inject)
    const loop = loopFor(declaration.name)
    const deny = (key: string): never => {
      throw Errors.internal(`Provider '${declaration.name}' did not declare the '${key}' ambient`)
    }

    return {
      get context() {
        return allowed.has('context') ? serviceContext : deny('context')
      },
      get loop() {
        return allowed.has('loop') ? loop : deny('loop')
      },
    }
  }

  async function runTeardown(hooks: TeardownHook[]): Promise<void> {
    for (const hook of [...hooks].reverse()) {
      try {
        await hook.run()
        logger.debug({ name: hook.name }, 'Component shut down')
      } catch (err) {
        logger.error({ err, name: hook.name }, 'Error shutting down component')
      }
    }
  }

  async function register<T>(declaration: ProviderDeclaration<T, AmbientKey>): Promise<T> {
    assertStartup(`register '${declaration.name}'`)
    // Fail before the initializer acquires anything
    assertUnique(declaration.name)

    let instance: T
    try {
      instance = await declaration.initializer(ambientFor(declaration))
    } catch (err) {
      logger.error({ err, name: declaration.name }, 'Failed to initialize provider')
      throw Errors.startupFailed(declaration.name, err)
    }

    store(declaration.name, instance)
    if (declaration.onShutdown) {
      const onShutdown = declaration.onShutdown.bind(declaration)
      teardown.push({ name: declaration.name, run: () => onShutdown(instance) })
    }
    logger.debug({ name: declaration.name }, 'Provider initialized')

    return instance
  }

  async function registerModule(module: ProviderModule): Promise<void> {
    for (const [exportName, value] of Object.entries(module.exports)) {
      if (!isProviderDeclaration(value)) continue
      logger.debug({ module: module.name, export: exportName, name: value.name }, 'Register component')
      await register(value)
    }
  }

  return {
    ...view,

    get phase() {
      return phase
    },

    register,

    registerModule,

    async registerBulk(namespace: ProviderNamespace): Promise<void> {
      assertStartup(`register namespace '${namespace.name}'`)
      logger.debug({ namespace: namespace.name, modules: namespace.modules.length }, 'Register namespace')

      const snapshot = new Map(components)
      const teardownMark = teardown.length

      try {
        for (const module of namespace.modules) {
          await registerModule(module)
        }
      } catch (err) {
        // Nothing from a failed bulk stays registered
        await runTeardown(teardown.splice(teardownMark))
        components.clear()
        for (const [name, instance] of snapshot) {
          components.set(name, instance)
        }
        if (isServiceError(err)) throw err
        throw Errors.internal(`Registering namespace '${namespace.name}' failed`, { cause: err })
      }
    },

    registerInstance(name: string, instance: unknown): void {
      assertStartup(`register '${name}'`)
      store(name, instance)
      logger.debug({ name }, 'Register component')
    },

    freeze(): FrozenRegistry {
      assertStartup('freeze')
      phase = 'serving'
      logger.debug({ components: components.size }, 'Registry frozen')

      return {
        ...view,

        get phase() {
          return phase
        },

        async shutdown(): Promise<void> {
          if (phase === 'closed') return
          phase = 'closed'
          shutdownController.abort()
          await runTeardown(teardown.splice(0))
          components.clear()
          logger.debug('Registry closed')
        },
      }
    },
  }
}

/**
 * Get a component through a request context
 */
export function getComponent(request: { readonly components: ComponentRegistry }, name: string): unknown {
  return request.components.get(name)
}
