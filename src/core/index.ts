/**
 * Core Module
 *
 * Component registry, provider declarations, discovery, handlers and injection.
 */

export {
  createComponentRegistry,
  getComponent,
  type ComponentRegistry,
  type RegistryBuilder,
  type FrozenRegistry,
  type RegistryOptions,
  type RegistryPhase,
} from './registry.js'

export {
  defineProvider,
  isProviderDeclaration,
  createProviderNamespace,
  type ProviderDeclaration,
  type ProviderOptions,
  type ProviderModule,
  type ProviderNamespace,
} from './providers.js'

export { loadProviderNamespace, type ProviderLoaderOptions } from './discovery.js'

export { defineHandler, wrapHandler, applyWrappers } from './handler.js'

export { inject, resolveInjections } from './inject.js'
