/**
 * Default Engine
 *
 * Engine preloaded with the built-in types, coercions, default setters and
 * checks.
 */

import {
  AllowListSchema,
  ExistenceRuleSchema,
  allowedContentType,
  allowedPath,
  checkExistence,
  ipAddress,
} from './checks.js'
import { BUILTIN_COERCIONS } from './coercions.js'
import { BUILTIN_DEFAULT_SETTERS } from './default-setters.js'
import { createValidationEngine, type ValidationEngine, type ValidationEngineOptions } from './engine.js'
import { BUILTIN_TYPES } from './type-definitions.js'

export function createDefaultEngine(options: ValidationEngineOptions = {}): ValidationEngine {
  const engine = createValidationEngine(options)

  for (const [name, definition] of Object.entries(BUILTIN_TYPES)) {
    engine.type(name, definition)
  }
  for (const [name, coercion] of Object.entries(BUILTIN_COERCIONS)) {
    engine.coercion(name, coercion)
  }
  for (const [name, setter] of Object.entries(BUILTIN_DEFAULT_SETTERS)) {
    engine.defaultSetter(name, setter)
  }

  return engine
    .rule('checkExistence', ExistenceRuleSchema, checkExistence)
    .rule('allowedPath', AllowListSchema, allowedPath)
    .rule('allowedContentType', AllowListSchema, allowedContentType)
    .check('ip_address', ipAddress)
}

let defaultEngine: ValidationEngine | null = null

/**
 * Shared engine used by the adapters when none is given
 */
export function getDefaultEngine(): ValidationEngine {
  if (!defaultEngine) {
    defaultEngine = createDefaultEngine()
  }
  return defaultEngine
}
