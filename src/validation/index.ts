/**
 * Validation Module
 *
 * Schema-driven normalization and validation of request data.
 *
 * @example
 * ```typescript
 * import { getDefaultEngine } from './validation/index.js'
 *
 * const result = await getDefaultEngine().validate(
 *   { owner: { type: 'object_id', coerce: 'object_id', required: true } },
 *   { owner: '5f1d7c2e9b1e8a3d4c5b6a79' }
 * )
 * ```
 */

export type {
  CheckContext,
  Coercion,
  CoercionOptions,
  CompiledSchema,
  DefaultSetter,
  Document,
  ExistenceRule,
  ExistenceTarget,
  FieldCheck,
  FieldErrors,
  MalformedInputPolicy,
  RuleCheck,
  RuleSet,
  Schema,
  TypeDefinition,
  ValidateOptions,
  ValidationResult,
} from './types.js'

export { createValidationEngine } from './engine.js'
export type { ValidationEngine, ValidationEngineOptions } from './engine.js'
export { createDefaultEngine, getDefaultEngine } from './default-engine.js'

export {
  CoercionError,
  isTruthy,
  coerceJson,
  coerceFirst,
  coerceObjectId,
  coerceEmptyOrObjectId,
  coerceBoolean,
  coerceInteger,
  coerceFloat,
  BUILTIN_COERCIONS,
} from './coercions.js'

export { arrayWrap, timestamp, BUILTIN_DEFAULT_SETTERS } from './default-setters.js'
export { isRecord, BUILTIN_TYPES } from './type-definitions.js'

export {
  DOCUMENT_EXISTS,
  isDocumentExists,
  ExistenceRuleSchema,
  AllowListSchema,
  checkExistence,
  allowedPath,
  allowedContentType,
  ipAddress,
} from './checks.js'
export type { DocumentExists } from './checks.js'
