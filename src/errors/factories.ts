/**
 * Error Factories
 *
 * Pre-built helpers for every failure in the error taxonomy.
 * Each factory creates a ServiceError with both string code and numeric status.
 */

import { ServiceError } from './service-error.js'

/**
 * Field name → first error message for that field
 */
export type FieldErrors = Record<string, string>

/**
 * @example
 * ```typescript
 * throw Errors.componentMissing('document_exists')
 * // Creates: { code: 'COMPONENT_MISSING', status: 500, message: "Component 'document_exists' is not registered" }
 *
 * throw Errors.validation({ email: 'required field' })
 * // Creates: { code: 'VALIDATION_ERROR', status: 400, details: { email: 'required field' } }
 * ```
 */
export const Errors = {
  /**
   * Registry lookup for a name that was never registered
   * @param name - Component name
   */
  componentMissing(name: string): ServiceError {
    return new ServiceError('COMPONENT_MISSING', `Component '${name}' is not registered`, { name })
  },

  /**
   * A provider initializer failed; startup must abort
   * @param name - Provider name
   * @param cause - Original failure
   */
  startupFailed(name: string, cause: unknown): ServiceError {
    const reason = cause instanceof Error ? cause.message : String(cause)
    return new ServiceError(
      'STARTUP_FAILED',
      `Provider '${name}' failed to initialize: ${reason}`,
      { name },
      undefined,
      { cause }
    )
  },

  /**
   * Field-level validation failure. `details` is the field error map itself.
   * @param errors - Field name → message
   */
  validation(errors: FieldErrors): ServiceError {
    return new ServiceError('VALIDATION_ERROR', 'Validation failed', errors)
  },

  /**
   * Request-aborting not-found outcome
   * @param path - Request path, when a request is available
   */
  urlNotFound(path?: string): ServiceError {
    const message = path ? `Requested URL ${path} not found` : 'Requested URL not found'
    return new ServiceError('NOT_FOUND', message, path ? { path } : undefined)
  },

  /**
   * Syntactically invalid coercion input
   * @param reason - What was wrong
   * @param value - Offending value
   */
  malformedInput(reason: string, value?: unknown): ServiceError {
    return new ServiceError('MALFORMED_INPUT', reason, { value })
  },

  /**
   * Schema definition error (unknown rule, bad argument)
   * @param field - Field whose rule set is broken
   * @param reason - What is wrong with it
   */
  invalidSchema(field: string, reason: string): ServiceError {
    return new ServiceError('INVALID_SCHEMA', `Invalid rule set for '${field}': ${reason}`, {
      field,
      reason,
    })
  },

  /**
   * Operation attempted in the wrong lifecycle phase
   * @param condition - What condition was not met
   */
  preconditionFailed(condition: string): ServiceError {
    return new ServiceError('FAILED_PRECONDITION', condition)
  },

  /**
   * Bad argument (e.g. invalid configuration)
   * @param message - What was wrong
   * @param details - Optional details
   */
  badRequest(message: string, details?: unknown): ServiceError {
    return new ServiceError('INVALID_ARGUMENT', message, details)
  },

  /**
   * Internal server error
   * @param message - Error message
   * @param details - Optional additional details
   */
  internal(message?: string, details?: unknown): ServiceError {
    return new ServiceError('INTERNAL_ERROR', message || 'An internal error occurred', details)
  },
} as const
