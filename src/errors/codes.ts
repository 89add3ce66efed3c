/**
 * Error Codes
 *
 * Central definition of every error code with a string identifier and a
 * numeric status. Statuses follow HTTP semantics so the outcome mapping can
 * use them directly.
 *
 * Status Code Ranges:
 * - 400-499: Client errors (bad input, missing route)
 * - 500-599: Server errors (missing components, startup, bad schemas)
 */

/**
 * Error code definition with string identifier and numeric status
 */
export interface ErrorCodeDef {
  /** String identifier (e.g., 'NOT_FOUND') */
  code: string
  /** Numeric status code (e.g., 404) */
  status: number
  /** Default message */
  message: string
}

export const ErrorCodes = {
  // ─────────────────────────────────────────────────────────────
  // 4xx - Client Errors
  // ─────────────────────────────────────────────────────────────

  /** Invalid argument provided (also used for bad configuration) */
  INVALID_ARGUMENT: {
    code: 'INVALID_ARGUMENT',
    status: 400,
    message: 'Invalid argument',
  },

  /** One or more request fields failed validation */
  VALIDATION_ERROR: {
    code: 'VALIDATION_ERROR',
    status: 400,
    message: 'Validation failed',
  },

  /** Requested URL does not exist */
  NOT_FOUND: {
    code: 'NOT_FOUND',
    status: 404,
    message: 'Not found',
  },

  /** Operation not allowed in the current lifecycle phase */
  FAILED_PRECONDITION: {
    code: 'FAILED_PRECONDITION',
    status: 412,
    message: 'Precondition failed',
  },

  // ─────────────────────────────────────────────────────────────
  // 5xx - Server Errors
  // ─────────────────────────────────────────────────────────────

  /** A handler or check asked for a component nobody registered */
  COMPONENT_MISSING: {
    code: 'COMPONENT_MISSING',
    status: 500,
    message: 'Component missing',
  },

  /** A provider initializer failed during startup */
  STARTUP_FAILED: {
    code: 'STARTUP_FAILED',
    status: 500,
    message: 'Startup failed',
  },

  /**
   * A coercion was handed syntactically invalid input
   *
   * Only surfaces when the engine runs with `malformedInput: 'throw'`.
   */
  MALFORMED_INPUT: {
    code: 'MALFORMED_INPUT',
    status: 500,
    message: 'Malformed input',
  },

  /** A validation schema references unknown rules or bad rule arguments */
  INVALID_SCHEMA: {
    code: 'INVALID_SCHEMA',
    status: 500,
    message: 'Invalid schema',
  },

  /** Internal server error */
  INTERNAL_ERROR: {
    code: 'INTERNAL_ERROR',
    status: 500,
    message: 'Internal error',
  },

  /** Unknown error */
  UNKNOWN: {
    code: 'UNKNOWN',
    status: 500,
    message: 'Unknown error',
  },
} as const satisfies Record<string, ErrorCodeDef>

/**
 * Error code type (string union)
 */
export type ErrorCode = keyof typeof ErrorCodes

function isKnownCode(code: string): code is ErrorCode {
  return Object.prototype.hasOwnProperty.call(ErrorCodes, code)
}

/**
 * Get error code definition by string code
 */
export function getErrorCode(code: string): ErrorCodeDef {
  if (isKnownCode(code)) {
    return ErrorCodes[code]
  }

  // Return unknown for unrecognized codes
  return {
    code,
    status: 500,
    message: code,
  }
}

/**
 * Get numeric status for a string code
 */
export function getStatusForCode(code: string): number {
  return getErrorCode(code).status
}

/**
 * Check if status code is a client error (4xx)
 */
export function isClientError(status: number): boolean {
  return status >= 400 && status < 500
}

/**
 * Check if status code is a server error (5xx)
 */
export function isServerError(status: number): boolean {
  return status >= 500 && status < 600
}
