import { getStatusForCode } from './codes.js'

/**
 * Error carrying a string code and an HTTP-compatible status.
 *
 * Every failure raised by the registry, the validation engine and the
 * adapters is a ServiceError; the outcome mapping turns it into a response.
 */
export class ServiceError extends Error {
  /**
   * Numeric status code (HTTP-compatible)
   *
   * - 400-499: Client errors
   * - 500-599: Server errors
   */
  public readonly status: number

  constructor(
    /** String error code (e.g., 'NOT_FOUND', 'VALIDATION_ERROR') */
    public readonly code: string,
    message: string,
    public readonly details?: unknown,
    /** Optional explicit status override */
    status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'ServiceError'
    this.status = status ?? getStatusForCode(code)
  }

  /**
   * Convert to plain object for serialization
   */
  toJSON(): { code: string; status: number; message: string; details?: unknown } {
    return {
      code: this.code,
      status: this.status,
      message: this.message,
      ...(this.details !== undefined && { details: this.details }),
    }
  }
}

export function isServiceError(error: unknown, code?: string): error is ServiceError {
  return error instanceof ServiceError && (code === undefined || error.code === code)
}
