/**
 * Error Module
 *
 * Error class, factories and error code definitions.
 */

export { Errors, type FieldErrors } from './factories.js'

export {
  ErrorCodes,
  type ErrorCode,
  type ErrorCodeDef,
  getErrorCode,
  getStatusForCode,
  isClientError,
  isServerError,
} from './codes.js'

export { ServiceError, isServiceError } from './service-error.js'
