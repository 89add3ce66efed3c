/**
 * Request Outcomes
 *
 * Maps handler results and failures to a status and a response body.
 *
 * - VALIDATION_ERROR → 400, the field error map as body
 * - NOT_FOUND → 404, `{ message, path }`
 * - other ServiceErrors → their status, `toJSON()` as body
 * - anything else → 500
 */

import { Errors, isServiceError } from '../errors/index.js'
import type { Handler, HandlerArgs, RequestContext } from '../types/index.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('outcome')

export interface Outcome<TBody = unknown> {
  status: number
  body: TBody
}

/**
 * Map a failure to an outcome
 */
export function toOutcome(error: unknown, request?: RequestContext): Outcome {
  const log = request?.logger ?? logger

  if (isServiceError(error, 'VALIDATION_ERROR')) {
    return { status: error.status, body: error.details ?? {} }
  }

  if (isServiceError(error, 'NOT_FOUND')) {
    return {
      status: error.status,
      body: { message: error.message, path: request?.path ?? null },
    }
  }

  if (isServiceError(error)) {
    if (error.status >= 500) {
      log.error({ err: error, code: error.code }, 'Request failed')
    }
    return { status: error.status, body: error.toJSON() }
  }

  log.error({ err: error }, 'Unhandled error')
  return { status: 500, body: Errors.internal().toJSON() }
}

/**
 * Invoke a handler and map its result or failure to an outcome
 */
export async function runHandler<TResult>(
  handler: Handler<TResult>,
  request: RequestContext,
  args: HandlerArgs = {}
): Promise<Outcome> {
  try {
    const body = await handler.invoke(request, args)
    return { status: 200, body }
  } catch (error) {
    return toOutcome(error, request)
  }
}
