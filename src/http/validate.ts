/**
 * Validation Adapters
 *
 * Handler wrappers that run the validation engine before the handler. They
 * differ only in how the normalized document reaches the handler:
 *
 * - validatePath: replaces the bound arguments
 * - validateRequest: adds the document to the `validated` argument
 * - validateArgument: passes the document as the argument named after the
 *   source, when the handler declares one
 *
 * A failed validation throws VALIDATION_ERROR with the field error map; the
 * outcome mapping turns it into a 400.
 *
 * @example
 * const createPost = applyWrappers(
 *   defineHandler('posts.create', ['db', 'validated'], async (request, args) => {
 *     const { json } = readValidated(args)
 *     ...
 *   }),
 *   inject,
 *   validateRequest(postBodySchema, 'json'),
 *   validateRequest(postQuerySchema, 'query')
 * )
 */

import { Errors } from '../errors/index.js'
import { wrapHandler } from '../core/handler.js'
import type { Handler, HandlerArgs, HandlerWrapper, RequestContext, RequestSource } from '../types/index.js'
import { getRequestData, REQUEST_SOURCES } from '../types/index.js'
import { getDefaultEngine } from '../validation/default-engine.js'
import type { ValidationEngine } from '../validation/engine.js'
import { isRecord } from '../validation/type-definitions.js'
import type { CompiledSchema, Document, Schema } from '../validation/types.js'

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Argument name of the accumulated request-data documents
 */
export const VALIDATED_ARG = 'validated'

/**
 * Normalized documents by source, built up by stacked validateRequest wrappers
 */
export type ValidatedData = Readonly<Partial<Record<RequestSource, Document>>>

export interface AdapterOptions {
  /** Engine the schema is compiled against (default: the shared default engine) */
  engine?: ValidationEngine
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Read the `validated` argument
 */
export function readValidated(args: HandlerArgs): ValidatedData {
  const value = args[VALIDATED_ARG]
  if (!isRecord(value)) return {}

  const validated: Partial<Record<RequestSource, Document>> = {}
  for (const source of REQUEST_SOURCES) {
    const document = value[source]
    if (isRecord(document)) {
      validated[source] = document
    }
  }
  return validated
}

async function run(
  compiled: CompiledSchema,
  request: RequestContext,
  document: Readonly<Document>,
  strict: boolean
): Promise<Document> {
  const result = await compiled.validate(document, { strict, request })
  if (!result.valid) {
    request.logger.debug({ errors: result.errors }, 'Request validation failed')
    throw Errors.validation(result.errors)
  }
  return result.document
}

// ─────────────────────────────────────────────────────────────────────────────
// Adapters
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Validate the handler's bound arguments and replace them with the
 * normalized document. Unknown arguments pass through.
 *
 * @example
 * const getUser = applyWrappers(
 *   defineHandler('users.get', ['id'], (request, { id }) => ...),
 *   validatePath({ id: { type: 'object_id', coerce: 'object_id', required: true } })
 * )
 */
export function validatePath(schema: Schema, options: AdapterOptions = {}): HandlerWrapper {
  const compiled = (options.engine ?? getDefaultEngine()).compile(schema)

  return <TResult>(handler: Handler<TResult>): Handler<TResult> =>
    wrapHandler(handler, async (request, args) => {
      const document = await run(compiled, request, args, false)
      return handler.invoke(request, document)
    })
}

/**
 * Validate one request-data source and add it to the `validated` argument.
 * Stacked wrappers each add their own source.
 */
export function validateRequest(schema: Schema, source: RequestSource, options: AdapterOptions = {}): HandlerWrapper {
  const compiled = (options.engine ?? getDefaultEngine()).compile(schema)

  return <TResult>(handler: Handler<TResult>): Handler<TResult> =>
    wrapHandler(handler, async (request, args) => {
      const document = await run(compiled, request, getRequestData(request, source), true)
      const validated: ValidatedData = { ...readValidated(args), [source]: document }
      return handler.invoke(request, { ...args, [VALIDATED_ARG]: validated })
    })
}

/**
 * Validate one request-data source and pass it as the argument named after
 * the source. A handler without such a parameter still gets the validation
 * (and its side effects) but not the document.
 */
export function validateArgument(schema: Schema, source: RequestSource, options: AdapterOptions = {}): HandlerWrapper {
  const compiled = (options.engine ?? getDefaultEngine()).compile(schema)

  return <TResult>(handler: Handler<TResult>): Handler<TResult> => {
    const accepts = handler.params.includes(source)

    return wrapHandler(handler, async (request, args) => {
      const document = await run(compiled, request, getRequestData(request, source), true)
      return handler.invoke(request, accepts ? { ...args, [source]: document } : args)
    })
  }
}
