/**
 * Injection Middleware
 *
 * Supplies registered components to a handler by declared parameter name.
 */

import type { Handler, HandlerArgs, RequestContext } from '../types/index.js'
import { wrapHandler } from './handler.js'

/**
 * Resolve the injectable arguments of a handler for one request.
 *
 * Arguments the caller passed explicitly are never replaced. Parameters
 * missing from the registry are left for other argument sources.
 */
export function resolveInjections(
  params: readonly string[],
  request: RequestContext,
  args: HandlerArgs
): HandlerArgs {
  const resolved: Record<string, unknown> = { ...args }

  for (const name of params) {
    if (Object.hasOwn(args, name)) continue
    if (!request.components.exists(name)) continue
    resolved[name] = request.components.get(name)
  }

  return resolved
}

/**
 * Wrap a handler so its declared parameters are filled from the registry
 *
 * @example
 * ```typescript
 * const listUsers = inject(defineHandler('users.list', ['db'], async (request, { db }) => ...))
 * ```
 */
export function inject<TResult>(handler: Handler<TResult>): Handler<TResult> {
  return wrapHandler(handler, (request, args) =>
    handler.invoke(request, resolveInjections(handler.params, request, args))
  )
}
