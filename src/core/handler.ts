/**
 * Handler Definition
 *
 * Handlers declare their parameter names explicitly; injection and the
 * validation adapters read the declaration instead of inspecting the function.
 *
 * @example
 * ```typescript
 * const getUser = defineHandler('users.get', ['users', 'id'], async (request, { users, id }) => {
 *   ...
 * })
 *
 * const handler = applyWrappers(getUser, inject, validatePath(userPathSchema))
 * const result = await handler.invoke(request, { id: '5f1d7a3e9c1b2a0012345678' })
 * ```
 */

import type { Handler, HandlerArgs, HandlerFunction, HandlerWrapper, RequestContext } from '../types/index.js'

/**
 * Create a handler from a function and its declared parameters
 */
export function defineHandler<TResult>(
  name: string,
  params: readonly string[],
  fn: HandlerFunction<TResult>
): Handler<TResult> {
  const declared = Object.freeze([...params])

  return {
    name,
    params: declared,
    async invoke(request: RequestContext, args: HandlerArgs = {}): Promise<TResult> {
      return fn(request, args)
    },
  }
}

/**
 * Wrap a handler, keeping its name and declared parameters
 */
export function wrapHandler<TResult>(
  handler: Handler<TResult>,
  invoke: (request: RequestContext, args: HandlerArgs) => Promise<TResult>
): Handler<TResult> {
  return {
    name: handler.name,
    params: handler.params,
    invoke(request: RequestContext, args: HandlerArgs = {}): Promise<TResult> {
      return invoke(request, args)
    },
  }
}

/**
 * Stack wrappers around a handler (left-to-right execution order)
 *
 * The first wrapper in the list is the outermost (runs first), matching the
 * reading order of stacked decorators.
 */
export function applyWrappers<TResult>(handler: Handler<TResult>, ...wrappers: HandlerWrapper[]): Handler<TResult> {
  let wrapped = handler

  for (let i = wrappers.length - 1; i >= 0; i--) {
    wrapped = wrappers[i](wrapped)
  }

  return wrapped
}
