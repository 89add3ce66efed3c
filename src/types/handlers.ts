/**
 * Handler Types
 */

import type { RequestContext } from './context.js'

/**
 * Named arguments a handler is invoked with (path parameters, injected
 * components, validated documents)
 */
export type HandlerArgs = Readonly<Record<string, unknown>>

/**
 * Handler body
 */
export type HandlerFunction<TResult = unknown> = (
  request: RequestContext,
  args: HandlerArgs
) => TResult | Promise<TResult>

/**
 * A handler together with its declared parameter names.
 *
 * Wrappers return a new Handler with the same name and params, so the
 * declaration stays visible through any number of stacked wrappers.
 */
export interface Handler<TResult = unknown> {
  readonly name: string

  /** Declared parameter names, used for injection and conditional adapters */
  readonly params: readonly string[]

  invoke(request: RequestContext, args?: HandlerArgs): Promise<TResult>
}

/**
 * Function that wraps a handler (injection, validation adapters)
 */
export type HandlerWrapper = <TResult>(handler: Handler<TResult>) => Handler<TResult>
