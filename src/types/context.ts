/**
 * Context Types
 *
 * Two contexts flow through the system:
 * - ServiceContext: process-wide, handed to provider initializers at startup
 * - RequestContext: per request, carries the raw request data and the frozen
 *   component registry
 *
 * Both are immutable - to modify, create a new derived context.
 */

import { randomUUID } from 'node:crypto'
import type { ComponentRegistry } from '../core/registry.js'
import type { ServiceConfig } from '../config/index.js'
import type { Logger } from '../utils/logger.js'
import { createLogger } from '../utils/logger.js'

// ─────────────────────────────────────────────────────────────────────────────
// Service (startup) context
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Service-wide context handed to provider initializers
 */
export interface ServiceContext {
  readonly config: ServiceConfig

  readonly logger: Logger

  /** Read-only view of the registry being populated (earlier providers) */
  readonly components: ComponentRegistry
}

/**
 * Handle on the process lifecycle, the event-loop ambient of providers
 */
export interface LoopHandle {
  /** Aborted when the registry shuts down */
  readonly signal: AbortSignal

  /** Register a hook to run at shutdown (reverse registration order) */
  defer(hook: () => void | Promise<void>): void
}

/**
 * Ambient handles a provider initializer may declare
 */
export interface Ambient {
  context: ServiceContext
  loop: LoopHandle
}

export type AmbientKey = keyof Ambient

// ─────────────────────────────────────────────────────────────────────────────
// Request context
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Plain mapping of one request-data source
 */
export type RequestData = Readonly<Record<string, unknown>>

/**
 * Uploaded file, as produced by a multipart body parser
 */
export interface UploadedFile {
  /** Original file name */
  name: string

  /** Declared media type (e.g. 'image/png') */
  type: string

  /** File contents */
  body: Uint8Array
}

/**
 * Request-data sources a validation adapter can read
 */
export type RequestSource = 'query' | 'form' | 'json' | 'files'

export const REQUEST_SOURCES: readonly RequestSource[] = ['query', 'form', 'json', 'files']

/**
 * Request context
 */
export interface RequestContext {
  /** Request correlation ID */
  readonly requestId: string

  readonly method: string

  /** Request path (without query string) */
  readonly path: string

  /** Path parameters bound by the router */
  readonly params: Readonly<Record<string, string>>

  /** Query parameters; every value is the list of occurrences */
  readonly query: RequestData

  /** Form body; every value is the list of occurrences */
  readonly form: RequestData

  /** Parsed JSON body */
  readonly json: RequestData

  /** Uploaded files by form field */
  readonly files: RequestData

  /** Frozen component registry */
  readonly components: ComponentRegistry

  /** Cancellation signal (native AbortSignal) */
  readonly signal: AbortSignal

  readonly logger: Logger
}

/**
 * Fields accepted by createRequestContext; everything but the registry is optional
 */
export interface RequestContextInit {
  components: ComponentRegistry
  requestId?: string
  method?: string
  path?: string
  params?: Record<string, string>
  query?: Record<string, unknown>
  form?: Record<string, unknown>
  json?: Record<string, unknown> | null
  files?: Record<string, unknown>
  signal?: AbortSignal
  logger?: Logger
}

const requestLogger = createLogger('request')

/**
 * Create a request context; absent data sources become empty documents
 */
export function createRequestContext(init: RequestContextInit): RequestContext {
  const requestId = init.requestId ?? randomUUID()

  return {
    requestId,
    method: init.method ?? 'GET',
    path: init.path ?? '/',
    params: { ...init.params },
    query: { ...init.query },
    form: { ...init.form },
    json: { ...(init.json ?? {}) },
    files: { ...init.files },
    components: init.components,
    signal: init.signal ?? new AbortController().signal,
    logger: init.logger ?? requestLogger.child({ requestId }),
  }
}

/**
 * Get a copy of one request-data source
 */
export function getRequestData(request: RequestContext, source: RequestSource): Record<string, unknown> {
  return { ...request[source] }
}

export function isUploadedFile(value: unknown): value is UploadedFile {
  if (!value || typeof value !== 'object') return false
  return (
    'name' in value &&
    typeof value.name === 'string' &&
    'type' in value &&
    typeof value.type === 'string' &&
    'body' in value &&
    value.body instanceof Uint8Array
  )
}
