/**
 * Validation Types
 *
 * Schemas map field names to rule sets. The engine holds the lookup tables
 * (types, coercions, default setters, rules, field checks) those rule sets
 * refer to by name.
 */

import type { ComponentRegistry } from '../core/registry.js'
import type { FieldErrors } from '../errors/index.js'
import type { RequestContext } from '../types/index.js'

export type { FieldErrors }

/**
 * Document being validated (one level of nesting)
 */
export type Document = Record<string, unknown>

/**
 * Collection the existence check looks in, with the message for misses
 */
export interface ExistenceTarget {
  /** Collection name handed to the `document_exists` component */
  name: string

  /** Field error when the value does not exist */
  notFound: string
}

/**
 * Argument of the `checkExistence` rule
 *
 * @example
 * ```typescript
 * checkExistence: {
 *   name: 'kind',      // with lookup: the sibling field holding the map key
 *   lookup: true,
 *   map: {
 *     profiles: { name: 'profiles', notFound: 'User not found' },
 *     teams: { name: 'teams', notFound: 'Team not found' },
 *   },
 * }
 * ```
 */
export interface ExistenceRule {
  /** Map key, or with `lookup` the name of the field whose value is the key */
  name: string

  lookup?: boolean

  map: Readonly<Record<string, ExistenceTarget>>
}

/**
 * Rules for one field. Custom rules registered on an engine are added to
 * this interface through declaration merging.
 */
export interface RuleSet {
  /** Type name(s); the value must match one of them */
  type?: string | readonly string[]

  required?: boolean

  nullable?: boolean

  /** Value used when the field is missing (deep-copied per document) */
  default?: unknown

  /** Named default setter used when the field is missing */
  defaultSetter?: string

  /** Named coercion, or a chain applied left to right */
  coerce?: string | readonly string[]

  /** Allow-list of values (every element, for lists) */
  allowed?: readonly unknown[]

  /** Named field check(s), run in order */
  checkWith?: string | readonly string[]

  /** Rules for the keys of a dict value */
  schema?: Schema

  /** Keep keys of a dict value that its `schema` does not list */
  allowUnknown?: boolean

  /** Ask the `document_exists` component whether the value exists */
  checkExistence?: ExistenceRule

  /** Value must be one of these path segments, or the request is a 404 */
  allowedPath?: string | readonly string[]

  /** Media type of an uploaded file must be one of these */
  allowedContentType?: string | readonly string[]
}

export type Schema = Readonly<Record<string, RuleSet>>

export type ValidationResult =
  | { valid: true; document: Document }
  | { valid: false; errors: FieldErrors }

/**
 * Per-invocation options
 */
export interface ValidateOptions {
  /** Purge top-level fields the schema does not list (otherwise kept) */
  strict?: boolean

  /** Current request (used by request-aware checks) */
  request?: RequestContext

  /** Registry consulted by checks (default: the request's registry) */
  components?: ComponentRegistry
}

/**
 * What a check sees while validating one field
 */
export interface CheckContext {
  /** Field path ('owner' or 'address.city') */
  readonly field: string

  /** Normalized document at the field's level */
  readonly document: Readonly<Document>

  readonly request?: RequestContext

  readonly components?: ComponentRegistry

  /** Record an error for this field (the first one is reported) */
  error(message: string): void

  /** Value of a sibling field in the normalized document */
  lookup(name: string): unknown
}

export type TypeDefinition = (value: unknown) => boolean

export type Coercion = (value: unknown) => unknown

export interface CoercionOptions {
  /** On failure keep the value unchanged instead of failing the field */
  tolerant?: boolean
}

export type DefaultSetter = (document: Readonly<Document>) => unknown

/**
 * Named check referenced through `checkWith`
 */
export type FieldCheck = (ctx: CheckContext, value: unknown) => void | Promise<void>

/**
 * Rule with an argument (`checkExistence: {...}`)
 */
export type RuleCheck<A> = (ctx: CheckContext, value: unknown, argument: A) => void | Promise<void>

/**
 * What the engine does with MALFORMED_INPUT raised by a coercion
 *
 * - 'field-error': report the field like any other coercion failure
 * - 'throw': let the error reach the caller (500)
 */
export type MalformedInputPolicy = 'field-error' | 'throw'

/**
 * Schema compiled against an engine's tables
 */
export interface CompiledSchema {
  readonly schema: Schema

  validate(document: Readonly<Document>, options?: ValidateOptions): Promise<ValidationResult>
}
