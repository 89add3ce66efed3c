/**
 * Validation Engine
 *
 * Lookup tables for types, coercions, default setters, rules and field
 * checks, plus a compiler turning a Schema into a reusable CompiledSchema.
 *
 * Validation runs in two passes over the document:
 *
 * 1. normalize: defaults are filled in, coercions applied, nested dicts
 *    normalized and unknown keys purged or kept
 * 2. validate: required/nullable, type, nested schema, allow-list, then the
 *    custom checks in the order the rule set declares them
 *
 * Only the first error of each field is reported.
 *
 * @example
 * ```typescript
 * const engine = createDefaultEngine()
 *
 * const result = await engine.validate(
 *   { page: { type: 'integer', coerce: 'integer', default: '1' } },
 *   { page: '3' }
 * )
 * // { valid: true, document: { page: 3 } }
 * ```
 */

import { z } from 'zod'
import { Errors, isServiceError } from '../errors/index.js'
import type { FieldErrors } from '../errors/index.js'
import { createLogger } from '../utils/logger.js'
import { isRecord } from './type-definitions.js'
import type {
  CheckContext,
  Coercion,
  CoercionOptions,
  CompiledSchema,
  DefaultSetter,
  Document,
  FieldCheck,
  MalformedInputPolicy,
  RuleCheck,
  Schema,
  TypeDefinition,
  ValidateOptions,
  ValidationResult,
} from './types.js'

const logger = createLogger('validation')

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface ValidationEngineOptions {
  /** What to do with MALFORMED_INPUT raised by a coercion (default 'field-error') */
  malformedInput?: MalformedInputPolicy
}

export interface ValidationEngine {
  readonly malformedInput: MalformedInputPolicy

  /** Register a type usable in `type` */
  type(name: string, definition: TypeDefinition): ValidationEngine

  /** Register a coercion usable in `coerce` */
  coercion(name: string, coercion: Coercion, options?: CoercionOptions): ValidationEngine

  /** Register a default setter usable in `defaultSetter` */
  defaultSetter(name: string, setter: DefaultSetter): ValidationEngine

  /**
   * Register a rule taking an argument. The argument is parsed with `argument`
   * when a schema is compiled and the parsed value is handed to `check`.
   */
  rule<A>(name: string, argument: z.ZodType<A, z.ZodTypeDef, unknown>, check: RuleCheck<A>): ValidationEngine

  /** Register a field check usable in `checkWith` */
  check(name: string, check: FieldCheck): ValidationEngine

  /**
   * Compile a schema against the current tables
   *
   * @throws ServiceError INVALID_SCHEMA on unknown names or bad rule arguments
   */
  compile(schema: Schema): CompiledSchema

  /** Compile (cached) and validate */
  validate(schema: Schema, document: Readonly<Document>, options?: ValidateOptions): Promise<ValidationResult>
}

type BoundCheck = (ctx: CheckContext, value: unknown) => void | Promise<void>

type RuleBinder = (field: string, argument: unknown) => BoundCheck

interface RegisteredCoercion {
  name: string
  apply: Coercion
  tolerant: boolean
}

interface CompiledField {
  name: string
  typeLabel?: string
  typeChecks: TypeDefinition[]
  required: boolean
  nullable: boolean
  hasDefault: boolean
  defaultValue: unknown
  defaultSetter?: DefaultSetter
  coercions: RegisteredCoercion[]
  allowed?: readonly unknown[]
  nested?: CompiledLevel
  checks: BoundCheck[]
}

interface CompiledLevel {
  fields: CompiledField[]
  keepUnknown: boolean
}

// ─────────────────────────────────────────────────────────────────────────────
// Rule set parsing
// ─────────────────────────────────────────────────────────────────────────────

const NameListSchema = z
  .union([z.string().min(1), z.array(z.string().min(1))])
  .transform((value) => (typeof value === 'string' ? [value] : value))

const CoreRulesSchema = z.object({
  type: NameListSchema.optional(),
  required: z.boolean().optional(),
  nullable: z.boolean().optional(),
  default: z.unknown().optional(),
  defaultSetter: z.string().min(1).optional(),
  coerce: NameListSchema.optional(),
  allowed: z.array(z.unknown()).optional(),
  checkWith: NameListSchema.optional(),
  schema: z.record(z.unknown()).optional(),
  allowUnknown: z.boolean().optional(),
})

const CORE_RULES = new Set(Object.keys(CoreRulesSchema.shape))

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0]
  if (!issue) return 'invalid value'
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') return value
  if (value === undefined || typeof value === 'function' || typeof value === 'symbol') return String(value)
  try {
    return JSON.stringify(value) ?? String(value)
  } catch {
    return String(value)
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Engine
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Create an engine with empty tables
 */
export function createValidationEngine(options: ValidationEngineOptions = {}): ValidationEngine {
  const malformedInput = options.malformedInput ?? 'field-error'

  const types = new Map<string, TypeDefinition>()
  const coercions = new Map<string, RegisteredCoercion>()
  const defaultSetters = new Map<string, DefaultSetter>()
  const rules = new Map<string, RuleBinder>()
  const checks = new Map<string, FieldCheck>()

  let cache = new WeakMap<Schema, CompiledSchema>()

  function lookupName<T>(table: Map<string, T>, kind: string, field: string, name: string): T {
    const entry = table.get(name)
    if (entry === undefined) {
      throw Errors.invalidSchema(field, `unknown ${kind} '${name}'`)
    }
    return entry
  }

  function compileField(path: string, name: string, raw: unknown): CompiledField {
    if (!isRecord(raw)) {
      throw Errors.invalidSchema(path, 'rule set must be an object')
    }

    const parsed = CoreRulesSchema.safeParse(raw)
    if (!parsed.success) {
      throw Errors.invalidSchema(path, describeIssue(parsed.error))
    }
    const core = parsed.data

    const hasDefault = Object.hasOwn(raw, 'default')
    if (hasDefault && core.defaultSetter !== undefined) {
      throw Errors.invalidSchema(path, "'default' and 'defaultSetter' are exclusive")
    }

    const typeNames = core.type ?? []
    const field: CompiledField = {
      name,
      typeLabel: typeNames.length > 0 ? typeNames.join(' or ') : undefined,
      typeChecks: typeNames.map((typeName) => lookupName(types, 'type', path, typeName)),
      required: core.required ?? false,
      nullable: core.nullable ?? false,
      hasDefault,
      defaultValue: raw['default'],
      defaultSetter:
        core.defaultSetter === undefined
          ? undefined
          : lookupName(defaultSetters, 'default setter', path, core.defaultSetter),
      coercions: (core.coerce ?? []).map((coercionName) => lookupName(coercions, 'coercion', path, coercionName)),
      allowed: core.allowed,
      nested: core.schema === undefined ? undefined : compileLevel(core.schema, `${path}.`, core.allowUnknown ?? false),
      checks: [],
    }

    // Custom checks run in the order their keys appear in the rule set
    const entries: Array<[string, unknown]> = Object.entries(raw)
    for (const [key, argument] of entries) {
      if (key === 'checkWith') {
        for (const checkName of core.checkWith ?? []) {
          field.checks.push(lookupName(checks, 'check', path, checkName))
        }
        continue
      }
      if (CORE_RULES.has(key) || argument === undefined) continue

      const bind = rules.get(key)
      if (!bind) {
        throw Errors.invalidSchema(path, `unknown rule '${key}'`)
      }
      field.checks.push(bind(path, argument))
    }

    return field
  }

  function compileLevel(schema: Readonly<Record<string, unknown>>, prefix: string, keepUnknown: boolean): CompiledLevel {
    return {
      fields: Object.entries(schema).map(([name, ruleSet]) => compileField(`${prefix}${name}`, name, ruleSet)),
      keepUnknown,
    }
  }

  // ─── Pass 1: normalize ───

  function applyCoercions(
    field: CompiledField,
    path: string,
    value: unknown,
    errors: FieldErrors
  ): { ok: true; value: unknown } | { ok: false } {
    let current = value
    for (const coercion of field.coercions) {
      try {
        current = coercion.apply(current)
      } catch (err) {
        if (isServiceError(err) && (err.code !== 'MALFORMED_INPUT' || malformedInput === 'throw')) {
          throw err
        }
        if (coercion.tolerant) continue
        logger.debug({ field: path, coercion: coercion.name, err }, 'Coercion failed')
        errors[path] = field.typeLabel ? `must be of ${field.typeLabel} type` : 'cannot be coerced'
        return { ok: false }
      }
    }
    return { ok: true, value: current }
  }

  // Keys such as __proto__ must land as own data properties
  function setField(document: Document, key: string, value: unknown): void {
    Object.defineProperty(document, key, { value, writable: true, enumerable: true, configurable: true })
  }

  function readField(document: Readonly<Document>, key: string): unknown {
    return Object.hasOwn(document, key) ? document[key] : undefined
  }

  function normalizeLevel(
    level: CompiledLevel,
    input: Readonly<Document>,
    prefix: string,
    keepUnknown: boolean,
    errors: FieldErrors
  ): Document {
    const known = new Set(level.fields.map((field) => field.name))
    const output: Document = {}

    for (const [key, value] of Object.entries(input)) {
      if (keepUnknown || known.has(key)) {
        setField(output, key, value)
      }
    }

    for (const field of level.fields) {
      const path = `${prefix}${field.name}`
      const current = readField(output, field.name)
      const missing = current === undefined || (current === null && !field.nullable)

      if (missing && field.hasDefault) {
        setField(output, field.name, structuredClone(field.defaultValue))
      } else if (missing && field.defaultSetter) {
        setField(output, field.name, field.defaultSetter(output))
      }

      const value = readField(output, field.name)
      if (value === undefined || value === null) continue

      const coerced = applyCoercions(field, path, value, errors)
      if (!coerced.ok) continue
      setField(output, field.name, coerced.value)

      if (field.nested && isRecord(coerced.value)) {
        setField(output, field.name, normalizeLevel(field.nested, coerced.value, `${path}.`, field.nested.keepUnknown, errors))
      }
    }

    return output
  }

  // ─── Pass 2: validate ───

  async function validateLevel(
    level: CompiledLevel,
    document: Document,
    prefix: string,
    errors: FieldErrors,
    options: ValidateOptions
  ): Promise<void> {
    for (const field of level.fields) {
      const path = `${prefix}${field.name}`
      if (Object.hasOwn(errors, path)) continue

      const fail = (message: string): void => {
        if (!Object.hasOwn(errors, path)) {
          errors[path] = message
        }
      }

      const value = readField(document, field.name)
      if (value === undefined) {
        if (field.required) fail('required field')
        continue
      }
      if (value === null) {
        if (!field.nullable) fail('null value not allowed')
        continue
      }

      if (field.typeLabel && !field.typeChecks.some((matches) => matches(value))) {
        fail(`must be of ${field.typeLabel} type`)
        continue
      }

      if (field.nested && isRecord(value)) {
        await validateLevel(field.nested, value, `${path}.`, errors, options)
      }

      if (field.allowed) {
        const allowed = field.allowed
        const candidates = Array.isArray(value) ? value : [value]
        const unallowed = candidates.find((candidate) => !allowed.includes(candidate))
        if (unallowed !== undefined) {
          fail(`unallowed value ${formatValue(unallowed)}`)
        }
      }

      if (field.checks.length === 0) continue

      const ctx: CheckContext = {
        field: path,
        document,
        request: options.request,
        components: options.components ?? options.request?.components,
        error: fail,
        lookup: (name) => readField(document, name),
      }
      for (const check of field.checks) {
        // A cancelled request abandons its pending lookups
        options.request?.signal.throwIfAborted()
        await check(ctx, value)
      }
    }
  }

  function compile(schema: Schema): CompiledSchema {
    const cached = cache.get(schema)
    if (cached) return cached

    const root = compileLevel(schema, '', false)

    const compiled: CompiledSchema = {
      schema,

      async validate(document: Readonly<Document>, validateOptions: ValidateOptions = {}): Promise<ValidationResult> {
        const errors: FieldErrors = {}
        const normalized = normalizeLevel(root, document, '', !validateOptions.strict, errors)
        await validateLevel(root, normalized, '', errors, validateOptions)

        if (Object.keys(errors).length > 0) {
          logger.debug({ fields: Object.keys(errors) }, 'Validation failed')
          return { valid: false, errors }
        }
        return { valid: true, document: normalized }
      },
    }

    cache.set(schema, compiled)
    return compiled
  }

  // Tables changed: previously compiled schemas may resolve differently
  function invalidate(): void {
    cache = new WeakMap()
  }

  const engine: ValidationEngine = {
    malformedInput,

    type(name, definition) {
      types.set(name, definition)
      invalidate()
      return engine
    },

    coercion(name, coercion, coercionOptions = {}) {
      coercions.set(name, { name, apply: coercion, tolerant: coercionOptions.tolerant ?? false })
      invalidate()
      return engine
    },

    defaultSetter(name, setter) {
      defaultSetters.set(name, setter)
      invalidate()
      return engine
    },

    rule<A>(name: string, argument: z.ZodType<A, z.ZodTypeDef, unknown>, check: RuleCheck<A>) {
      if (CORE_RULES.has(name)) {
        throw Errors.invalidSchema(name, 'core rule cannot be redefined')
      }
      rules.set(name, (field, raw) => {
        const parsed = argument.safeParse(raw)
        if (!parsed.success) {
          throw Errors.invalidSchema(field, `${name}: ${describeIssue(parsed.error)}`)
        }
        const bound = parsed.data
        return (ctx, value) => check(ctx, value, bound)
      })
      invalidate()
      return engine
    },

    check(name, check) {
      checks.set(name, check)
      invalidate()
      return engine
    },

    compile,

    validate(schema, document, validateOptions) {
      return compile(schema).validate(document, validateOptions)
    },
  }

  return engine
}
