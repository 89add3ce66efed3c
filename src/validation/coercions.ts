/**
 * Built-in Coercions
 *
 * Pure transformations applied before type checking. A coercion that cannot
 * handle its input throws CoercionError; identifier parsing throws
 * MALFORMED_INPUT so the engine can apply its malformed-input policy.
 */

import { ObjectId } from 'mongodb'
import { Errors } from '../errors/index.js'

export class CoercionError extends Error {
  constructor(
    message: string,
    public readonly value: unknown
  ) {
    super(message)
    this.name = 'CoercionError'
  }
}

const OBJECT_ID_PATTERN = /^[0-9a-fA-F]{24}$/
const INTEGER_PATTERN = /^[+-]?\d+$/
const FLOAT_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/
const FLOAT_SPECIAL_PATTERN = /^([+-]?)(inf|infinity|nan)$/i

/**
 * Truthiness where empty collections, zero and null-likes are false
 */
export function isTruthy(value: unknown): boolean {
  if (value === null || value === undefined) return false
  if (typeof value === 'boolean') return value
  if (typeof value === 'number') return value !== 0
  if (typeof value === 'bigint') return value !== 0n
  if (typeof value === 'string' || Array.isArray(value)) return value.length > 0
  if (value instanceof Map || value instanceof Set) return value.size > 0
  if (typeof value === 'object' && Object.getPrototypeOf(value) === Object.prototype) {
    return Object.keys(value).length > 0
  }
  return true
}

function hasLength(value: unknown): value is string | unknown[] {
  return typeof value === 'string' || Array.isArray(value)
}

/** Parse a JSON string */
export function coerceJson(value: unknown): unknown {
  if (typeof value !== 'string') {
    throw new CoercionError('expected a JSON string', value)
  }
  try {
    return JSON.parse(value)
  } catch (err) {
    throw new CoercionError(`invalid JSON: ${err instanceof Error ? err.message : String(err)}`, value)
  }
}

/** First element of a list (or first character of a string) */
export function coerceFirst(value: unknown): unknown {
  if (!hasLength(value)) {
    throw new CoercionError('expected a list', value)
  }
  if (value.length === 0) {
    throw new CoercionError('list is empty', value)
  }
  return value[0]
}

/** Parse a 24-character hex string into an ObjectId */
export function coerceObjectId(value: unknown): ObjectId {
  if (value instanceof ObjectId) return value
  if (typeof value === 'string' && OBJECT_ID_PATTERN.test(value)) {
    return new ObjectId(value)
  }
  throw Errors.malformedInput(`'${String(value)}' is not a valid ObjectId`, value)
}

/** Like coerceObjectId, but empty strings and lists pass through */
export function coerceEmptyOrObjectId(value: unknown): unknown {
  if (hasLength(value) && value.length === 0) return value
  return coerceObjectId(value)
}

/** 'true'/'1' (any case) are true, other strings false; other values by truthiness */
export function coerceBoolean(value: unknown): boolean {
  if (typeof value === 'string') {
    const lowered = value.toLowerCase()
    return lowered === 'true' || lowered === '1'
  }
  return isTruthy(value)
}

/** Parse a base-10 integer; numbers are truncated toward zero */
export function coerceInteger(value: unknown): number {
  if (typeof value === 'boolean') return value ? 1 : 0
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new CoercionError(`cannot convert ${value} to integer`, value)
    }
    return Math.trunc(value)
  }
  if (typeof value === 'string') {
    const trimmed = value.trim()
    if (INTEGER_PATTERN.test(trimmed)) {
      const parsed = Number.parseInt(trimmed, 10)
      if (!Number.isSafeInteger(parsed)) {
        throw new CoercionError(`integer out of range: '${trimmed}'`, value)
      }
      return parsed
    }
  }
  throw new CoercionError(`invalid literal for integer: '${String(value)}'`, value)
}

/** Parse a decimal float, including 'inf' and 'nan' */
export function coerceFloat(value: unknown): number {
  if (typeof value === 'boolean') return value ? 1 : 0
  if (typeof value === 'number') return value
  if (typeof value === 'string') {
    const trimmed = value.trim()
    if (FLOAT_PATTERN.test(trimmed)) {
      return Number.parseFloat(trimmed)
    }
    const special = FLOAT_SPECIAL_PATTERN.exec(trimmed)
    if (special) {
      if (special[2].toLowerCase() === 'nan') return Number.NaN
      return special[1] === '-' ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY
    }
  }
  throw new CoercionError(`could not convert to float: '${String(value)}'`, value)
}

export const BUILTIN_COERCIONS = {
  json: coerceJson,
  first: coerceFirst,
  object_id: coerceObjectId,
  empty_or_object_id: coerceEmptyOrObjectId,
  boolean: coerceBoolean,
  integer: coerceInteger,
  float: coerceFloat,
} as const
