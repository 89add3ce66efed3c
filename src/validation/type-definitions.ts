/**
 * Built-in Types
 */

import { ObjectId } from 'mongodb'
import { isUploadedFile } from '../types/index.js'
import type { Document, TypeDefinition } from './types.js'

/**
 * Plain object (not an array, class instance or null)
 */
export function isRecord(value: unknown): value is Document {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return false
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

export const BUILTIN_TYPES: Readonly<Record<string, TypeDefinition>> = {
  string: (value) => typeof value === 'string',
  integer: (value) => typeof value === 'number' && Number.isInteger(value),
  float: (value) => typeof value === 'number',
  number: (value) => typeof value === 'number',
  boolean: (value) => typeof value === 'boolean',
  list: (value) => Array.isArray(value),
  dict: isRecord,
  datetime: (value) => value instanceof Date && !Number.isNaN(value.getTime()),
  object_id: (value) => value instanceof ObjectId,
  file: isUploadedFile,
}
