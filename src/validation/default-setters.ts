/**
 * Built-in Default Setters
 *
 * A default setter receives the document the missing field belongs to.
 */

import type { Document } from './types.js'

/** The document itself, wrapped in a one-element list */
export function arrayWrap(document: Readonly<Document>): Document[] {
  return [{ ...document }]
}

/** Current unix time in seconds, as a one-element list of strings */
export function timestamp(): string[] {
  return [String(Math.floor(Date.now() / 1000))]
}

export const BUILTIN_DEFAULT_SETTERS = {
  array_wrap: arrayWrap,
  timestamp,
} as const
