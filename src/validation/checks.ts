/**
 * Built-in Custom Checks
 *
 * Rules with an argument (checkExistence, allowedPath, allowedContentType)
 * and named field checks referenced through checkWith (ip_address).
 */

import { isIPv4 } from 'node:net'
import { z } from 'zod'
import { Errors } from '../errors/index.js'
import { isUploadedFile } from '../types/index.js'
import type { CheckContext, ExistenceRule } from './types.js'

/**
 * Name of the component the existence check consults
 */
export const DOCUMENT_EXISTS = 'document_exists'

/**
 * `document_exists` component: does `value` exist in `collection`?
 */
export type DocumentExists = (collection: string, value: unknown) => boolean | Promise<boolean>

export function isDocumentExists(value: unknown): value is DocumentExists {
  return typeof value === 'function'
}

// ─────────────────────────────────────────────────────────────────────────────
// Rule argument schemas
// ─────────────────────────────────────────────────────────────────────────────

export const ExistenceRuleSchema = z.object({
  name: z.string().min(1),
  lookup: z.boolean().optional(),
  map: z.record(
    z.object({
      name: z.string().min(1),
      notFound: z.string().min(1),
    })
  ),
})

/** A single string is a one-element list */
export const AllowListSchema = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (typeof value === 'string' ? [value] : value))

// ─────────────────────────────────────────────────────────────────────────────
// Rules
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Ask the `document_exists` component whether the value exists in the
 * collection the rule resolves to.
 */
export async function checkExistence(ctx: CheckContext, value: unknown, rule: ExistenceRule): Promise<void> {
  const key = rule.lookup ? ctx.lookup(rule.name) : rule.name
  const target = typeof key === 'string' && Object.hasOwn(rule.map, key) ? rule.map[key] : undefined

  if (!target) {
    ctx.error(`No collection mapped for '${String(key)}'`)
    return
  }

  if (!ctx.components) {
    throw Errors.internal('Existence check needs a component registry', { field: ctx.field })
  }

  const documentExists = ctx.components.resolve(DOCUMENT_EXISTS, isDocumentExists)
  if (!(await documentExists(target.name, value))) {
    ctx.error(target.notFound)
  }
}

/**
 * Value must be one of the allowed path segments. A miss aborts the whole
 * request with a 404 instead of annotating the field.
 */
export function allowedPath(ctx: CheckContext, value: unknown, allowed: readonly string[]): void {
  if (typeof value === 'string' && allowed.includes(value)) return
  throw Errors.urlNotFound(ctx.request?.path)
}

/**
 * Uploaded file's media type must be allowed
 */
export function allowedContentType(ctx: CheckContext, value: unknown, allowed: readonly string[]): void {
  if (isUploadedFile(value) && allowed.includes(value.type)) return
  ctx.error('Content type not allowed')
}

// ─────────────────────────────────────────────────────────────────────────────
// Field checks
// ─────────────────────────────────────────────────────────────────────────────

export function ipAddress(ctx: CheckContext, value: unknown): void {
  if (typeof value === 'string' && isIPv4(value)) return
  ctx.error('Malformed IP address')
}
