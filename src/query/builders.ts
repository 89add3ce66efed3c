/**
 * Aggregation Fragment Builders
 *
 * Stateless helpers producing pieces of MongoDB aggregation pipelines.
 *
 * @example
 * ```typescript
 * const pipeline = [
 *   { $match: { owner } },
 *   { $sort: createSortQuery(['NAME', 'createdAt']) },
 *   ...createGroupQuery(['ids', '_id', true], ['tags', 'tag']),
 * ]
 * ```
 */

import type { Document } from 'mongodb'

export type SortDirection = 1 | -1

/**
 * (output field, source field, stringify) triple for createGroupQuery
 */
export type GroupField = readonly [output: string, source: string, stringify?: boolean]

function isUpperCase(value: string): boolean {
  return value === value.toUpperCase() && value !== value.toLowerCase()
}

/**
 * Build a `$sort` document from field names.
 *
 * Names are deduplicated case-insensitively and keyed in lower case at their
 * first occurrence. A field sorts ascending when one of its spellings is
 * entirely upper case, descending otherwise.
 *
 * @example
 * createSortQuery(['Name', 'age', 'NAME']) // { name: 1, age: -1 }
 */
export function createSortQuery(fields: Iterable<string>): Record<string, SortDirection> {
  const sort: Record<string, SortDirection> = {}

  for (const field of fields) {
    const key = field.toLowerCase()
    const direction: SortDirection = isUpperCase(field) ? 1 : -1
    if (sort[key] === undefined || direction === 1) {
      sort[key] = direction
    }
  }

  return sort
}

/**
 * Collect the distinct values of source fields into one document.
 *
 * @example
 * createGroupQuery(['ids', '_id', true])
 * // [
 * //   { $group: { _id: null, ids: { $addToSet: { $toString: '$_id' } } } },
 * //   { $project: { _id: 0 } },
 * // ]
 */
export function createGroupQuery(...fields: GroupField[]): Document[] {
  const group: Document = { _id: null }

  for (const [output, source, stringify] of fields) {
    group[output] = { $addToSet: stringify ? { $toString: `$${source}` } : `$${source}` }
  }

  return [{ $group: group }, { $project: { _id: 0 } }]
}

/**
 * Expression taking `subfield` of the first element of an array field, or
 * the (empty) array itself
 */
export function createFacetExtractQuery(field: string, subfield: string): Document {
  const ref = `$${field}`
  return {
    $cond: [
      { $gt: [{ $size: ref }, 0] },
      { $let: { vars: { temp: { $arrayElemAt: [ref, 0] } }, in: `$$temp.${subfield}` } },
      ref,
    ],
  }
}

/**
 * Expression converting every element of an array field to a string
 */
export function createToStringsQuery(field: string): Document {
  return {
    $map: {
      input: `$${field}`,
      as: 'temp',
      in: { $toString: '$$temp' },
    },
  }
}

/**
 * Expression that drops a field from the output when its array is empty
 */
export function removeFieldIfEmptyQuery(field: string): Document {
  const ref = `$${field}`
  return { $cond: [{ $gt: [{ $size: ref }, 0] }, ref, '$$REMOVE'] }
}
