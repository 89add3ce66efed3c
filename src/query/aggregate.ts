/**
 * Aggregation Runner
 */

import type { AggregateOptions, ClientSession, Document } from 'mongodb'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('aggregate')

/**
 * Cursor operations customAggregate needs (an AggregationCursor has them)
 */
export interface AggregateCursor {
  next(): Promise<Document | null>
  toArray(): Promise<Document[]>
  close(): Promise<void>
}

/**
 * Anything that runs aggregations: a Collection or a Db
 */
export interface AggregateSource {
  aggregate(pipeline: Document[], options?: AggregateOptions): AggregateCursor
}

export interface AggregateQueryOptions {
  /** Name logged with the pipeline and its result */
  label?: string

  session?: ClientSession

  /** Return every document instead of the first */
  toList?: boolean
}

/**
 * Run a pipeline and return its first document (or null), or every document
 * with `toList`
 *
 * @example
 * ```typescript
 * const stats = await customAggregate(db.collection('posts'), [
 *   { $match: { owner } },
 *   ...createGroupQuery(['tags', 'tag']),
 * ], { label: 'postTags' })
 * ```
 */
export async function customAggregate(
  source: AggregateSource,
  pipeline: Document[],
  options: AggregateQueryOptions & { toList: true }
): Promise<Document[]>
export async function customAggregate(
  source: AggregateSource,
  pipeline: Document[],
  options?: AggregateQueryOptions & { toList?: false }
): Promise<Document | null>
export async function customAggregate(
  source: AggregateSource,
  pipeline: Document[],
  options: AggregateQueryOptions = {}
): Promise<Document[] | Document | null> {
  const { label, session, toList = false } = options

  if (label) {
    logger.debug({ label, pipeline }, 'Aggregate query')
  }

  const cursor = source.aggregate(pipeline, session ? { session } : undefined)

  let output: Document[] | Document | null
  if (toList) {
    output = await cursor.toArray()
  } else {
    try {
      output = await cursor.next()
    } finally {
      await cursor.close()
    }
  }

  if (label) {
    logger.debug({ label, output }, 'Aggregate response')
  }

  return output
}
