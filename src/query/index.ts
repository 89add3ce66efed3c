/**
 * Query Module
 */

export {
  createSortQuery,
  createGroupQuery,
  createFacetExtractQuery,
  createToStringsQuery,
  removeFieldIfEmptyQuery,
} from './builders.js'
export type { SortDirection, GroupField } from './builders.js'

export { customAggregate } from './aggregate.js'
export type { AggregateCursor, AggregateSource, AggregateQueryOptions } from './aggregate.js'
