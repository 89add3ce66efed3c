/**
 * `document_exists` provider used by the checkExistence rule
 */

import type { CountDocumentsOptions, Document } from 'mongodb'
import { defineProvider } from '../core/providers.js'
import { DOCUMENT_EXISTS, type DocumentExists } from '../validation/checks.js'
import { DATABASE, isDb } from './database.js'

/**
 * Collection lookup (a Db has it)
 */
export interface DocumentStore {
  collection(name: string): {
    countDocuments(filter: Document, options?: CountDocumentsOptions): Promise<number>
  }
}

/**
 * Does a document with `_id === value` exist in the collection?
 */
export function createDocumentExists(store: DocumentStore): DocumentExists {
  return async (collection, value) => {
    const count = await store.collection(collection).countDocuments({ _id: value }, { limit: 1 })
    return count > 0
  }
}

export const documentExists = defineProvider(
  DOCUMENT_EXISTS,
  ({ context }) => createDocumentExists(context.components.resolve(DATABASE, isDb)),
  { inject: ['context'] }
)
