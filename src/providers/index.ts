/**
 * MongoDB providers, in registration order
 *
 * @example
 * ```typescript
 * const service = await startService({ namespaces: [providers] })
 * ```
 */

import { createProviderNamespace } from '../core/providers.js'
import * as mongoClient from './mongo-client.js'
import * as database from './database.js'
import * as documentExists from './document-exists.js'

export const providers = createProviderNamespace('providers', { mongoClient, database, documentExists })

export { MONGO_CLIENT, isMongoClient } from './mongo-client.js'
export { DATABASE, isDb } from './database.js'
export { createDocumentExists } from './document-exists.js'
export type { DocumentStore } from './document-exists.js'
