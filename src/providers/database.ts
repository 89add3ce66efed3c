/**
 * Database provider: the configured database of the `mongo_client` component
 */

import { Db } from 'mongodb'
import { defineProvider } from '../core/providers.js'
import { MONGO_CLIENT, isMongoClient } from './mongo-client.js'

export const DATABASE = 'db'

export function isDb(value: unknown): value is Db {
  return value instanceof Db
}

export const database = defineProvider(
  DATABASE,
  ({ context }) => context.components.resolve(MONGO_CLIENT, isMongoClient).db(context.config.mongo.database),
  { inject: ['context'] }
)
