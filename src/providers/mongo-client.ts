/**
 * MongoDB client provider
 */

import { MongoClient } from 'mongodb'
import { defineProvider } from '../core/providers.js'

export const MONGO_CLIENT = 'mongo_client'

export function isMongoClient(value: unknown): value is MongoClient {
  return value instanceof MongoClient
}

export const mongoClient = defineProvider(
  MONGO_CLIENT,
  async ({ context, loop }) => {
    const client = new MongoClient(context.config.mongo.url, { serverSelectionTimeoutMS: 2000 })
    await client.connect()
    context.logger.info({ database: context.config.mongo.database }, 'MongoDB connected')

    loop.defer(async () => {
      await client.close()
      context.logger.debug('MongoDB connection closed')
    })

    return client
  },
  { inject: ['context', 'loop'] }
)
