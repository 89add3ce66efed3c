/**
 * Blog Service Example
 *
 * Registers the MongoDB providers, then serves a few handlers that use
 * injection, the three validation adapters and the aggregation helpers.
 *
 * Run against a local MongoDB:
 *   MONGO_URL=mongodb://localhost:27017 MONGO_DATABASE=blog npx tsx examples/blog-service.ts
 */

import { ObjectId } from 'mongodb'
import {
  applyWrappers,
  createGroupQuery,
  createSortQuery,
  customAggregate,
  defineHandler,
  inject,
  isDb,
  isRecord,
  providers,
  readValidated,
  startService,
  validateArgument,
  validatePath,
  validateRequest,
  type Schema,
} from '../src/index.js'

// === Schemas ===

const postPathSchema: Schema = {
  id: { type: 'object_id', coerce: 'object_id', required: true },
}

const listQuerySchema: Schema = {
  limit: { type: 'integer', coerce: ['first', 'integer'], default: ['20'] },
  sort: { type: 'list', default: ['CREATEDAT'] },
  archived: { type: 'boolean', coerce: ['first', 'boolean'], default: ['false'] },
}

const createPostSchema: Schema = {
  title: { type: 'string', required: true },
  author: {
    type: 'object_id',
    coerce: 'object_id',
    required: true,
    checkExistence: { name: 'users', map: { users: { name: 'profiles', notFound: 'Author not found' } } },
  },
  tags: { type: 'list', default: [] },
}

const kindPathSchema: Schema = {
  kind: { type: 'string', allowedPath: ['posts', 'drafts'] },
}

// === Handlers ===

const getPost = applyWrappers(
  defineHandler('posts.get', ['db', 'id'], async (_request, { db, id }) => {
    if (!isDb(db) || !(id instanceof ObjectId)) throw new Error('unexpected arguments')
    return db.collection('posts').findOne({ _id: id })
  }),
  inject,
  validatePath(postPathSchema)
)

const listPosts = applyWrappers(
  defineHandler('posts.list', ['db', 'query'], async (_request, { db, query }) => {
    if (!isDb(db) || !isRecord(query)) throw new Error('unexpected arguments')
    const sort = Array.isArray(query.sort) ? query.sort.map(String) : []
    const limit = typeof query.limit === 'number' ? query.limit : 20

    return db
      .collection('posts')
      .find({ archived: query.archived === true })
      .sort(createSortQuery(sort))
      .limit(limit)
      .toArray()
  }),
  inject,
  validateArgument(listQuerySchema, 'query')
)

const createPost = applyWrappers(
  defineHandler('posts.create', ['db', 'validated'], async (_request, args) => {
    const { db } = args
    if (!isDb(db)) throw new Error('db component is not a database')
    const { json } = readValidated(args)

    const result = await db.collection('posts').insertOne({ ...json, createdAt: new Date() })
    return { id: result.insertedId.toHexString() }
  }),
  inject,
  validateRequest(createPostSchema, 'json')
)

const tagCloud = applyWrappers(
  defineHandler('posts.tags', ['db', 'kind'], async (_request, { db, kind }) => {
    if (!isDb(db)) throw new Error('db component is not a database')
    return customAggregate(
      db.collection(String(kind)),
      [{ $unwind: '$tags' }, ...createGroupQuery(['tags', 'tags'], ['authors', 'author', true])],
      { label: 'tagCloud' }
    )
  }),
  inject,
  validatePath(kindPathSchema)
)

// === Main ===

async function main(): Promise<void> {
  const service = await startService({ namespaces: [providers] })

  const created = await service.handle(createPost, {
    method: 'POST',
    path: '/posts',
    json: { title: 'Hello', author: '5f1d7c2e9b1e8a3d4c5b6a79' },
  })
  console.log('create', created)

  console.log('list', await service.handle(listPosts, { path: '/posts', query: { limit: ['5'], sort: ['TITLE'] } }))
  console.log('get', await service.handle(getPost, { path: '/posts/x' }, { id: 'not-an-id' }))
  console.log('tags', await service.handle(tagCloud, { path: '/bogus/tags' }, { kind: 'bogus' }))

  await service.shutdown()
}

main().catch((err: unknown) => {
  console.error(err)
  process.exit(1)
})
