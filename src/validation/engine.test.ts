/**
 * Validation Engine Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest'
import { ObjectId } from 'mongodb'
import { z } from 'zod'
import { createComponentRegistry } from '../core/registry.js'
import { ServiceError } from '../errors/index.js'
import { createRequestContext } from '../types/index.js'
import { CoercionError } from './coercions.js'
import { createDefaultEngine } from './default-engine.js'
import { createValidationEngine } from './engine.js'
import { isRecord } from './type-definitions.js'
import type { Schema } from './types.js'

function registryWith(documentExists: (collection: string, value: unknown) => boolean | Promise<boolean>) {
  const builder = createComponentRegistry()
  builder.registerInstance('document_exists', documentExists)
  return builder.freeze()
}

describe('ValidationEngine', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  describe('normalization', () => {
    it('should coerce a synthesized default', async () => {
      const engine = createDefaultEngine()

      const result = await engine.validate({ page: { type: 'integer', default: '7', coerce: 'integer' } }, {})

      expect(result).toEqual({ valid: true, document: { page: 7 } })
    })

    it('should run a default setter, then the coercion chain', async () => {
      vi.useFakeTimers()
      vi.setSystemTime(new Date('2024-01-01T00:00:00Z'))
      const engine = createDefaultEngine()

      const result = await engine.validate(
        { since: { type: 'integer', defaultSetter: 'timestamp', coerce: ['first', 'integer'] } },
        {}
      )

      expect(result).toEqual({ valid: true, document: { since: 1704067200 } })
    })

    it('should wrap the document with array_wrap', async () => {
      const engine = createDefaultEngine()

      const result = await engine.validate({ items: { type: 'list', defaultSetter: 'array_wrap' } }, { name: 'a' })

      expect(result).toEqual({ valid: true, document: { name: 'a', items: [{ name: 'a' }] } })
    })

    it('should copy default values for every document', async () => {
      const engine = createDefaultEngine()
      const schema: Schema = { tags: { type: 'list', default: [] } }

      const first = await engine.validate(schema, {})
      if (!first.valid) throw new Error('expected a valid result')
      const tags = first.document.tags
      if (Array.isArray(tags)) tags.push('mutated')

      const second = await engine.validate(schema, {})
      expect(second).toEqual({ valid: true, document: { tags: [] } })
    })

    it('should apply a default to null when the field is not nullable', async () => {
      const engine = createDefaultEngine()

      const result = await engine.validate({ limit: { type: 'integer', default: 10 } }, { limit: null })

      expect(result).toEqual({ valid: true, document: { limit: 10 } })
    })

    it('should parse object ids', async () => {
      const engine = createDefaultEngine()

      const result = await engine.validate(
        { owner: { type: 'object_id', coerce: 'object_id' } },
        { owner: '5f1d7c2e9b1e8a3d4c5b6a79' }
      )

      expect(result.valid).toBe(true)
      if (result.valid) {
        expect(result.document.owner).toBeInstanceOf(ObjectId)
        expect(String(result.document.owner)).toBe('5f1d7c2e9b1e8a3d4c5b6a79')
      }
    })

    it('should take the first query value and parse booleans', async () => {
      const engine = createDefaultEngine()

      const result = await engine.validate(
        { archived: { type: 'boolean', coerce: ['first', 'boolean'] } },
        { archived: ['TRUE', 'false'] }
      )

      expect(result).toEqual({ valid: true, document: { archived: true } })
    })
  })

  describe('unknown fields', () => {
    const schema: Schema = { name: { type: 'string' } }

    it('should pass unknown top-level fields through by default', async () => {
      const result = await createDefaultEngine().validate(schema, { name: 'a', extra: 1 })

      expect(result).toEqual({ valid: true, document: { name: 'a', extra: 1 } })
    })

    it('should purge unknown top-level fields when strict', async () => {
      const result = await createDefaultEngine().validate(schema, { name: 'a', extra: 1 }, { strict: true })

      expect(result).toEqual({ valid: true, document: { name: 'a' } })
    })

    it('should purge unknown nested fields unless allowUnknown', async () => {
      const engine = createDefaultEngine()
      const input = { address: { city: 'Lisbon', zip: '1000' } }

      const purged = await engine.validate({ address: { type: 'dict', schema: { city: { type: 'string' } } } }, input)
      const kept = await engine.validate(
        { address: { type: 'dict', allowUnknown: true, schema: { city: { type: 'string' } } } },
        input
      )

      expect(purged).toEqual({ valid: true, document: { address: { city: 'Lisbon' } } })
      expect(kept).toEqual({ valid: true, document: { address: { city: 'Lisbon', zip: '1000' } } })
    })

    it('should keep a __proto__ key as plain data', async () => {
      const engine = createDefaultEngine()
      const input: unknown = JSON.parse('{"__proto__":{"role":"admin"}}')
      if (!isRecord(input)) throw new Error('expected an object')

      const result = await engine.validate({ role: { type: 'string', required: true } }, input)

      expect(result).toEqual({ valid: false, errors: { role: 'required field' } })
    })

    it('should keep a nested __proto__ key without replacing the prototype', async () => {
      const engine = createDefaultEngine()
      const input: unknown = JSON.parse('{"meta":{"__proto__":{"role":"admin"}}}')
      if (!isRecord(input)) throw new Error('expected an object')

      const result = await engine.validate({ meta: { type: 'dict', allowUnknown: true, schema: {} } }, input)

      if (!result.valid) throw new Error(JSON.stringify(result.errors))
      const meta = result.document['meta']
      expect(isRecord(meta)).toBe(true)
      expect(Object.getPrototypeOf(meta)).toBe(Object.prototype)
      expect(Object.getOwnPropertyDescriptor(meta, '__proto__')?.value).toEqual({ role: 'admin' })
    })
  })

  describe('field errors', () => {
    it('should report missing required fields', async () => {
      const result = await createDefaultEngine().validate({ name: { type: 'string', required: true } }, {})

      expect(result).toEqual({ valid: false, errors: { name: 'required field' } })
    })

    it('should reject null unless nullable', async () => {
      const engine = createDefaultEngine()

      const rejected = await engine.validate({ note: { type: 'string' } }, { note: null })
      const accepted = await engine.validate({ note: { type: 'string', nullable: true } }, { note: null })

      expect(rejected).toEqual({ valid: false, errors: { note: 'null value not allowed' } })
      expect(accepted).toEqual({ valid: true, document: { note: null } })
    })

    it('should report type mismatches with every declared type', async () => {
      const engine = createDefaultEngine()

      const single = await engine.validate({ count: { type: 'integer' } }, { count: 'many' })
      const union = await engine.validate({ id: { type: ['string', 'integer'] } }, { id: true })

      expect(single).toEqual({ valid: false, errors: { count: 'must be of integer type' } })
      expect(union).toEqual({ valid: false, errors: { id: 'must be of string or integer type' } })
    })

    it('should turn coercion failures into type errors', async () => {
      const engine = createDefaultEngine()

      const typed = await engine.validate({ n: { type: 'integer', coerce: 'integer' } }, { n: 'abc' })
      const untyped = await engine.validate({ n: { coerce: 'integer' } }, { n: 'abc' })

      expect(typed).toEqual({ valid: false, errors: { n: 'must be of integer type' } })
      expect(untyped).toEqual({ valid: false, errors: { n: 'cannot be coerced' } })
    })

    it('should key nested errors by their path', async () => {
      const result = await createDefaultEngine().validate(
        { address: { type: 'dict', schema: { city: { type: 'string', required: true } } } },
        { address: {} }
      )

      expect(result).toEqual({ valid: false, errors: { 'address.city': 'required field' } })
    })

    it('should check every list element against allowed', async () => {
      const engine = createDefaultEngine()
      const schema: Schema = { colors: { type: 'list', allowed: ['red', 'blue'] } }

      const result = await engine.validate(schema, { colors: ['red', 'green'] })

      expect(result).toEqual({ valid: false, errors: { colors: 'unallowed value green' } })
    })

    it('should report only the first error of a field', async () => {
      const result = await createDefaultEngine().validate(
        { host: { type: 'string', allowed: ['10.0.0.1'], checkWith: 'ip_address' } },
        { host: 'localhost' }
      )

      expect(result).toEqual({ valid: false, errors: { host: 'unallowed value localhost' } })
    })

    it('should run every custom check in declared order', async () => {
      const calls: string[] = []
      const engine = createValidationEngine()
        .check('first', (ctx) => {
          calls.push('first')
          ctx.error('first failed')
        })
        .check('second', (ctx) => {
          calls.push('second')
          ctx.error('second failed')
        })

      const result = await engine.validate({ f: { checkWith: ['first', 'second'] } }, { f: 1 })

      expect(calls).toEqual(['first', 'second'])
      expect(result).toEqual({ valid: false, errors: { f: 'first failed' } })
    })
  })

  describe('coercion policies', () => {
    it('should keep the value when a tolerant coercion fails', async () => {
      const engine = createDefaultEngine().coercion(
        'trim',
        (value) => {
          if (typeof value !== 'string') throw new CoercionError('expected a string', value)
          return value.trim()
        },
        { tolerant: true }
      )

      const result = await engine.validate({ v: { type: ['string', 'integer'], coerce: 'trim' } }, { v: 5 })

      expect(result).toEqual({ valid: true, document: { v: 5 } })
    })

    it('should report malformed object ids as field errors by default', async () => {
      const result = await createDefaultEngine().validate(
        { owner: { type: 'object_id', coerce: 'object_id' } },
        { owner: 'not-an-id' }
      )

      expect(result).toEqual({ valid: false, errors: { owner: 'must be of object_id type' } })
    })

    it('should propagate malformed object ids with the throw policy', async () => {
      const engine = createDefaultEngine({ malformedInput: 'throw' })

      await expect(
        engine.validate({ owner: { type: 'object_id', coerce: 'object_id' } }, { owner: 'not-an-id' })
      ).rejects.toMatchObject({ code: 'MALFORMED_INPUT', status: 500 })
    })
  })

  describe('checkExistence', () => {
    const schema: Schema = {
      owner: {
        type: 'string',
        checkExistence: { name: 'users', map: { users: { name: 'profiles', notFound: 'User not found' } } },
      },
      title: { type: 'string' },
    }

    it('should mark exactly the field whose value does not exist', async () => {
      const documentExists = vi.fn(async () => false)
      const components = registryWith(documentExists)

      const result = await createDefaultEngine().validate(schema, { owner: 'u1', title: 'x' }, { components })

      expect(result).toEqual({ valid: false, errors: { owner: 'User not found' } })
      expect(documentExists).toHaveBeenCalledWith('profiles', 'u1')
    })

    it('should pass when the value exists', async () => {
      const components = registryWith(() => true)

      const result = await createDefaultEngine().validate(schema, { owner: 'u1', title: 'x' }, { components })

      expect(result).toEqual({ valid: true, document: { owner: 'u1', title: 'x' } })
    })

    it('should resolve the collection through a sibling field', async () => {
      const documentExists = vi.fn(() => false)
      const components = registryWith(documentExists)
      const aliased: Schema = {
        kind: { type: 'string' },
        target: {
          type: 'string',
          checkExistence: {
            name: 'kind',
            lookup: true,
            map: {
              user: { name: 'profiles', notFound: 'User not found' },
              team: { name: 'teams', notFound: 'Team not found' },
            },
          },
        },
      }

      const found = await createDefaultEngine().validate(aliased, { kind: 'team', target: 't1' }, { components })
      const unmapped = await createDefaultEngine().validate(aliased, { kind: 'org', target: 't1' }, { components })

      expect(found).toEqual({ valid: false, errors: { target: 'Team not found' } })
      expect(documentExists).toHaveBeenCalledTimes(1)
      expect(documentExists).toHaveBeenCalledWith('teams', 't1')
      expect(unmapped).toEqual({ valid: false, errors: { target: "No collection mapped for 'org'" } })
    })

    it('should use the request registry when none is given', async () => {
      const components = registryWith(() => false)
      const request = createRequestContext({ components })

      const result = await createDefaultEngine().validate(schema, { owner: 'u1' }, { request })

      expect(result).toEqual({ valid: false, errors: { owner: 'User not found' } })
    })

    it('should abandon pending lookups of a cancelled request', async () => {
      const documentExists = vi.fn(() => true)
      const controller = new AbortController()
      const request = createRequestContext({ components: registryWith(documentExists), signal: controller.signal })
      controller.abort(new Error('request cancelled'))

      await expect(createDefaultEngine().validate(schema, { owner: 'u1' }, { request })).rejects.toThrow(
        'request cancelled'
      )
      expect(documentExists).not.toHaveBeenCalled()
    })

    it('should fail with COMPONENT_MISSING without a document_exists component', async () => {
      const components = createComponentRegistry().freeze()

      await expect(createDefaultEngine().validate(schema, { owner: 'u1' }, { components })).rejects.toMatchObject({
        code: 'COMPONENT_MISSING',
      })
    })

    it('should yield identical results on repeated runs', async () => {
      const components = registryWith((_collection, value) => value === 'u1')
      const engine = createDefaultEngine()
      const input = { owner: 'u2', title: 'x' }

      const first = await engine.validate(schema, input, { components })
      const second = await engine.validate(schema, input, { components })

      expect(second).toEqual(first)
      expect(input).toEqual({ owner: 'u2', title: 'x' })
    })
  })

  describe('allowedPath', () => {
    const schema: Schema = { kind: { type: 'string', allowedPath: ['users', 'teams'] } }

    it('should pass allowed segments', async () => {
      const components = createComponentRegistry().freeze()
      const request = createRequestContext({ components, path: '/things/users' })

      const result = await createDefaultEngine().validate(schema, { kind: 'users' }, { request })

      expect(result).toEqual({ valid: true, document: { kind: 'users' } })
    })

    it('should abort with a 404 carrying the request path', async () => {
      const components = createComponentRegistry().freeze()
      const request = createRequestContext({ components, path: '/things/bogus' })

      const error = await createDefaultEngine()
        .validate(schema, { kind: 'bogus' }, { request })
        .then(
          () => null,
          (err: unknown) => err
        )

      expect(error).toBeInstanceOf(ServiceError)
      expect(error).toMatchObject({
        code: 'NOT_FOUND',
        status: 404,
        message: 'Requested URL /things/bogus not found',
        details: { path: '/things/bogus' },
      })
    })

    it('should accept a single string as the allow-list', async () => {
      const result = await createDefaultEngine().validate({ kind: { allowedPath: 'users' } }, { kind: 'users' })

      expect(result).toEqual({ valid: true, document: { kind: 'users' } })
    })
  })

  describe('allowedContentType', () => {
    const schema: Schema = { avatar: { type: 'file', allowedContentType: ['image/png', 'image/jpeg'] } }

    it('should accept allowed media types', async () => {
      const avatar = { name: 'a.png', type: 'image/png', body: new Uint8Array([1]) }

      const result = await createDefaultEngine().validate(schema, { avatar })

      expect(result).toEqual({ valid: true, document: { avatar } })
    })

    it('should reject other media types', async () => {
      const avatar = { name: 'a.txt', type: 'text/plain', body: new Uint8Array([1]) }

      const result = await createDefaultEngine().validate(schema, { avatar })

      expect(result).toEqual({ valid: false, errors: { avatar: 'Content type not allowed' } })
    })
  })

  describe('ip_address', () => {
    it('should validate IPv4 addresses', async () => {
      const engine = createDefaultEngine()
      const schema: Schema = { ip: { type: 'string', checkWith: 'ip_address' } }

      expect(await engine.validate(schema, { ip: '10.0.0.1' })).toEqual({ valid: true, document: { ip: '10.0.0.1' } })
      expect(await engine.validate(schema, { ip: '999.1.1.1' })).toEqual({
        valid: false,
        errors: { ip: 'Malformed IP address' },
      })
    })
  })

  describe('compile', () => {
    it('should reuse compiled schemas until the tables change', () => {
      const engine = createDefaultEngine()
      const schema: Schema = { name: { type: 'string' } }

      const first = engine.compile(schema)
      expect(engine.compile(schema)).toBe(first)

      engine.type('slug', (value) => typeof value === 'string')
      expect(engine.compile(schema)).not.toBe(first)
    })

    it('should refuse to redefine a core rule', () => {
      const engine = createValidationEngine()

      const redefine = () => engine.rule('required', z.boolean(), () => undefined)

      expect(redefine).toThrow(ServiceError)
      expect(redefine).toThrow("Invalid rule set for 'required': core rule cannot be redefined")
    })

    it('should reject unknown names', () => {
      const engine = createDefaultEngine()

      expect(() => engine.compile({ a: { type: 'nope' } })).toThrow("Invalid rule set for 'a': unknown type 'nope'")
      expect(() => engine.compile({ a: { coerce: 'nope' } })).toThrow("Invalid rule set for 'a': unknown coercion 'nope'")
      expect(() => engine.compile({ a: { checkWith: 'nope' } })).toThrow("Invalid rule set for 'a': unknown check 'nope'")
    })

    it('should reject rules that are not registered', () => {
      const engine = createValidationEngine()

      expect(() => engine.compile({ a: { allowedPath: ['x'] } })).toThrow(
        "Invalid rule set for 'a': unknown rule 'allowedPath'"
      )
    })

    it('should reject malformed rule arguments', () => {
      const engine = createDefaultEngine()

      // Schemas loaded from JSON are only checked when compiled
      const schema: Schema = JSON.parse(
        '{"owner": {"checkExistence": {"name": "users", "map": {"users": {"name": "profiles"}}}}}'
      )

      expect(() => engine.compile(schema)).toThrow(
        "Invalid rule set for 'owner': checkExistence: map.users.notFound: Required"
      )
    })

    it('should reject default together with defaultSetter', () => {
      const engine = createDefaultEngine()

      expect(() => engine.compile({ a: { default: 1, defaultSetter: 'timestamp' } })).toThrow(
        "Invalid rule set for 'a': 'default' and 'defaultSetter' are exclusive"
      )
    })

    it('should name nested fields by path', () => {
      const engine = createDefaultEngine()

      expect(() => engine.compile({ address: { schema: { city: { type: 'town' } } } })).toThrow(
        "Invalid rule set for 'address.city': unknown type 'town'"
      )
    })
  })
})
