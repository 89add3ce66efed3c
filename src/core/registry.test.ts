import { describe, it, expect, vi } from 'vitest'
import { defineConfig } from '../config/index.js'
import { ServiceError } from '../errors/index.js'
import { createComponentRegistry, getComponent } from './registry.js'
import { createProviderNamespace, defineProvider, isProviderDeclaration } from './providers.js'

describe('Registry', () => {
  describe('instances', () => {
    it('should return registered instances', () => {
      const registry = createComponentRegistry()
      const cache = new Map()

      registry.registerInstance('cache', cache)

      expect(registry.get('cache')).toBe(cache)
      expect(registry.exists('cache')).toBe(true)
    })

    it('should fail with COMPONENT_MISSING for unknown names', () => {
      const registry = createComponentRegistry()

      expect(registry.exists('db')).toBe(false)
      expect(() => registry.get('db')).toThrow(ServiceError)
      expect(() => registry.get('db')).toThrow("Component 'db' is not registered")
    })

    it('should overwrite duplicates by default', () => {
      const registry = createComponentRegistry()

      registry.registerInstance('clock', 1)
      registry.registerInstance('other', 2)
      registry.registerInstance('clock', 3)

      expect(registry.get('clock')).toBe(3)
      expect(registry.names()).toEqual(['other', 'clock'])
    })

    it('should reject duplicates when configured to', () => {
      const registry = createComponentRegistry({ config: defineConfig({ registry: { duplicates: 'error' } }) })

      registry.registerInstance('clock', 1)

      expect(() => registry.registerInstance('clock', 2)).toThrow("Component 'clock' is already registered")
      expect(registry.get('clock')).toBe(1)
    })

    it('should reject a duplicate provider before running its initializer', async () => {
      const registry = createComponentRegistry({ config: defineConfig({ registry: { duplicates: 'error' } }) })
      const initializer = vi.fn(() => 'second')
      const onShutdown = vi.fn()
      registry.registerInstance('client', 'first')

      await expect(registry.register(defineProvider('client', initializer, { onShutdown }))).rejects.toMatchObject({
        code: 'FAILED_PRECONDITION',
      })
      await registry.freeze().shutdown()

      expect(initializer).not.toHaveBeenCalled()
      expect(onShutdown).not.toHaveBeenCalled()
    })

    it('should check component shapes with resolve', () => {
      const registry = createComponentRegistry()
      registry.registerInstance('name', 'handlerkit')

      const isString = (value: unknown): value is string => typeof value === 'string'
      const isNumber = (value: unknown): value is number => typeof value === 'number'

      expect(registry.resolve('name', isString)).toBe('handlerkit')
      expect(() => registry.resolve('name', isNumber)).toThrow("Component 'name' does not have the expected shape")
    })
  })

  describe('providers', () => {
    it('should store the initializer result under the declared name', async () => {
      const registry = createComponentRegistry()

      const value = await registry.register(defineProvider('answer', async () => 42))

      expect(value).toBe(42)
      expect(registry.get('answer')).toBe(42)
    })

    it('should hand the initializer exactly the declared ambient handles', async () => {
      const config = defineConfig({ mongo: { database: 'blog' } })
      const registry = createComponentRegistry({ config })

      const database = await registry.register(
        defineProvider('database', ({ context }) => context.config.mongo.database, { inject: ['context'] })
      )
      expect(database).toBe('blog')

      const sneaky = defineProvider('sneaky', (ambient) => ambient, { inject: ['context'] })
      const ambient = await registry.register(sneaky)
      expect(() => Reflect.get(ambient, 'loop')).toThrow("Provider 'sneaky' did not declare the 'loop' ambient")
    })

    it('should reject unknown ambient names', () => {
      const inject: Array<'context' | 'loop'> = JSON.parse('["context", "app"]')

      expect(() => defineProvider('app', () => null, { inject })).toThrow("Provider 'app' asks for unknown ambient 'app'")
    })

    it('should wrap initializer failures in STARTUP_FAILED', async () => {
      const registry = createComponentRegistry()
      const cause = new Error('connection refused')

      const error = await registry
        .register(
          defineProvider('db', () => {
            throw cause
          })
        )
        .then(
          () => null,
          (err: unknown) => err
        )

      expect(error).toBeInstanceOf(ServiceError)
      expect(error).toMatchObject({
        code: 'STARTUP_FAILED',
        message: "Provider 'db' failed to initialize: connection refused",
        cause,
      })
      expect(registry.exists('db')).toBe(false)
    })

    it('should tag declarations', () => {
      expect(isProviderDeclaration(defineProvider('x', () => 1))).toBe(true)
      expect(isProviderDeclaration({ name: 'x', initializer: () => 1 })).toBe(false)
      expect(isProviderDeclaration(() => 1)).toBe(false)
    })
  })

  describe('registerBulk', () => {
    it('should register modules in manifest order, each awaited in turn', async () => {
      const registry = createComponentRegistry()
      const order: string[] = []

      const slow = defineProvider('slow', async () => {
        await new Promise((resolve) => setTimeout(resolve, 5))
        order.push('slow')
        return 'slow'
      })
      const fast = defineProvider(
        'fast',
        ({ context }) => {
          order.push('fast')
          return `after ${String(context.components.get('slow'))}`
        },
        { inject: ['context'] }
      )

      await registry.registerBulk(createProviderNamespace('app', { b: { slow }, a: { fast, unrelated: 'x' } }))

      expect(order).toEqual(['slow', 'fast'])
      expect(registry.get('fast')).toBe('after slow')
      expect(registry.names()).toEqual(['slow', 'fast'])
    })

    it('should roll back a failed bulk and run its teardown hooks', async () => {
      const registry = createComponentRegistry()
      const teardown = vi.fn()

      registry.registerInstance('existing', 'kept')
      const opened = defineProvider('opened', () => 'resource', { onShutdown: teardown })
      const broken = defineProvider('broken', () => {
        throw new Error('boom')
      })

      await expect(
        registry.registerBulk(createProviderNamespace('app', { opened: { opened }, broken: { broken } }))
      ).rejects.toMatchObject({ code: 'STARTUP_FAILED' })

      expect(teardown).toHaveBeenCalledWith('resource')
      expect(registry.names()).toEqual(['existing'])
    })
  })

  describe('lifecycle', () => {
    it('should refuse registration once frozen', () => {
      const builder = createComponentRegistry()
      builder.freeze()

      expect(builder.phase).toBe('serving')
      expect(() => builder.registerInstance('late', 1)).toThrow("Cannot register 'late': registry is frozen")
    })

    it('should run teardown in reverse order on shutdown', async () => {
      const builder = createComponentRegistry()
      const calls: string[] = []

      await builder.register(
        defineProvider('first', () => 'first', {
          onShutdown: (instance) => {
            calls.push(instance)
          },
        })
      )
      await builder.register(
        defineProvider(
          'second',
          ({ loop }) => {
            loop.defer(() => {
              calls.push('second')
            })
            return 'second'
          },
          { inject: ['loop'] }
        )
      )

      const registry = builder.freeze()
      await registry.shutdown()

      expect(calls).toEqual(['second', 'first'])
      expect(registry.phase).toBe('closed')
      expect(registry.exists('first')).toBe(false)
    })

    it('should abort the loop signal and survive failing hooks', async () => {
      const builder = createComponentRegistry()
      let signal: AbortSignal | undefined
      const after = vi.fn()

      await builder.register(defineProvider('ok', () => 1, { onShutdown: after }))
      await builder.register(
        defineProvider(
          'flaky',
          ({ loop }) => {
            signal = loop.signal
            loop.defer(() => {
              throw new Error('close failed')
            })
            return 2
          },
          { inject: ['loop'] }
        )
      )

      await builder.freeze().shutdown()

      expect(signal?.aborted).toBe(true)
      expect(after).toHaveBeenCalledWith(1)
    })

    it('should expose components through the request', () => {
      const builder = createComponentRegistry()
      builder.registerInstance('clock', 42)

      expect(getComponent({ components: builder.freeze() }, 'clock')).toBe(42)
    })
  })
})
