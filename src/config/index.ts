/**
 * Service Configuration
 *
 * Reads the process environment into a typed, validated configuration.
 *
 * @example
 * ```typescript
 * const config = loadConfig()
 * config.mongo.url          // MONGO_URL or 'mongodb://localhost:27017'
 * config.registry.duplicates // REGISTRY_DUPLICATES or 'overwrite'
 * ```
 */

import { z } from 'zod'
import { Errors } from '../errors/index.js'

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

export const ServiceConfigSchema = z.object({
  env: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(LOG_LEVELS).optional(),
  mongo: z.object({
    url: z.string().min(1).default('mongodb://localhost:27017'),
    database: z.string().min(1).default('app'),
  }).default({}),
  registry: z.object({
    /** What a second registration under an existing name does */
    duplicates: z.enum(['overwrite', 'error']).default('overwrite'),
    /** Directory whose provider modules are registered at startup */
    providersDir: z.string().min(1).optional(),
  }).default({}),
})

export type ServiceConfig = z.infer<typeof ServiceConfigSchema>

export type DuplicatePolicy = ServiceConfig['registry']['duplicates']

/**
 * Parse configuration from environment variables
 *
 * Empty variables count as unset.
 *
 * @throws ServiceError INVALID_ARGUMENT listing every offending field
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const read = (key: string): string | undefined => {
    const value = env[key]
    return value === undefined || value === '' ? undefined : value
  }

  const result = ServiceConfigSchema.safeParse({
    env: read('NODE_ENV'),
    logLevel: read('LOG_LEVEL'),
    mongo: {
      url: read('MONGO_URL'),
      database: read('MONGO_DATABASE'),
    },
    registry: {
      duplicates: read('REGISTRY_DUPLICATES'),
      providersDir: read('PROVIDERS_DIR'),
    },
  })

  if (!result.success) {
    throw Errors.badRequest(
      'Invalid configuration',
      result.error.issues.map((issue) => ({
        field: issue.path.join('.'),
        message: issue.message,
      }))
    )
  }

  return result.data
}

/**
 * Build a configuration from defaults plus overrides (tests, scripts)
 */
export function defineConfig(overrides: z.input<typeof ServiceConfigSchema> = {}): ServiceConfig {
  return ServiceConfigSchema.parse(overrides)
}
