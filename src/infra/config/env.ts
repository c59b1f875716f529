/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Relational tier
  DATABASE_URL: Type.String({ minLength: 1 }),

  // Disk tier
  CACHE_DIR: Type.String({ minLength: 1, default: './cache' }),

  // Volatile tier
  CACHE_DRIVER: Type.Optional(Type.Union([Type.Literal('memory'), Type.Literal('redis')])),
  CACHE_AUTOLOAD_REALMS: Type.Optional(Type.String()),
  CACHE_MEMORY_MAX_BYTES: Type.Integer({ minimum: 1, default: 67_108_864 }),
  REDIS_URL: Type.Optional(Type.String()),
  REDIS_PREFIX: Type.String({ minLength: 1, default: 'cache' }),
  REDIS_COMPRESSION: Type.Boolean({ default: false }),
});

export type Env = Static<typeof EnvSchema>;

const nonEmpty = (value: string | undefined): string | undefined =>
  value !== undefined && value !== '' ? value : undefined;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const maxBytes = nonEmpty(env['CACHE_MEMORY_MAX_BYTES']);
  const compression = nonEmpty(env['REDIS_COMPRESSION'])?.toLowerCase();

  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    DATABASE_URL: env['DATABASE_URL'],
    CACHE_DIR: nonEmpty(env['CACHE_DIR']) ?? './cache',
    CACHE_DRIVER: nonEmpty(env['CACHE_DRIVER']),
    CACHE_AUTOLOAD_REALMS: nonEmpty(env['CACHE_AUTOLOAD_REALMS']),
    CACHE_MEMORY_MAX_BYTES: maxBytes !== undefined ? Number(maxBytes) : 67_108_864,
    REDIS_URL: nonEmpty(env['REDIS_URL']),
    REDIS_PREFIX: nonEmpty(env['REDIS_PREFIX']) ?? 'cache',
    REDIS_COMPRESSION: compression === 'true' || compression === '1',
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  database: {
    url: env.DATABASE_URL,
  },
  cache: {
    dir: env.CACHE_DIR,
    /** Preferred volatile driver; the first available one is used otherwise */
    driver: env.CACHE_DRIVER,
    /** Realms auto-loaded at startup besides 'system' and the default realm */
    autoloadRealms:
      env.CACHE_AUTOLOAD_REALMS?.split(',')
        .map((realm) => realm.trim())
        .filter(Boolean) ?? [],
    memoryMaxBytes: env.CACHE_MEMORY_MAX_BYTES,
  },
  redis: {
    url: env.REDIS_URL,
    prefix: env.REDIS_PREFIX,
    compression: env.REDIS_COMPRESSION,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
