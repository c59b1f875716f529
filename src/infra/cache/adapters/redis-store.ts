/**
 * Redis volatile store using ioredis.
 */

import { gunzipSync, gzipSync } from 'node:zlib';

import { Redis } from 'ioredis';
import { err, ok, type Result } from 'neverthrow';

import { createComposedCounter } from '../counters.js';
import { createKeyBuilder } from '../key-builder.js';
import {
  CacheError as CacheErrorFactory,
  DEFAULT_REALM,
  DEFAULT_TTL_MS,
  UNKNOWN_MEMORY_USAGE,
  type AtomicCounter,
  type CacheError,
  type CacheResult,
  type MemoryUsage,
  type VolatileStore,
} from '../ports.js';
import { deserialize, serialize } from '../serialization.js';

import type { Logger } from 'pino';

export interface RedisClientOptions {
  /** Redis connection URL */
  url: string;
  /** Connection timeout in milliseconds. Default: 5000 */
  connectTimeoutMs?: number;
  /** Command timeout in milliseconds. Default: 1000 */
  commandTimeoutMs?: number;
}

export interface RedisStoreOptions {
  /** Prefix shared by every key written by this store. Default: 'cache' */
  keyPrefix?: string;
  /** Store payloads gzip-compressed and base64-framed. Default: false */
  compression?: boolean;
  logger: Logger;
}

export const DEFAULT_REDIS_PREFIX = 'cache';

const COMPRESSED_MARKER = 'gz:';
const SCAN_COUNT = 100;

/**
 * Wrap a Redis operation with error handling.
 */
const wrapRedisOp = async <T>(
  op: () => Promise<T>,
  errorMessage: string
): Promise<Result<T, CacheError>> => {
  try {
    const result = await op();
    return ok(result);
  } catch (cause) {
    if (cause instanceof Error) {
      if (
        cause.message.includes('ETIMEDOUT') ||
        cause.message.includes('timeout') ||
        cause.message.includes('timed out')
      ) {
        return err(CacheErrorFactory.timeout(errorMessage, cause));
      }
      // Error reply from the server
      if (cause.message.startsWith('ERR') || cause.message.startsWith('WRONGTYPE')) {
        return err(CacheErrorFactory.storage(errorMessage, cause));
      }
    }
    return err(CacheErrorFactory.connection(errorMessage, cause));
  }
};

/**
 * Read a byte figure from an `INFO memory` reply.
 */
export const parseInfoField = (info: string, field: string): number | undefined => {
  const match = new RegExp(`^${field}:(\\d+)\\s*$`, 'm').exec(info);
  if (match?.[1] === undefined) {
    return undefined;
  }
  return Number.parseInt(match[1], 10);
};

/**
 * Create an ioredis client that connects on first command.
 */
export const createRedisClient = (options: RedisClientOptions): Redis =>
  new Redis(options.url, {
    connectTimeout: options.connectTimeoutMs ?? 5000,
    commandTimeout: options.commandTimeoutMs ?? 1000,
    maxRetriesPerRequest: 1,
    retryStrategy: (times: number) => Math.min(times * 100, 30000),
    lazyConnect: true,
  });

/**
 * Create a Redis volatile store from an existing client.
 * The store owns the client: close() quits the connection.
 */
export const createRedisStore = (client: Redis, options: RedisStoreOptions): VolatileStore => {
  const keys = createKeyBuilder({ globalPrefix: options.keyPrefix ?? DEFAULT_REDIS_PREFIX });
  const compression = options.compression ?? false;
  const log = options.logger.child({ store: 'redis' });

  const encode = (data: unknown): Result<string, CacheError> => {
    const image = serialize(data);
    if (image.isErr() || !compression) {
      return image;
    }
    return ok(COMPRESSED_MARKER + gzipSync(image.value).toString('base64'));
  };

  const decode = (payload: string): Result<unknown, CacheError> => {
    if (!payload.startsWith(COMPRESSED_MARKER)) {
      return deserialize(payload);
    }
    try {
      const buffer = Buffer.from(payload.slice(COMPRESSED_MARKER.length), 'base64');
      return deserialize(gunzipSync(buffer).toString('utf8'));
    } catch (cause) {
      return err(CacheErrorFactory.serialization('Failed to decompress cached value', cause));
    }
  };

  const escapeGlob = (text: string): string => text.replace(/[*?[\]\\]/g, '\\$&');

  const deleteMatching = async (pattern: string): Promise<number> => {
    let cursor = '0';
    let totalDeleted = 0;
    do {
      const [nextCursor, found] = await client.scan(cursor, 'MATCH', pattern, 'COUNT', SCAN_COUNT);
      cursor = nextCursor;

      if (found.length > 0) {
        totalDeleted += await client.del(...found);
      }
    } while (cursor !== '0');
    return totalDeleted;
  };

  const store: Omit<VolatileStore, 'inc' | 'dec'> = {
    id: 'redis',

    async clear(realm = '') {
      const prefix = realm === '' ? keys.getGlobalPrefix() : keys.getRealmPrefix(realm);
      const result = await wrapRedisOp(
        () => deleteMatching(`${escapeGlob(prefix)}*`),
        `Failed to clear realm: ${realm}`
      );

      if (result.isErr()) {
        return err(result.error);
      }

      log.debug({ realm, removed: result.value }, 'Cleared redis keys');
      return ok(true);
    },

    async exists(id: string, realm = DEFAULT_REALM) {
      const result = await wrapRedisOp(
        () => client.exists(keys.build(realm, id)),
        `Failed to check key existence: ${realm}/${id}`
      );

      if (result.isErr()) {
        return err(result.error);
      }

      return ok(result.value > 0);
    },

    async get(id: string, realm = DEFAULT_REALM): CacheResult<unknown> {
      const result = await wrapRedisOp(
        () => client.get(keys.build(realm, id)),
        `Failed to get key: ${realm}/${id}`
      );

      if (result.isErr()) {
        return err(result.error);
      }

      if (result.value === null) {
        return ok(undefined);
      }

      return decode(result.value);
    },

    async remove(id: string, realm = DEFAULT_REALM) {
      const result = await wrapRedisOp(
        () => client.del(keys.build(realm, id)),
        `Failed to delete key: ${realm}/${id}`
      );

      if (result.isErr()) {
        return err(result.error);
      }

      return ok(result.value > 0);
    },

    async store(id: string, data: unknown, realm = DEFAULT_REALM, ttlMs = DEFAULT_TTL_MS) {
      const payload = encode(data);
      if (payload.isErr()) {
        return err(payload.error);
      }

      const key = keys.build(realm, id);
      const result = await wrapRedisOp(
        () =>
          ttlMs > 0
            ? client.set(key, payload.value, 'PX', ttlMs)
            : client.set(key, payload.value),
        `Failed to set key: ${realm}/${id}`
      );

      if (result.isErr()) {
        return err(result.error);
      }

      return ok(result.value === 'OK');
    },

    async getInfo(): Promise<MemoryUsage> {
      const result = await wrapRedisOp(() => client.info('memory'), 'Failed to read memory info');
      if (result.isErr()) {
        log.warn({ err: result.error }, 'Redis memory info unavailable');
        return UNKNOWN_MEMORY_USAGE;
      }

      const occupied = parseInfoField(result.value, 'used_memory') ?? -1;
      const max = parseInfoField(result.value, 'maxmemory') ?? 0;
      if (max === 0) {
        // No maxmemory limit configured
        return { available: -1, occupied, max: -1 };
      }
      return { available: occupied < 0 ? -1 : max - occupied, occupied, max };
    },

    async close() {
      const result = await wrapRedisOp(() => client.quit(), 'Failed to quit redis connection');
      if (result.isErr()) {
        log.warn({ err: result.error }, 'Redis connection did not close cleanly');
        client.disconnect();
      }
    },
  };

  /**
   * INCRBY/DECRBY for whole deltas, INCRBYFLOAT otherwise. Redis only accepts a
   * stored value written as a plain number; a JSON string such as "5" is
   * rejected with a StorageError.
   */
  const addFloat = async (key: string, delta: number): Promise<number> =>
    Number(await client.incrbyfloat(key, delta));

  const nativeCounter: AtomicCounter = {
    async inc(id: string, realm = DEFAULT_REALM, delta = 1) {
      const key = keys.build(realm, id);
      return wrapRedisOp(
        () => (Number.isInteger(delta) ? client.incrby(key, delta) : addFloat(key, delta)),
        `Failed to increment key: ${realm}/${id}`
      );
    },

    async dec(id: string, realm = DEFAULT_REALM, delta = 1) {
      const key = keys.build(realm, id);
      return wrapRedisOp(
        () => (Number.isInteger(delta) ? client.decrby(key, delta) : addFloat(key, -delta)),
        `Failed to decrement key: ${realm}/${id}`
      );
    },
  };

  // Compressed payloads are not numbers to Redis, so INCRBY cannot touch them
  const counter = compression ? createComposedCounter(store) : nativeCounter;

  return { ...store, inc: counter.inc, dec: counter.dec };
};

/**
 * Check that a Redis server answers PING.
 */
export const pingRedis = async (client: Redis): Promise<boolean> => {
  const result = await wrapRedisOp(() => client.ping(), 'Failed to ping redis');
  return result.isOk() && result.value === 'PONG';
};
