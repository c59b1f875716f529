/**
 * Silent degradation wrapper for cache stores.
 * Errors are logged and swallowed - never propagated to callers.
 */

import type { AtomicCounter, CacheStore, CacheTier, DynamicStore } from '../ports.js';
import type { Logger } from 'pino';

/**
 * Application-level view of a tier. Failures read as misses.
 */
export interface SilentStore {
  /** Get value or undefined (never throws/returns error) */
  get(id: string, realm: string): Promise<unknown>;

  /** Check existence, false on error */
  exists(id: string, realm: string): Promise<boolean>;

  /** Store value (failures are logged and reported as false) */
  store(id: string, data: unknown, realm: string, ttlMs?: number): Promise<boolean>;

  /** Remove entry, returns true if it existed */
  remove(id: string, realm: string): Promise<boolean>;

  /** Clear a realm, or everything when realm is empty */
  clear(realm?: string): Promise<boolean>;
}

export interface SilentCounter {
  /** New counter value, 0 on error */
  inc(id: string, realm: string, delta: number): Promise<number>;
  dec(id: string, realm: string, delta: number): Promise<number>;
}

export interface SilentCacheOptions {
  /** Logger for recording cache errors */
  logger: Logger;
  /** Tier name attached to log records */
  tier: CacheTier;
}

type WritableStore = CacheStore & {
  store(id: string, data: unknown, realm?: string, ttlMs?: number): ReturnType<DynamicStore['store']>;
};

/**
 * Create a silent wrapper that swallows errors.
 * All cache failures are logged and treated as cache misses.
 */
export const createSilentStore = (
  store: WritableStore,
  options: SilentCacheOptions
): SilentStore => {
  const logger = options.logger.child({ tier: options.tier });

  return {
    async get(id: string, realm: string): Promise<unknown> {
      const result = await store.get(id, realm);

      if (result.isErr()) {
        logger.warn({ err: result.error, id, realm }, `[Cache] Get failed: ${result.error.message}`);
        return undefined;
      }

      return result.value;
    },

    async exists(id: string, realm: string): Promise<boolean> {
      const result = await store.exists(id, realm);

      if (result.isErr()) {
        logger.warn(
          { err: result.error, id, realm },
          `[Cache] Exists failed: ${result.error.message}`
        );
        return false;
      }

      return result.value;
    },

    async store(id: string, data: unknown, realm: string, ttlMs?: number): Promise<boolean> {
      const result = await store.store(id, data, realm, ttlMs);

      if (result.isErr()) {
        logger.warn(
          { err: result.error, id, realm },
          `[Cache] Store failed: ${result.error.message}`
        );
        return false;
      }

      return result.value;
    },

    async remove(id: string, realm: string): Promise<boolean> {
      const result = await store.remove(id, realm);

      if (result.isErr()) {
        logger.warn(
          { err: result.error, id, realm },
          `[Cache] Remove failed: ${result.error.message}`
        );
        return false;
      }

      return result.value;
    },

    async clear(realm?: string): Promise<boolean> {
      const result = await store.clear(realm);

      if (result.isErr()) {
        logger.warn({ err: result.error, realm }, `[Cache] Clear failed: ${result.error.message}`);
        return false;
      }

      return result.value;
    },
  };
};

/**
 * Silent wrapper for counter operations.
 */
export const createSilentCounter = (
  counter: AtomicCounter,
  options: SilentCacheOptions
): SilentCounter => {
  const logger = options.logger.child({ tier: options.tier });

  return {
    async inc(id: string, realm: string, delta: number): Promise<number> {
      const result = await counter.inc(id, realm, delta);

      if (result.isErr()) {
        logger.warn({ err: result.error, id, realm }, `[Cache] Inc failed: ${result.error.message}`);
        return 0;
      }

      return result.value;
    },

    async dec(id: string, realm: string, delta: number): Promise<number> {
      const result = await counter.dec(id, realm, delta);

      if (result.isErr()) {
        logger.warn({ err: result.error, id, realm }, `[Cache] Dec failed: ${result.error.message}`);
        return 0;
      }

      return result.value;
    },
  };
};
