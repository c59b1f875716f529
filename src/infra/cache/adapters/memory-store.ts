/**
 * In-process volatile store on lru-cache, bounded by total serialized size.
 *
 * Entries live only as long as the process. Expiry is checked against the
 * injected clock on read, so tests can advance time without timers.
 */

import { LRUCache } from 'lru-cache';
import { err, ok } from 'neverthrow';

import { createComposedCounter } from '../counters.js';
import { createKeyBuilder } from '../key-builder.js';
import {
  DEFAULT_REALM,
  DEFAULT_TTL_MS,
  systemClock,
  type Clock,
  type MemoryUsage,
  type VolatileStore,
} from '../ports.js';
import { deserialize, serialize } from '../serialization.js';

import type { Logger } from 'pino';

interface MemoryEntry {
  /** Serialized value */
  image: string;
  /** Expiration timestamp (ms since epoch), 0 for never */
  expiresAt: number;
}

export interface MemoryStoreOptions {
  /** Upper bound on the summed size of keys and serialized values. Default: 64 MiB */
  maxBytes?: number;
  logger: Logger;
  clock?: Clock;
}

export const DEFAULT_MEMORY_MAX_BYTES = 64 * 1024 * 1024;

/**
 * Create the in-process volatile store.
 */
export const createMemoryStore = (options: MemoryStoreOptions): VolatileStore => {
  const maxBytes = options.maxBytes ?? DEFAULT_MEMORY_MAX_BYTES;
  const clock = options.clock ?? systemClock;
  const log = options.logger.child({ store: 'memory' });
  const keys = createKeyBuilder();

  const lru = new LRUCache<string, MemoryEntry>({
    maxSize: maxBytes,
    sizeCalculation: (entry, key) =>
      Math.max(1, Buffer.byteLength(entry.image) + Buffer.byteLength(key)),
  });

  /** Live entry for a key; expired entries are dropped on the way. */
  const liveEntry = (key: string): MemoryEntry | undefined => {
    const entry = lru.get(key);
    if (entry === undefined) {
      return undefined;
    }
    if (entry.expiresAt !== 0 && entry.expiresAt <= clock()) {
      lru.delete(key);
      return undefined;
    }
    return entry;
  };

  const store: Omit<VolatileStore, 'inc' | 'dec'> = {
    id: 'memory',

    clear(realm = '') {
      if (realm === '') {
        lru.clear();
        return Promise.resolve(ok(true));
      }

      const prefix = keys.getRealmPrefix(realm);
      const matching = [...lru.keys()].filter((key) => key.startsWith(prefix));
      for (const key of matching) {
        lru.delete(key);
      }
      log.debug({ realm, removed: matching.length }, 'Cleared memory realm');
      return Promise.resolve(ok(true));
    },

    exists(id: string, realm = DEFAULT_REALM) {
      return Promise.resolve(ok(liveEntry(keys.build(realm, id)) !== undefined));
    },

    get(id: string, realm = DEFAULT_REALM) {
      const key = keys.build(realm, id);
      const entry = liveEntry(key);
      if (entry === undefined) {
        return Promise.resolve(ok(undefined));
      }

      const result = deserialize(entry.image);
      if (result.isErr()) {
        // Corrupted entry, remove it
        lru.delete(key);
        return Promise.resolve(ok(undefined));
      }
      return Promise.resolve(ok(result.value));
    },

    remove(id: string, realm = DEFAULT_REALM) {
      const key = keys.build(realm, id);
      const existed = liveEntry(key) !== undefined;
      lru.delete(key);
      return Promise.resolve(ok(existed));
    },

    store(id: string, data: unknown, realm = DEFAULT_REALM, ttlMs = DEFAULT_TTL_MS) {
      const image = serialize(data);
      if (image.isErr()) {
        return Promise.resolve(err(image.error));
      }

      const key = keys.build(realm, id);
      lru.set(key, { image: image.value, expiresAt: ttlMs > 0 ? clock() + ttlMs : 0 });

      // lru-cache refuses entries larger than the whole cache
      const stored = lru.has(key);
      if (!stored) {
        log.warn({ id, realm, bytes: image.value.length }, 'Entry exceeds memory store size');
      }
      return Promise.resolve(ok(stored));
    },

    getInfo(): Promise<MemoryUsage> {
      const occupied = lru.calculatedSize;
      return Promise.resolve({ available: maxBytes - occupied, occupied, max: maxBytes });
    },

    close() {
      lru.clear();
      return Promise.resolve();
    },
  };

  const counter = createComposedCounter(store);

  return { ...store, inc: counter.inc, dec: counter.dec };
};
