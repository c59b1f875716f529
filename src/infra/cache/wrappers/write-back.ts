/**
 * Write-back wrapper for dynamic stores.
 *
 * store/remove calls are queued in memory and persisted by flush() as one
 * batched delete followed by one batched upsert. Values are serialized when
 * queued, so later changes to the caller's object do not reach the table.
 * Queued writes are visible to reads in this process immediately; other
 * processes see them after the flush.
 */

import { err, ok } from 'neverthrow';

import {
  DEFAULT_REALM,
  systemClock,
  type BatchWriter,
  type CacheError,
  type CacheResult,
  type Clock,
  type DynamicStore,
  type EntryKey,
  type FlushSummary,
  type PendingStore,
  type WriteBackStore,
} from '../ports.js';
import { deserialize, serialize } from '../serialization.js';

import type { Logger } from 'pino';

export interface WriteBackOptions {
  logger: Logger;
  clock?: Clock;
}

const entryKey = (realm: string, id: string): string => `${realm}\u0000${id}`;

/**
 * Wrap a store so that its writes are buffered until flush() or close().
 */
export const createWriteBackStore = (
  inner: DynamicStore & BatchWriter,
  options: WriteBackOptions
): WriteBackStore => {
  const log = options.logger.child({ wrapper: 'write-back' });
  const clock = options.clock ?? systemClock;

  /** Pending upserts, one per key, last write wins */
  const pendingStores = new Map<string, PendingStore>();
  /** Pending deletions, applied before the upserts */
  const pendingRemovals = new Map<string, EntryKey>();

  let closing: CacheResult<FlushSummary> | undefined;

  const isLive = (entry: PendingStore): boolean =>
    entry.expiresAt === 0 || entry.expiresAt > clock();

  const discardPending = (realm: string, id: string): void => {
    const key = entryKey(realm, id);
    pendingStores.delete(key);
    pendingRemovals.delete(key);
  };

  const discardRealm = (realm: string): void => {
    if (realm === '') {
      pendingStores.clear();
      pendingRemovals.clear();
      return;
    }
    for (const [key, entry] of pendingStores) {
      if (entry.realm === realm) pendingStores.delete(key);
    }
    for (const [key, entry] of pendingRemovals) {
      if (entry.realm === realm) pendingRemovals.delete(key);
    }
  };

  const storeNow = async (
    id: string,
    data: unknown,
    realm: string = DEFAULT_REALM,
    ttlMs = 0
  ): CacheResult<boolean> => {
    discardPending(realm, id);
    return inner.store(id, data, realm, ttlMs);
  };

  const removeNow = async (id: string, realm: string = DEFAULT_REALM): CacheResult<boolean> => {
    discardPending(realm, id);
    return inner.remove(id, realm);
  };

  const flush = async (): CacheResult<FlushSummary> => {
    const removals = [...pendingRemovals.values()];
    const stores = [...pendingStores.values()];
    pendingRemovals.clear();
    pendingStores.clear();

    const summary: FlushSummary = { removed: 0, stored: 0 };
    let firstError: CacheError | undefined;

    // A failed removal batch does not stop the upserts
    if (removals.length > 0) {
      const removed = await inner.removeMany(removals);
      if (removed.isErr()) {
        log.error(
          { err: removed.error, pending: removals.length },
          'Write-back removal batch failed'
        );
        firstError = removed.error;
      } else {
        summary.removed = removed.value;
      }
    }

    if (stores.length > 0) {
      const stored = await inner.storeMany(stores);
      if (stored.isErr()) {
        log.error({ err: stored.error, pending: stores.length }, 'Write-back store batch failed');
        firstError ??= stored.error;
      } else {
        summary.stored = stored.value;
      }
    }

    if (firstError !== undefined) {
      return err(firstError);
    }

    if (removals.length > 0 || stores.length > 0) {
      log.info(summary, 'Write-back buffer flushed');
    }
    return ok(summary);
  };

  return {
    async clear(realm = '') {
      discardRealm(realm);
      return inner.clear(realm);
    },

    async exists(id: string, realm = DEFAULT_REALM) {
      const key = entryKey(realm, id);
      const pending = pendingStores.get(key);
      if (pending !== undefined) {
        return ok(isLive(pending));
      }
      if (pendingRemovals.has(key)) {
        return ok(false);
      }
      return inner.exists(id, realm);
    },

    async get(id: string, realm = DEFAULT_REALM) {
      const key = entryKey(realm, id);
      const pending = pendingStores.get(key);
      if (pending !== undefined) {
        // Fresh copy per read
        return isLive(pending) ? deserialize(pending.image) : ok(undefined);
      }
      if (pendingRemovals.has(key)) {
        return ok(undefined);
      }
      return inner.get(id, realm);
    },

    /**
     * Queue a removal. Resolves to true only when a live queued store was
     * cancelled; whether the durable row exists is not known until the flush.
     */
    async remove(id: string, realm = DEFAULT_REALM) {
      if (closing !== undefined) {
        return removeNow(id, realm);
      }

      const key = entryKey(realm, id);
      const pending = pendingStores.get(key);
      pendingStores.delete(key);
      pendingRemovals.set(key, { id, realm });
      return ok(pending !== undefined && isLive(pending));
    },

    async store(id: string, data: unknown, realm = DEFAULT_REALM, ttlMs = 0) {
      if (closing !== undefined) {
        return storeNow(id, data, realm, ttlMs);
      }

      const image = serialize(data);
      if (image.isErr()) {
        return err(image.error);
      }

      const key = entryKey(realm, id);
      // Re-insert so the batch keeps program order
      pendingStores.delete(key);
      pendingStores.set(key, {
        id,
        realm,
        image: image.value,
        ttlMs,
        expiresAt: ttlMs > 0 ? clock() + ttlMs : 0,
      });
      return ok(true);
    },

    getInfo() {
      return inner.getInfo();
    },

    storeNow,
    removeNow,
    flush,

    close() {
      if (closing === undefined) {
        closing = flush();
      }
      return closing;
    },

    pendingCount() {
      return pendingStores.size + pendingRemovals.size;
    },
  };
};
