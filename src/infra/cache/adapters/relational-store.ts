/**
 * Relational Store Implementation
 *
 * Kysely-based dynamic store over the cache_entries table. Slower than the
 * file store, but shared by every process using the same database.
 *
 * Writes go straight to the table; wrap it with createWriteBackStore() to
 * buffer them until the end of the process.
 */

import { err, ok } from 'neverthrow';

import {
  CacheError,
  DEFAULT_REALM,
  UNKNOWN_MEMORY_USAGE,
  systemClock,
  type BatchWriter,
  type CacheResult,
  type Clock,
  type DynamicStore,
  type EntryKey,
  type MemoryUsage,
  type PendingStore,
} from '../ports.js';
import { deserialize, serialize } from '../serialization.js';

import type { CacheDbClient } from '../../database/client.js';
import type { ExpressionBuilder } from 'kysely';
import type { CacheDatabase } from '../../database/cache/types.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface RelationalStore extends DynamicStore, BatchWriter {
  /**
   * Load every auto-load row of the given realm(s) into the preloaded variables.
   * @returns Number of rows loaded
   */
  getAll(realms: string | readonly string[]): CacheResult<number>;

  /** Value loaded by getAll() under this entry name, if any. */
  preloaded(name: string): unknown;

  /**
   * Delete rows whose expiration has passed.
   * @returns Number of rows removed
   */
  gc(): CacheResult<number>;
}

export interface RelationalStoreOptions {
  db: CacheDbClient;
  logger: Logger;
  clock?: Clock;
}

interface BufferedValue {
  value: unknown;
  expiresAt: number;
}

interface EntryRow {
  name: string;
  realm: string;
  expires_at: number;
  value: string;
}

type EntryExpressionBuilder = ExpressionBuilder<CacheDatabase, 'cache_entries'>;

const bufferKey = (realm: string, id: string): string => `${realm}\u0000${id}`;

/** Rows per upsert statement (four bind parameters each) */
const UPSERT_CHUNK_SIZE = 500;
/** Keys per delete statement; SQLite caps the depth of an OR chain */
const DELETE_CHUNK_SIZE = 200;

const chunked = <T>(items: readonly T[], size: number): T[][] => {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
};

// ─────────────────────────────────────────────────────────────────────────────
// Store Implementation
// ─────────────────────────────────────────────────────────────────────────────

class KyselyRelationalStore implements RelationalStore {
  private readonly db: CacheDbClient;
  private readonly log: Logger;
  private readonly clock: Clock;
  /** Rows fetched by exists(), served once to the following get() */
  private readonly buffer = new Map<string, BufferedValue>();
  private readonly variables = new Map<string, unknown>();

  constructor(options: RelationalStoreOptions) {
    this.db = options.db;
    this.log = options.logger.child({ store: 'db' });
    this.clock = options.clock ?? systemClock;
  }

  private expiresAt(ttlMs: number): number {
    return ttlMs > 0 ? this.clock() + ttlMs : 0;
  }

  private notExpired(now: number) {
    return (eb: EntryExpressionBuilder) =>
      eb.or([eb('expires_at', '=', 0), eb('expires_at', '>', now)]);
  }

  private forgetRealm(realm: string): void {
    if (realm === '') {
      this.buffer.clear();
      return;
    }
    const prefix = bufferKey(realm, '');
    for (const key of this.buffer.keys()) {
      if (key.startsWith(prefix)) {
        this.buffer.delete(key);
      }
    }
  }

  async gc(): CacheResult<number> {
    const now = this.clock();
    try {
      const result = await this.db
        .deleteFrom('cache_entries')
        .where('expires_at', '>', 0)
        .where('expires_at', '<', now)
        .executeTakeFirst();
      const removed = Number(result.numDeletedRows);
      this.log.info({ removed }, 'Expired cache rows collected');
      return ok(removed);
    } catch (error) {
      this.log.error({ err: error }, 'Cache garbage collection failed');
      return err(CacheError.storage('Failed to collect expired cache rows', error));
    }
  }

  async clear(realm = ''): CacheResult<boolean> {
    try {
      if (realm === '') {
        await this.db.deleteFrom('cache_entries').execute();
      } else {
        await this.db.deleteFrom('cache_entries').where('realm', '=', realm).execute();
      }
      this.forgetRealm(realm);
      return ok(true);
    } catch (error) {
      this.log.error({ err: error, realm }, 'Failed to clear cache rows');
      return err(CacheError.storage('Failed to clear cache rows', error));
    }
  }

  async exists(id: string, realm = DEFAULT_REALM): CacheResult<boolean> {
    const now = this.clock();
    const key = bufferKey(realm, id);

    try {
      const row = await this.db
        .selectFrom('cache_entries')
        .select(['value', 'expires_at'])
        .where('realm', '=', realm)
        .where('name', '=', id)
        .where(this.notExpired(now))
        .executeTakeFirst();

      if (row === undefined) {
        this.buffer.delete(key);
        return ok(false);
      }

      const value = deserialize(row.value);
      if (value.isErr()) {
        this.log.warn({ id, realm }, 'Corrupted cache row treated as absent');
        this.buffer.delete(key);
        return ok(false);
      }

      this.buffer.set(key, { value: value.value, expiresAt: Number(row.expires_at) });
      return ok(true);
    } catch (error) {
      this.log.error({ err: error, id, realm }, 'Failed to look up cache row');
      return err(CacheError.storage(`Failed to look up cache row ${realm}/${id}`, error));
    }
  }

  async get(id: string, realm = DEFAULT_REALM): CacheResult<unknown> {
    const key = bufferKey(realm, id);
    const buffered = this.buffer.get(key);
    if (buffered !== undefined) {
      this.buffer.delete(key);
      if (buffered.expiresAt === 0 || buffered.expiresAt > this.clock()) {
        return ok(buffered.value);
      }
    }

    const found = await this.exists(id, realm);
    if (found.isErr()) {
      return err(found.error);
    }
    if (!found.value) {
      return ok(undefined);
    }

    const fetched = this.buffer.get(key);
    this.buffer.delete(key);
    return ok(fetched?.value);
  }

  async getAll(realms: string | readonly string[]): CacheResult<number> {
    const realmList = typeof realms === 'string' ? [realms] : [...realms];
    if (realmList.length === 0) {
      return ok(0);
    }

    try {
      const rows = await this.db
        .selectFrom('cache_entries')
        .select(['name', 'value'])
        .where('auto_load', '=', 1)
        .where('realm', 'in', realmList)
        .where(this.notExpired(this.clock()))
        .execute();

      let loaded = 0;
      for (const row of rows) {
        const value = deserialize(row.value);
        if (value.isErr()) {
          this.log.warn({ name: row.name }, 'Skipping corrupted auto-load row');
          continue;
        }
        this.variables.set(row.name, value.value);
        loaded++;
      }

      this.log.debug({ realms: realmList, loaded }, 'Auto-loaded cache rows');
      return ok(loaded);
    } catch (error) {
      this.log.error({ err: error, realms: realmList }, 'Failed to auto-load cache rows');
      return err(CacheError.storage('Failed to auto-load cache rows', error));
    }
  }

  preloaded(name: string): unknown {
    return this.variables.get(name);
  }

  async remove(id: string, realm = DEFAULT_REALM): CacheResult<boolean> {
    this.buffer.delete(bufferKey(realm, id));
    try {
      const result = await this.db
        .deleteFrom('cache_entries')
        .where('realm', '=', realm)
        .where('name', '=', id)
        .executeTakeFirst();
      return ok(Number(result.numDeletedRows) > 0);
    } catch (error) {
      this.log.error({ err: error, id, realm }, 'Failed to remove cache row');
      return err(CacheError.storage(`Failed to remove cache row ${realm}/${id}`, error));
    }
  }

  async store(id: string, data: unknown, realm = DEFAULT_REALM, ttlMs = 0): CacheResult<boolean> {
    const image = serialize(data);
    if (image.isErr()) {
      return err(image.error);
    }

    const result = await this.storeMany([
      { id, realm, image: image.value, ttlMs, expiresAt: this.expiresAt(ttlMs) },
    ]);
    if (result.isErr()) {
      return err(result.error);
    }
    return ok(result.value === 1);
  }

  async storeMany(entries: readonly PendingStore[]): CacheResult<number> {
    // One statement cannot upsert the same key twice; keep the last write
    const rows = new Map<string, EntryRow>();
    for (const entry of entries) {
      const key = bufferKey(entry.realm, entry.id);
      this.buffer.delete(key);
      rows.delete(key);
      rows.set(key, {
        name: entry.id,
        realm: entry.realm,
        expires_at: entry.expiresAt,
        value: entry.image,
      });
    }

    if (rows.size === 0) {
      return ok(0);
    }

    try {
      await this.db.transaction().execute(async (trx) => {
        for (const chunk of chunked([...rows.values()], UPSERT_CHUNK_SIZE)) {
          await trx
            .insertInto('cache_entries')
            .values(chunk)
            .onConflict((oc) =>
              oc.columns(['name', 'realm']).doUpdateSet((eb) => ({
                value: eb.ref('excluded.value'),
                expires_at: eb.ref('excluded.expires_at'),
              }))
            )
            .execute();
        }
      });
      return ok(rows.size);
    } catch (error) {
      this.log.error({ err: error, count: rows.size }, 'Failed to upsert cache rows');
      return err(CacheError.storage('Failed to upsert cache rows', error));
    }
  }

  async removeMany(keys: readonly EntryKey[]): CacheResult<number> {
    if (keys.length === 0) {
      return ok(0);
    }
    for (const key of keys) {
      this.buffer.delete(bufferKey(key.realm, key.id));
    }

    try {
      const removed = await this.db.transaction().execute(async (trx) => {
        let total = 0;
        for (const chunk of chunked(keys, DELETE_CHUNK_SIZE)) {
          const result = await trx
            .deleteFrom('cache_entries')
            .where((eb) =>
              eb.or(
                chunk.map((key) => eb.and([eb('name', '=', key.id), eb('realm', '=', key.realm)]))
              )
            )
            .executeTakeFirst();
          total += Number(result.numDeletedRows);
        }
        return total;
      });
      return ok(removed);
    } catch (error) {
      this.log.error({ err: error, count: keys.length }, 'Failed to delete cache rows');
      return err(CacheError.storage('Failed to delete cache rows', error));
    }
  }

  getInfo(): Promise<MemoryUsage> {
    return Promise.resolve(UNKNOWN_MEMORY_USAGE);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Create the relational store and collect expired rows.
 * A failed collection is logged; the store stays usable.
 */
export const createRelationalStore = async (
  options: RelationalStoreOptions
): Promise<RelationalStore> => {
  const store = new KyselyRelationalStore(options);
  await store.gc();
  return store;
};
