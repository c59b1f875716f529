import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  createRelationalStore,
  type RelationalStore,
} from '@/infra/cache/adapters/relational-store.js';

import { listEntryRows, makeCacheDb } from '../../../fixtures/cache-db.js';
import { makeManualClock, makeTestLogger, type ManualClock } from '../../../fixtures/fakes.js';

import type { CacheDbClient } from '@/infra/database/client.js';

describe('RelationalStore', () => {
  let db: CacheDbClient;
  let clock: ManualClock;
  let store: RelationalStore;

  beforeEach(async () => {
    db = await makeCacheDb();
    clock = makeManualClock();
    store = await createRelationalStore({ db, logger: makeTestLogger(), clock: clock.now });
  });

  afterEach(async () => {
    await db.destroy();
  });

  describe('store / get', () => {
    it('upserts a row and reads it back', async () => {
      expect((await store.store('home', { title: 'Home' }, 'pages'))._unsafeUnwrap()).toBe(true);

      expect((await store.get('home', 'pages'))._unsafeUnwrap()).toEqual({ title: 'Home' });
      expect(await listEntryRows(db)).toEqual([
        { name: 'home', realm: 'pages', expires_at: 0, auto_load: 1, value: '{"title":"Home"}' },
      ]);
    });

    it('overwrites the row on a second store', async () => {
      await store.store('home', 'v1', 'pages');
      await store.store('home', 'v2', 'pages');

      const rows = await listEntryRows(db);
      expect(rows.map((row) => row.value)).toEqual(['"v2"']);
    });

    it('stores the absolute expiration for a TTL', async () => {
      await store.store('home', 'v', 'pages', 5_000);

      const rows = await listEntryRows(db);
      expect(rows[0]?.expires_at).toBe(clock.now() + 5_000);
    });

    it('hides rows once their TTL has elapsed', async () => {
      await store.store('home', 'v', 'pages', 1_000);

      clock.advance(999);
      expect((await store.get('home', 'pages'))._unsafeUnwrap()).toBe('v');

      clock.advance(1);
      expect((await store.get('home', 'pages'))._unsafeUnwrap()).toBeUndefined();
      expect((await store.exists('home', 'pages'))._unsafeUnwrap()).toBe(false);
    });

    it('rejects a value that cannot be serialized', async () => {
      const result = await store.store('big', 10n, 'pages');

      expect(result._unsafeUnwrapErr().type).toBe('SerializationError');
      expect(await listEntryRows(db)).toEqual([]);
    });

    it('returns undefined for a missing row', async () => {
      expect((await store.get('nothing', 'pages'))._unsafeUnwrap()).toBeUndefined();
    });
  });

  describe('read buffer', () => {
    it('serves the get that follows exists without querying again', async () => {
      await store.store('home', 'v', 'pages');
      expect((await store.exists('home', 'pages'))._unsafeUnwrap()).toBe(true);

      // Deleted behind the store's back: only the buffer still has it
      await db.deleteFrom('cache_entries').execute();

      expect((await store.get('home', 'pages'))._unsafeUnwrap()).toBe('v');
      expect((await store.get('home', 'pages'))._unsafeUnwrap()).toBeUndefined();
    });

    it('is invalidated by a store', async () => {
      await store.store('home', 'v1', 'pages');
      await store.exists('home', 'pages');

      await store.store('home', 'v2', 'pages');

      expect((await store.get('home', 'pages'))._unsafeUnwrap()).toBe('v2');
    });

    it('is invalidated by a remove', async () => {
      await store.store('home', 'v', 'pages');
      await store.exists('home', 'pages');

      await store.remove('home', 'pages');

      expect((await store.get('home', 'pages'))._unsafeUnwrap()).toBeUndefined();
    });
  });

  describe('remove', () => {
    it('deletes the row and reports false when it is absent', async () => {
      await store.store('home', 'v', 'pages');

      expect((await store.remove('home', 'pages'))._unsafeUnwrap()).toBe(true);
      expect((await store.remove('home', 'pages'))._unsafeUnwrap()).toBe(false);
      expect(await listEntryRows(db)).toEqual([]);
    });
  });

  describe('storeMany / removeMany', () => {
    it('keeps only the last value for a repeated key', async () => {
      const written = await store.storeMany([
        { id: 'k', realm: 'r', image: '"v1"', ttlMs: 0, expiresAt: 0 },
        { id: 'k', realm: 'r', image: '"v2"', ttlMs: 0, expiresAt: 0 },
        { id: 'j', realm: 'r', image: '"v3"', ttlMs: 0, expiresAt: 0 },
      ]);

      expect(written._unsafeUnwrap()).toBe(2);
      const rows = await listEntryRows(db);
      expect(rows.map((row) => [row.name, row.value])).toEqual([
        ['j', '"v3"'],
        ['k', '"v2"'],
      ]);
    });

    it('writes batches larger than one statement', async () => {
      const entries = Array.from({ length: 1_200 }, (_, i) => ({
        id: `k${String(i)}`,
        realm: 'bulk',
        image: String(i),
        ttlMs: 0,
        expiresAt: 0,
      }));

      expect((await store.storeMany(entries))._unsafeUnwrap()).toBe(1_200);
      expect(await listEntryRows(db)).toHaveLength(1_200);
      expect((await store.get('k1199', 'bulk'))._unsafeUnwrap()).toBe(1199);
    });

    it('deletes batches larger than one statement', async () => {
      const entries = Array.from({ length: 1_500 }, (_, i) => ({
        id: `k${String(i)}`,
        realm: 'bulk',
        image: '1',
        ttlMs: 0,
        expiresAt: 0,
      }));
      await store.storeMany(entries);

      const removed = await store.removeMany(entries.map(({ id, realm }) => ({ id, realm })));

      expect(removed._unsafeUnwrap()).toBe(1_500);
      expect(await listEntryRows(db)).toEqual([]);
    });

    it('deletes every listed key in one call', async () => {
      await store.store('a', 1, 'r1');
      await store.store('b', 2, 'r1');
      await store.store('a', 3, 'r2');

      const removed = await store.removeMany([
        { id: 'a', realm: 'r1' },
        { id: 'a', realm: 'r2' },
        { id: 'missing', realm: 'r1' },
      ]);

      expect(removed._unsafeUnwrap()).toBe(2);
      expect((await listEntryRows(db)).map((row) => `${row.realm}/${row.name}`)).toEqual([
        'r1/b',
      ]);
    });
  });

  describe('clear', () => {
    it('clears one realm and leaves the others intact', async () => {
      await store.store('a', 1, 'r1');
      await store.store('b', 2, 'r2');

      await store.clear('r1');

      expect((await listEntryRows(db)).map((row) => `${row.realm}/${row.name}`)).toEqual([
        'r2/b',
      ]);
    });

    it('truncates the table when the realm is empty', async () => {
      await store.store('a', 1, 'r1');
      await store.store('b', 2, 'r2');

      await store.clear();

      expect(await listEntryRows(db)).toEqual([]);
    });
  });

  describe('gc', () => {
    it('deletes expired rows and keeps unlimited ones', async () => {
      await store.store('short', 1, 'r', 1_000);
      await store.store('forever', 2, 'r', 0);
      await store.store('long', 3, 'r', 60_000);

      clock.advance(2_000);

      expect((await store.gc())._unsafeUnwrap()).toBe(1);
      expect((await listEntryRows(db)).map((row) => row.name)).toEqual(['forever', 'long']);
    });

    it('runs when the store is created', async () => {
      await store.store('short', 1, 'r', 1_000);
      clock.advance(2_000);

      await createRelationalStore({ db, logger: makeTestLogger(), clock: clock.now });

      expect(await listEntryRows(db)).toEqual([]);
    });
  });

  describe('getAll', () => {
    it('loads auto-load rows of the requested realms', async () => {
      await store.store('site_title', 'Tiered', 'system');
      await store.store('menu', ['home'], 'default');
      await store.store('other', 'x', 'elsewhere');
      await store.store('manual', 'y', 'default');
      await db
        .updateTable('cache_entries')
        .set({ auto_load: 0 })
        .where('name', '=', 'manual')
        .execute();

      const loaded = await store.getAll(['system', 'default']);

      expect(loaded._unsafeUnwrap()).toBe(2);
      expect(store.preloaded('site_title')).toBe('Tiered');
      expect(store.preloaded('menu')).toEqual(['home']);
      expect(store.preloaded('other')).toBeUndefined();
      expect(store.preloaded('manual')).toBeUndefined();
    });

    it('accepts a single realm and skips expired rows', async () => {
      await store.store('fresh', 1, 'r', 10_000);
      await store.store('stale', 2, 'r', 1_000);
      clock.advance(5_000);

      expect((await store.getAll('r'))._unsafeUnwrap()).toBe(1);
      expect(store.preloaded('fresh')).toBe(1);
      expect(store.preloaded('stale')).toBeUndefined();
    });

    it('loads nothing for an empty realm list', async () => {
      expect((await store.getAll([]))._unsafeUnwrap()).toBe(0);
    });
  });

  describe('errors', () => {
    it('returns StorageError once the database is gone', async () => {
      await db.destroy();

      const result = await store.get('home', 'pages');

      expect(result._unsafeUnwrapErr().type).toBe('StorageError');
      db = await makeCacheDb();
    });
  });

  it('reports unknown memory usage', async () => {
    expect(await store.getInfo()).toEqual({ available: -1, occupied: -1, max: -1 });
  });
});
