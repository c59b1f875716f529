import { ok } from 'neverthrow';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  BINDING_MIRROR_ID,
  createBindingRegistry,
  makeBindingRepo,
  type BindingRegistry,
  type BindingRepository,
} from '@/infra/cache/bindings/index.js';

import { makeCacheDb } from '../../../fixtures/cache-db.js';
import { makeTestLogger } from '../../../fixtures/fakes.js';

import type { CacheResult } from '@/infra/cache/ports.js';
import type { CacheDbClient } from '@/infra/database/client.js';

const makeMirrorStore = () => {
  const writes: { id: string; data: unknown; realm: string | undefined }[] = [];
  return {
    writes,
    store: vi.fn(
      async (id: string, data: unknown, realm?: string): CacheResult<boolean> => {
        writes.push({ id, data, realm });
        return ok(true);
      }
    ),
  };
};

describe('BindingRepo', () => {
  let db: CacheDbClient;
  let repo: BindingRepository;

  beforeEach(async () => {
    db = await makeCacheDb();
    repo = makeBindingRepo({ db, logger: makeTestLogger() });
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('inserts a binding once', async () => {
    const binding = { event: 'page.saved', id: 'menu', realm: 'pages', tier: 'mem' } as const;

    expect((await repo.insert(binding))._unsafeUnwrap()).toBe(true);
    expect((await repo.insert(binding))._unsafeUnwrap()).toBe(false);
    expect((await repo.listAll())._unsafeUnwrap()).toEqual([binding]);
  });

  it('counts only new rows in a batch', async () => {
    await repo.insert({ event: 'e', id: 'a', realm: 'r', tier: 'all' });

    const inserted = await repo.insertMany([
      { event: 'e', id: 'a', realm: 'r', tier: 'all' },
      { event: 'e', id: 'b', realm: 'r', tier: 'all' },
    ]);

    expect(inserted._unsafeUnwrap()).toBe(1);
  });

  it('deletes by realm, optionally narrowed to one entry', async () => {
    await repo.insertMany([
      { event: 'e', id: 'a', realm: 'r1', tier: 'all' },
      { event: 'e', id: 'b', realm: 'r1', tier: 'all' },
      { event: 'e', id: 'a', realm: 'r2', tier: 'all' },
    ]);

    expect((await repo.deleteByRealm('r1', 'a'))._unsafeUnwrap()).toBe(1);
    expect((await repo.deleteByRealm('r1'))._unsafeUnwrap()).toBe(1);

    const remaining = (await repo.listAll())._unsafeUnwrap();
    expect(remaining.map((binding) => `${binding.realm}/${binding.id}`)).toEqual(['r2/a']);
  });

  it('skips rows with an unknown tier', async () => {
    await db
      .insertInto('cache_bindings')
      .values({ event: 'e', entry_id: 'a', realm: 'r', tier: 'apc' })
      .execute();

    expect((await repo.listAll())._unsafeUnwrap()).toEqual([]);
  });
});

describe('BindingRegistry', () => {
  let db: CacheDbClient;
  let repo: BindingRepository;
  let mirrorStore: ReturnType<typeof makeMirrorStore>;
  let registry: BindingRegistry;

  beforeEach(async () => {
    db = await makeCacheDb();
    repo = makeBindingRepo({ db, logger: makeTestLogger() });
    mirrorStore = makeMirrorStore();
    registry = createBindingRegistry({
      repository: repo,
      db: mirrorStore,
      logger: makeTestLogger(),
    });
  });

  afterEach(async () => {
    await db.destroy();
  });

  describe('warm', () => {
    it('installs a valid mirror without touching the table', async () => {
      const listAll = vi.spyOn(repo, 'listAll');

      await registry.warm({ 'page.saved': [{ id: 'menu', realm: 'pages', tier: 'mem' }] });

      expect(registry.lookup('page.saved')).toEqual([{ id: 'menu', realm: 'pages', tier: 'mem' }]);
      expect(listAll).not.toHaveBeenCalled();
      expect(mirrorStore.writes).toEqual([]);
    });

    it('rebuilds and persists the mirror when none was loaded', async () => {
      await repo.insert({ event: 'page.saved', id: 'menu', realm: 'pages', tier: 'all' });

      await registry.warm(undefined);

      expect(registry.lookup('page.saved')).toEqual([{ id: 'menu', realm: 'pages', tier: 'all' }]);
      expect(mirrorStore.writes).toEqual([
        {
          id: BINDING_MIRROR_ID,
          data: { 'page.saved': [{ id: 'menu', realm: 'pages', tier: 'all' }] },
          realm: 'system',
        },
      ]);
    });

    it('rebuilds the mirror when the loaded one is malformed', async () => {
      await repo.insert({ event: 'page.saved', id: 'menu', realm: 'pages', tier: 'disk' });

      await registry.warm({ 'page.saved': [{ id: 'menu', tier: 'nowhere' }] });

      expect(registry.lookup('page.saved')).toEqual([{ id: 'menu', realm: 'pages', tier: 'disk' }]);
      expect(mirrorStore.writes).toHaveLength(1);
    });
  });

  describe('bind / unbind', () => {
    beforeEach(async () => {
      await registry.warm({});
    });

    it('makes a binding visible to lookup at once', async () => {
      expect(await registry.bind('page.saved', 'menu', 'pages', 'mem')).toBe(true);

      expect(registry.lookup('page.saved')).toEqual([{ id: 'menu', realm: 'pages', tier: 'mem' }]);
      expect(registry.isDirty()).toBe(true);
    });

    it('does not duplicate a target bound twice', async () => {
      await registry.bind('page.saved', 'menu', 'pages', 'mem');
      await registry.bind('page.saved', 'menu', 'pages', 'mem');

      expect(registry.lookup('page.saved')).toHaveLength(1);
    });

    it('binds a batch and reports the rows added', async () => {
      const added = await registry.bindArray([
        { event: 'a', id: 'x', realm: 'r', tier: 'all' },
        { event: 'b', id: 'y', realm: 'r', tier: 'db' },
      ]);

      expect(added).toBe(2);
      expect(registry.lookup('b')).toEqual([{ id: 'y', realm: 'r', tier: 'db' }]);
    });

    it('removes one entry or a whole realm from the mirror', async () => {
      await registry.bindArray([
        { event: 'e', id: 'x', realm: 'r1', tier: 'all' },
        { event: 'e', id: 'y', realm: 'r1', tier: 'all' },
        { event: 'e', id: 'x', realm: 'r2', tier: 'all' },
        { event: 'f', id: 'z', realm: 'r1', tier: 'all' },
      ]);

      expect(await registry.unbind('r1', 'x')).toBe(1);
      expect(registry.lookup('e').map((target) => `${target.realm}/${target.id}`)).toEqual([
        'r1/y',
        'r2/x',
      ]);

      expect(await registry.unbind('r1')).toBe(2);
      expect(registry.lookup('e').map((target) => `${target.realm}/${target.id}`)).toEqual([
        'r2/x',
      ]);
      expect(registry.lookup('f')).toEqual([]);
    });

    it('treats an empty id as the whole realm', async () => {
      await registry.bindArray([
        { event: 'e', id: 'x', realm: 'r1', tier: 'all' },
        { event: 'e', id: 'y', realm: 'r1', tier: 'all' },
        { event: 'e', id: 'x', realm: 'r2', tier: 'all' },
      ]);

      expect(await registry.unbind('r1', '')).toBe(2);
      expect(registry.lookup('e')).toEqual([{ id: 'x', realm: 'r2', tier: 'all' }]);
    });

    it('stays clean when nothing was unbound', async () => {
      expect(await registry.unbind('nowhere')).toBe(0);

      expect(registry.isDirty()).toBe(false);
    });
  });

  describe('close', () => {
    it('persists the mirror only when bindings changed', async () => {
      await registry.warm({});

      await registry.close();
      expect(mirrorStore.writes).toEqual([]);

      await registry.bind('page.saved', 'menu', 'pages', 'mem');
      await registry.close();

      expect(mirrorStore.writes).toEqual([
        {
          id: BINDING_MIRROR_ID,
          data: { 'page.saved': [{ id: 'menu', realm: 'pages', tier: 'mem' }] },
          realm: 'system',
        },
      ]);
      expect(registry.isDirty()).toBe(false);
    });
  });
});
