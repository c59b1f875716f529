/**
 * Unit tests for cache client wiring
 */

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createMemoryStore } from '@/infra/cache/adapters/memory-store.js';
import { initCache } from '@/infra/cache/index.js';

import { makeTestConfig } from '../../../fixtures/builders.js';
import { listEntryRows, makeCacheDb } from '../../../fixtures/cache-db.js';
import { makeTestLogger } from '../../../fixtures/fakes.js';

import type { CacheDbClient } from '@/infra/database/client.js';

describe('initCache', () => {
  let dir: string;
  let db: CacheDbClient;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cache-client-'));
    db = await makeCacheDb();
  });

  afterEach(async () => {
    await db.destroy();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('returns a controller over the given database client', async () => {
    const client = await initCache({
      config: makeTestConfig({ cache: { dir } }),
      logger: makeTestLogger(),
      db,
    });

    expect(client.db).toBe(db);
    expect(client.cache.getMemDriver()).toBe('memory');

    await client.cache.close();
  });

  it('throws when the disk cache directory does not exist', async () => {
    await expect(
      initCache({
        config: makeTestConfig({ cache: { dir: path.join(dir, 'missing') } }),
        logger: makeTestLogger(),
        db,
      })
    ).rejects.toThrow();
  });

  it('checks the given driver definitions instead of the defaults', async () => {
    const client = await initCache({
      config: makeTestConfig({ cache: { dir } }),
      logger: makeTestLogger(),
      db,
      drivers: [
        {
          id: 'memory',
          isSupported: () => false,
          create: () => createMemoryStore({ maxBytes: 1024, logger: makeTestLogger() }),
        },
      ],
    });

    expect(client.cache.getMemDriver()).toBeNull();

    await client.cache.close();
  });

  it('persists buffered db writes when the controller closes', async () => {
    const { cache } = await initCache({
      config: makeTestConfig({ cache: { dir } }),
      logger: makeTestLogger(),
      db,
    });

    await cache.dbSet('greeting', 'hello', 'pages');
    expect((await listEntryRows(db)).some((row) => row.name === 'greeting')).toBe(false);

    await cache.close();

    const rows = await listEntryRows(db);
    expect(rows.find((row) => row.name === 'greeting')?.value).toBe('"hello"');
  });
});
