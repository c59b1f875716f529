/**
 * Cache Controller
 *
 * Single entry point to the three tiers:
 * - disk: static files for large, rarely modified data
 * - db:   relational rows, buffered and written back at close
 * - mem:  volatile accelerator picked from the driver registry, or the db
 *         tier itself when no driver is available
 *
 * Plus event bindings that remove entries from their tiers on trigger().
 *
 * Every operation degrades silently: driver errors are logged and read as
 * misses, never thrown.
 */

import { createBindingRegistry } from './bindings/binding-registry.js';
import { BINDING_MIRROR_ID, type Binding, type BindingRepository } from './bindings/ports.js';
import { createComposedCounter } from './counters.js';
import {
  CacheTier,
  DEFAULT_REALM,
  DEFAULT_TTL_MS,
  SYSTEM_REALM,
  UNKNOWN_MEMORY_USAGE,
  type AtomicCounter,
  type CacheStore,
  type DynamicStore,
  type MemoryUsage,
  type StaticStore,
  type VolatileDriverId,
  type VolatileStore,
  type WriteBackStore,
} from './ports.js';
import {
  createSilentCounter,
  createSilentStore,
  type SilentStore,
} from './wrappers/silent-cache.js';

import type { RelationalStore } from './adapters/relational-store.js';
import type { DriverRegistry } from './registry.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/** Binding as accepted by bindArray(); realm and tier take their defaults */
export interface BindingInput {
  event: string;
  id: string;
  realm?: string;
  tier?: CacheTier;
}

export interface CacheController {
  diskGet(id: string, realm?: string): Promise<unknown>;
  diskSet(id: string, data: unknown, realm?: string): Promise<boolean>;
  diskUnset(id: string, realm?: string): Promise<boolean>;
  diskIsset(id: string, realm?: string): Promise<boolean>;

  dbGet(id: string, realm?: string): Promise<unknown>;
  /** @param ttlMs Time to live, 0 (default) for unlimited */
  dbSet(id: string, data: unknown, realm?: string, ttlMs?: number): Promise<boolean>;
  dbUnset(id: string, realm?: string): Promise<boolean>;
  dbIsset(id: string, realm?: string): Promise<boolean>;
  /**
   * Load the auto-load rows of one or more realms; read them with autoloaded().
   * @returns Number of rows loaded
   */
  dbLoad(realms: string | readonly string[]): Promise<number>;

  memGet(id: string, realm?: string): Promise<unknown>;
  /** @param ttlMs Time to live. Default: 1 hour; 0 for unlimited */
  memSet(id: string, data: unknown, realm?: string, ttlMs?: number): Promise<boolean>;
  memUnset(id: string, realm?: string): Promise<boolean>;
  memIsset(id: string, realm?: string): Promise<boolean>;
  memInc(id: string, realm?: string, delta?: number): Promise<number>;
  memDec(id: string, realm?: string, delta?: number): Promise<number>;

  /** Clear every realm of a tier, or of all tiers. */
  clear(tier?: CacheTier): Promise<boolean>;
  clearRealm(realm?: string, tier?: CacheTier): Promise<boolean>;

  /** Memory usage of the volatile tier. */
  getInfo(): Promise<MemoryUsage>;
  isMemAvailable(): boolean;
  /** Selected volatile driver, null when mem falls back to the db tier */
  getMemDriver(): VolatileDriverId | null;
  /** Value auto-loaded from the db tier at startup or by dbLoad(). */
  autoloaded(name: string): unknown;

  bind(event: string, id: string, realm?: string, tier?: CacheTier): Promise<boolean>;
  /** @returns Number of bindings added */
  bindArray(bindings: readonly BindingInput[]): Promise<number>;
  /** @returns Number of bindings removed */
  unbind(realm: string, id?: string): Promise<number>;
  /**
   * Remove every entry bound to the event.
   * @returns Number of bindings processed
   */
  trigger(event: string): Promise<number>;

  /** Persist bindings and buffered writes, release the volatile driver. */
  close(): Promise<void>;
}

export interface CacheControllerDeps {
  disk: StaticStore;
  /** Write-back view of the relational store */
  db: WriteBackStore;
  /** The relational store itself, for auto-loading */
  autoload: Pick<RelationalStore, 'getAll' | 'preloaded'>;
  drivers: DriverRegistry;
  bindingRepository: BindingRepository;
  logger: Logger;
  /** Volatile driver to use when available */
  preferredDriver?: string;
  /** Realms auto-loaded besides the system and default realms */
  autoloadRealms?: readonly string[];
}

interface MemTier {
  store: DynamicStore & AtomicCounter;
  driver: VolatileStore | null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Driver Selection
// ─────────────────────────────────────────────────────────────────────────────

const selectMemTier = (
  drivers: DriverRegistry,
  db: WriteBackStore,
  preferred: string | undefined,
  log: Logger
): MemTier => {
  const available = drivers.available();

  let id: VolatileDriverId | undefined;
  if (preferred !== undefined && preferred !== '' && drivers.has(preferred)) {
    id = preferred;
  } else {
    if (preferred !== undefined && preferred !== '') {
      log.warn({ preferred, available }, 'Preferred volatile driver is not available');
    }
    id = available[0];
  }

  const driver = id !== undefined ? drivers.create(id) : undefined;
  if (driver === undefined) {
    log.warn('No volatile driver available, mem tier falls back to db');
    const counter = createComposedCounter(db);
    return {
      store: {
        clear: (realm) => db.clear(realm),
        exists: (entryId, realm) => db.exists(entryId, realm),
        get: (entryId, realm) => db.get(entryId, realm),
        remove: (entryId, realm) => db.remove(entryId, realm),
        store: (entryId, data, realm, ttlMs) => db.store(entryId, data, realm, ttlMs),
        getInfo: () => Promise.resolve(UNKNOWN_MEMORY_USAGE),
        inc: counter.inc,
        dec: counter.dec,
      },
      driver: null,
    };
  }

  log.info({ driver: driver.id }, 'Volatile driver selected');
  return { store: driver, driver };
};

// ─────────────────────────────────────────────────────────────────────────────
// Factory
// ─────────────────────────────────────────────────────────────────────────────

export const createCacheController = async (
  deps: CacheControllerDeps
): Promise<CacheController> => {
  const { disk, db, autoload } = deps;
  const log = deps.logger.child({ component: 'cache-controller' });

  const realms = [
    ...new Set([SYSTEM_REALM, DEFAULT_REALM, ...(deps.autoloadRealms ?? [])]),
  ];
  const loaded = await autoload.getAll(realms);
  if (loaded.isErr()) {
    log.warn({ err: loaded.error, realms }, 'Auto-load failed, continuing without preloaded rows');
  }

  const mem = selectMemTier(deps.drivers, db, deps.preferredDriver, log);

  const bindings = createBindingRegistry({
    repository: deps.bindingRepository,
    db,
    logger: deps.logger,
  });
  await bindings.warm(autoload.preloaded(BINDING_MIRROR_ID));

  const diskTier = createSilentStore(disk, { logger: log, tier: CacheTier.DISK });
  const dbTier = createSilentStore(db, { logger: log, tier: CacheTier.DB });
  const memTier = createSilentStore(mem.store, { logger: log, tier: CacheTier.MEMORY });
  const memCounter = createSilentCounter(mem.store, { logger: log, tier: CacheTier.MEMORY });

  /** Raw stores of a tier, mem first */
  const storesOf = (tier: CacheTier): CacheStore[] => {
    switch (tier) {
      case CacheTier.DISK:
        return [disk];
      case CacheTier.DB:
        return [db];
      case CacheTier.MEMORY:
        return [mem.store];
      case CacheTier.ALL:
        return [mem.store, disk, db];
    }
  };

  const silentOf = (tier: CacheTier): SilentStore[] => {
    switch (tier) {
      case CacheTier.DISK:
        return [diskTier];
      case CacheTier.DB:
        return [dbTier];
      case CacheTier.MEMORY:
        return [memTier];
      case CacheTier.ALL:
        return [memTier, diskTier, dbTier];
    }
  };

  const clearTiers = async (tier: CacheTier, realm: string): Promise<boolean> => {
    let cleared = true;
    for (const store of silentOf(tier)) {
      cleared = (await store.clear(realm)) && cleared;
    }
    return cleared;
  };

  let closing: Promise<void> | undefined;

  const shutdown = async (): Promise<void> => {
    await bindings.close();

    const flushed = await db.close();
    if (flushed.isErr()) {
      log.error({ err: flushed.error }, 'Buffered db writes were not persisted');
    }

    if (mem.driver !== null) {
      await mem.driver.close();
    }
    log.info('Cache controller closed');
  };

  return {
    diskGet: (id, realm = DEFAULT_REALM) => diskTier.get(id, realm),
    diskSet: (id, data, realm = DEFAULT_REALM) => diskTier.store(id, data, realm),
    diskUnset: (id, realm = DEFAULT_REALM) => diskTier.remove(id, realm),
    diskIsset: (id, realm = DEFAULT_REALM) => diskTier.exists(id, realm),

    dbGet: (id, realm = DEFAULT_REALM) => dbTier.get(id, realm),
    dbSet: (id, data, realm = DEFAULT_REALM, ttlMs = 0) => dbTier.store(id, data, realm, ttlMs),
    dbUnset: (id, realm = DEFAULT_REALM) => dbTier.remove(id, realm),
    dbIsset: (id, realm = DEFAULT_REALM) => dbTier.exists(id, realm),

    async dbLoad(names) {
      const result = await autoload.getAll(names);
      if (result.isErr()) {
        log.warn({ err: result.error }, 'Auto-load failed');
        return 0;
      }
      return result.value;
    },

    memGet: (id, realm = DEFAULT_REALM) => memTier.get(id, realm),
    memSet: (id, data, realm = DEFAULT_REALM, ttlMs = DEFAULT_TTL_MS) =>
      memTier.store(id, data, realm, ttlMs),
    memUnset: (id, realm = DEFAULT_REALM) => memTier.remove(id, realm),
    memIsset: (id, realm = DEFAULT_REALM) => memTier.exists(id, realm),
    memInc: (id, realm = DEFAULT_REALM, delta = 1) => memCounter.inc(id, realm, delta),
    memDec: (id, realm = DEFAULT_REALM, delta = 1) => memCounter.dec(id, realm, delta),

    clear: (tier = CacheTier.ALL) => clearTiers(tier, ''),
    clearRealm: (realm = DEFAULT_REALM, tier = CacheTier.ALL) => clearTiers(tier, realm),

    getInfo: () => mem.store.getInfo(),
    isMemAvailable: () => mem.driver !== null,
    getMemDriver: () => mem.driver?.id ?? null,
    autoloaded: (name) => autoload.preloaded(name),

    bind: (event, id, realm = DEFAULT_REALM, tier = CacheTier.ALL) =>
      bindings.bind(event, id, realm, tier),

    bindArray(inputs) {
      const complete: Binding[] = inputs.map((input) => ({
        event: input.event,
        id: input.id,
        realm: input.realm ?? DEFAULT_REALM,
        tier: input.tier ?? CacheTier.ALL,
      }));
      return bindings.bindArray(complete);
    },

    unbind: (realm, id) => bindings.unbind(realm, id),

    async trigger(event) {
      const targets = bindings.lookup(event);
      let failed = 0;

      for (const target of targets) {
        for (const store of storesOf(target.tier)) {
          const removed = await store.remove(target.id, target.realm);
          if (removed.isErr()) {
            failed++;
            log.warn(
              { err: removed.error, event, id: target.id, realm: target.realm },
              'Failed to invalidate bound entry'
            );
          }
        }
      }

      log.debug({ event, bindings: targets.length, failed }, 'Cache event triggered');
      return targets.length;
    },

    close() {
      closing ??= shutdown();
      return closing;
    },
  };
};
