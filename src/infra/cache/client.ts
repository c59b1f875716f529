/**
 * Cache client factory - wires stores, drivers and bindings into a controller.
 */

import { createDiskStore } from './adapters/disk-store.js';
import { createRelationalStore } from './adapters/relational-store.js';
import { makeBindingRepo } from './bindings/binding-repo.js';
import { createCacheController, type CacheController } from './controller.js';
import {
  createDriverRegistry,
  defaultDriverDefinitions,
  type VolatileDriverDefinition,
} from './registry.js';
import { systemClock, type Clock } from './ports.js';
import { createWriteBackStore } from './wrappers/write-back.js';
import { initCacheDatabase, type CacheDbClient } from '../database/client.js';

import type { AppConfig } from '../config/env.js';
import type { Logger } from 'pino';

export interface InitCacheOptions {
  config: Pick<AppConfig, 'cache' | 'database' | 'redis'>;
  logger: Logger;
  /** Existing database client; created from config.database when omitted */
  db?: CacheDbClient;
  /** Volatile drivers to check instead of the defaults */
  drivers?: readonly VolatileDriverDefinition[];
  clock?: Clock;
}

export interface CacheClient {
  cache: CacheController;
  db: CacheDbClient;
}

/**
 * Initialize the cache infrastructure.
 * Throws when the disk cache directory is unusable or the database is not configured.
 */
export const initCache = async (options: InitCacheOptions): Promise<CacheClient> => {
  const { config, logger } = options;
  const clock = options.clock ?? systemClock;

  const disk = await createDiskStore({ dir: config.cache.dir, logger });
  if (disk.isErr()) {
    logger.fatal({ err: disk.error }, '[Cache] Disk cache directory is unusable');
    throw new Error(disk.error.message);
  }

  const db = options.db ?? initCacheDatabase({ url: config.database.url });

  const relational = await createRelationalStore({ db, logger, clock });
  const writeBack = createWriteBackStore(relational, { logger, clock });

  const definitions =
    options.drivers ??
    defaultDriverDefinitions({
      redisUrl: config.redis.url,
      redisPrefix: config.redis.prefix,
      redisCompression: config.redis.compression,
      memoryMaxBytes: config.cache.memoryMaxBytes,
      logger,
      clock,
    });
  const drivers = await createDriverRegistry(definitions, logger);

  const cache = await createCacheController({
    disk: disk.value,
    db: writeBack,
    autoload: relational,
    drivers,
    bindingRepository: makeBindingRepo({ db, logger }),
    logger,
    ...(config.cache.driver !== undefined && { preferredDriver: config.cache.driver }),
    autoloadRealms: config.cache.autoloadRealms,
  });

  logger.info(
    { dir: config.cache.dir, memDriver: cache.getMemDriver() },
    '[Cache] Cache controller ready'
  );

  return { cache, db };
};
