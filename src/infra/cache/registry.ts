/**
 * Volatile driver registry.
 *
 * Drivers are offered as an ordered list of definitions. Each availability
 * check runs once at startup; the resulting list of available drivers never
 * changes afterwards.
 */

import { createMemoryStore } from './adapters/memory-store.js';
import { createRedisClient, createRedisStore, pingRedis } from './adapters/redis-store.js';

import type { Clock, VolatileDriverId, VolatileStore } from './ports.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface VolatileDriverDefinition {
  id: VolatileDriverId;
  /** Whether the backing service is usable in this environment */
  isSupported(): boolean | Promise<boolean>;
  create(): VolatileStore;
}

export interface DriverRegistry {
  /** Available driver ids, in definition order */
  available(): readonly VolatileDriverId[];
  has(id: string): id is VolatileDriverId;
  /** Instantiate an available driver; undefined when it was not supported */
  create(id: VolatileDriverId): VolatileStore | undefined;
}

// ─────────────────────────────────────────────────────────────────────────────
// Registry
// ─────────────────────────────────────────────────────────────────────────────

export const createDriverRegistry = async (
  definitions: readonly VolatileDriverDefinition[],
  logger: Logger
): Promise<DriverRegistry> => {
  const log = logger.child({ component: 'driver-registry' });
  const available = new Map<VolatileDriverId, VolatileDriverDefinition>();

  for (const definition of definitions) {
    if (available.has(definition.id)) {
      continue;
    }

    let passed: boolean;
    try {
      passed = await definition.isSupported();
    } catch (error) {
      log.warn({ err: error, driver: definition.id }, 'Driver availability check threw, skipping driver');
      passed = false;
    }

    if (passed) {
      available.set(definition.id, definition);
    } else {
      log.debug({ driver: definition.id }, 'Driver not available');
    }
  }

  const ids = Object.freeze([...available.keys()]);
  log.info({ drivers: ids }, 'Volatile drivers registered');

  return {
    available() {
      return ids;
    },

    has(id: string): id is VolatileDriverId {
      return ids.some((candidate) => candidate === id);
    },

    create(id: VolatileDriverId) {
      return available.get(id)?.create();
    },
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Default Drivers
// ─────────────────────────────────────────────────────────────────────────────

export interface DefaultDriverConfig {
  redisUrl: string | undefined;
  redisPrefix: string;
  redisCompression: boolean;
  memoryMaxBytes: number;
  logger: Logger;
  clock?: Clock;
}

/**
 * Redis first (when configured and answering PING), then the in-process store.
 */
export const defaultDriverDefinitions = (
  config: DefaultDriverConfig
): VolatileDriverDefinition[] => {
  const definitions: VolatileDriverDefinition[] = [];
  const { redisUrl } = config;

  if (redisUrl !== undefined && redisUrl !== '') {
    definitions.push({
      id: 'redis',
      async isSupported() {
        // Check on a throwaway connection; create() opens the one the store keeps
        const client = createRedisClient({ url: redisUrl });
        try {
          return await pingRedis(client);
        } finally {
          client.disconnect();
        }
      },
      create: () =>
        createRedisStore(createRedisClient({ url: redisUrl }), {
          keyPrefix: config.redisPrefix,
          compression: config.redisCompression,
          logger: config.logger,
        }),
    });
  }

  definitions.push({
    id: 'memory',
    isSupported: () => true,
    create: () =>
      createMemoryStore({
        maxBytes: config.memoryMaxBytes,
        logger: config.logger,
        ...(config.clock !== undefined && { clock: config.clock }),
      }),
  });

  return definitions;
};
