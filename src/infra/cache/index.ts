/**
 * Cache Infrastructure
 *
 * A three-tier cache (disk, db, mem) with silent degradation and event-driven
 * invalidation. Cache failures never cause request failures.
 *
 * @example
 * ```typescript
 * import { initCache, installShutdownHooks } from 'tiered-cache';
 *
 * const { cache } = await initCache({ config, logger });
 * installShutdownHooks(cache, logger);
 *
 * await cache.memSet('homepage', html, 'pages', 60_000);
 * await cache.bind('page.updated', 'homepage', 'pages', 'mem');
 *
 * // Later, when the page changes
 * await cache.trigger('page.updated');
 * ```
 */

// Ports (interfaces)
export {
  CacheError as CacheErrorFactory,
  CacheTier,
  DEFAULT_REALM,
  DEFAULT_TTL_MS,
  SYSTEM_REALM,
  UNKNOWN_MEMORY_USAGE,
  isCacheTier,
  systemClock,
  type AtomicCounter,
  type BatchWriter,
  type CacheError,
  type CacheResult,
  type CacheStore,
  type Clock,
  type DynamicStore,
  type EntryKey,
  type FlushSummary,
  type MemoryUsage,
  type PendingStore,
  type StaticStore,
  type VolatileDriverId,
  type VolatileStore,
  type WriteBackStore,
} from './ports.js';

// Key generation
export {
  REALM_SEPARATOR,
  createKeyBuilder,
  type KeyBuilder,
  type KeyBuilderOptions,
} from './key-builder.js';

// Serialization
export { serialize, deserialize, toCounterValue } from './serialization.js';
export { createComposedCounter, type ComposedCounterOptions } from './counters.js';

// Adapters
export {
  createDiskStore,
  createMemoryStore,
  createRedisClient,
  createRedisStore,
  createRelationalStore,
  pingRedis,
  type DiskStoreOptions,
  type MemoryStoreOptions,
  type RedisClientOptions,
  type RedisStoreOptions,
  type RelationalStore,
  type RelationalStoreOptions,
} from './adapters/index.js';

// Wrappers
export {
  createSilentCounter,
  createSilentStore,
  createWriteBackStore,
  type SilentCacheOptions,
  type SilentCounter,
  type SilentStore,
  type WriteBackOptions,
} from './wrappers/index.js';

// Drivers
export {
  createDriverRegistry,
  defaultDriverDefinitions,
  type DefaultDriverConfig,
  type DriverRegistry,
  type VolatileDriverDefinition,
} from './registry.js';

// Bindings
export {
  BINDING_MIRROR_ID,
  createBindingRegistry,
  makeBindingRepo,
  type Binding,
  type BindingMirror,
  type BindingRegistry,
  type BindingRepository,
  type BindingTarget,
} from './bindings/index.js';

// Controller
export {
  createCacheController,
  type BindingInput,
  type CacheController,
  type CacheControllerDeps,
} from './controller.js';
export { installShutdownHooks, runWithCache, type ShutdownHookOptions } from './lifecycle.js';

// Client factory
export { initCache, type CacheClient, type InitCacheOptions } from './client.js';
