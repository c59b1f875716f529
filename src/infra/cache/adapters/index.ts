/**
 * Cache adapters - backend implementations.
 */

export { createDiskStore, toFileName, type DiskStoreOptions } from './disk-store.js';
export {
  createMemoryStore,
  DEFAULT_MEMORY_MAX_BYTES,
  type MemoryStoreOptions,
} from './memory-store.js';
export {
  createRedisClient,
  createRedisStore,
  DEFAULT_REDIS_PREFIX,
  parseInfoField,
  pingRedis,
  type RedisClientOptions,
  type RedisStoreOptions,
} from './redis-store.js';
export {
  createRelationalStore,
  type RelationalStore,
  type RelationalStoreOptions,
} from './relational-store.js';
