/**
 * Tiered cache: disk, db and volatile tiers behind one controller.
 */

export * from './infra/cache/index.js';
export { parseEnv, createConfig, type AppConfig, type Env } from './infra/config/index.js';
export {
  createLogger,
  createChildLogger,
  type LoggerConfig,
  type LogLevel,
} from './infra/logger/index.js';
export {
  initCacheDatabase,
  ensureCacheSchema,
  type CacheDatabase,
  type CacheDbClient,
  type DatabaseConfig,
} from './infra/database/client.js';
