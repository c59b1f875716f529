import { Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';

import type { CacheDatabase } from './cache/types.js';

const { Pool: PG_POOL } = pg;

export type CacheDbClient = Kysely<CacheDatabase>;

export interface DatabaseConfig {
  url: string | undefined;
  /** Connection pool size. Default: 10 */
  poolSize?: number;
}

/**
 * Create a Kysely instance for a specific database URL
 */
const createClient = <T>(connectionString: string, poolSize: number): Kysely<T> => {
  return new Kysely<T>({
    dialect: new PostgresDialect({
      pool: new PG_POOL({
        connectionString,
        max: poolSize,
      }),
    }),
  });
};

/**
 * Initialize the database client holding the cache tables
 */
export const initCacheDatabase = (config: DatabaseConfig): CacheDbClient => {
  if (config.url === undefined || config.url === '') {
    throw new Error('Missing configuration for Cache Database (DATABASE_URL)');
  }

  return createClient<CacheDatabase>(config.url, config.poolSize ?? 10);
};

// Re-export types
export type { CacheDatabase, CacheEntries, CacheBindings } from './cache/types.js';
export { ensureCacheSchema } from './cache/schema.js';
