// Ignore naming conventions for database tables

import type { ColumnType, Generated } from 'kysely';

// BIGINT columns come back as strings from pg and as numbers from SQLite
export type Int8 = ColumnType<string | number, number | string, number | string>;

// Cache Entries Table
export interface CacheEntries {
  name: string;
  realm: string;
  /** Absolute expiration in ms since epoch, 0 for never */
  expires_at: ColumnType<string | number, number | string | undefined, number | string>;
  /** 1 when the row is loaded by getAll() at startup */
  auto_load: Generated<number>;
  value: string;
}

// Cache Bindings Table
export interface CacheBindings {
  event: string;
  entry_id: string;
  realm: string;
  tier: string;
}

export interface CacheDatabase {
  cache_entries: CacheEntries;
  cache_bindings: CacheBindings;
}
