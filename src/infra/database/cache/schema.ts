/**
 * Dialect-neutral schema bootstrap for the cache tables.
 * Mirrors schema.sql so the same tables can be created on Postgres or SQLite.
 */

import type { CacheDatabase } from './types.js';
import type { Kysely } from 'kysely';

export const ensureCacheSchema = async (db: Kysely<CacheDatabase>): Promise<void> => {
  await db.schema
    .createTable('cache_entries')
    .ifNotExists()
    .addColumn('name', 'varchar(255)', (col) => col.notNull())
    .addColumn('realm', 'varchar(64)', (col) => col.notNull().defaultTo('default'))
    .addColumn('expires_at', 'bigint', (col) => col.notNull().defaultTo(0))
    .addColumn('auto_load', 'smallint', (col) => col.notNull().defaultTo(1))
    .addColumn('value', 'text', (col) => col.notNull())
    .addPrimaryKeyConstraint('cache_entries_pkey', ['name', 'realm'])
    .execute();

  await db.schema
    .createIndex('idx_cache_entries_realm_auto')
    .ifNotExists()
    .on('cache_entries')
    .columns(['realm', 'auto_load'])
    .execute();

  await db.schema
    .createIndex('idx_cache_entries_expires_at')
    .ifNotExists()
    .on('cache_entries')
    .column('expires_at')
    .execute();

  await db.schema
    .createTable('cache_bindings')
    .ifNotExists()
    .addColumn('event', 'varchar(64)', (col) => col.notNull())
    .addColumn('entry_id', 'varchar(255)', (col) => col.notNull())
    .addColumn('realm', 'varchar(64)', (col) => col.notNull().defaultTo('default'))
    .addColumn('tier', 'varchar(8)', (col) => col.notNull().defaultTo('all'))
    .addUniqueConstraint('uq_cache_bindings', ['event', 'entry_id', 'realm', 'tier'])
    .execute();

  await db.schema
    .createIndex('idx_cache_bindings_realm')
    .ifNotExists()
    .on('cache_bindings')
    .columns(['realm', 'entry_id'])
    .execute();
};
