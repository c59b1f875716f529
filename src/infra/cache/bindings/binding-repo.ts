/**
 * Binding Repository Implementation
 *
 * Kysely-based implementation for the cache_bindings table.
 */

import { err, ok } from 'neverthrow';

import { CacheError, isCacheTier, type CacheResult } from '../ports.js';

import type { Binding, BindingRepository } from './ports.js';
import type { CacheDbClient } from '../../database/client.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Options for creating the binding repository.
 */
export interface BindingRepoOptions {
  db: CacheDbClient;
  logger: Logger;
}

interface BindingRow {
  event: string;
  entry_id: string;
  realm: string;
  tier: string;
}

const toRow = (binding: Binding): BindingRow => ({
  event: binding.event,
  entry_id: binding.id,
  realm: binding.realm,
  tier: binding.tier,
});

// ─────────────────────────────────────────────────────────────────────────────
// Repository Implementation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Kysely-based Binding Repository.
 */
class KyselyBindingRepo implements BindingRepository {
  private readonly db: CacheDbClient;
  private readonly log: Logger;

  constructor(options: BindingRepoOptions) {
    this.db = options.db;
    this.log = options.logger.child({ repo: 'BindingRepo' });
  }

  async insert(binding: Binding): CacheResult<boolean> {
    const inserted = await this.insertMany([binding]);
    if (inserted.isErr()) {
      return err(inserted.error);
    }
    return ok(inserted.value > 0);
  }

  async insertMany(bindings: readonly Binding[]): CacheResult<number> {
    if (bindings.length === 0) {
      return ok(0);
    }

    this.log.debug({ count: bindings.length }, 'Inserting cache bindings');

    try {
      const result = await this.db
        .insertInto('cache_bindings')
        .values(bindings.map(toRow))
        .onConflict((oc) => oc.doNothing())
        .executeTakeFirst();

      return ok(Number(result.numInsertedOrUpdatedRows ?? 0));
    } catch (error) {
      this.log.error({ err: error, count: bindings.length }, 'Failed to insert cache bindings');
      return err(CacheError.storage('Failed to insert cache bindings', error));
    }
  }

  async deleteByRealm(realm: string, id?: string): CacheResult<number> {
    try {
      let query = this.db.deleteFrom('cache_bindings').where('realm', '=', realm);
      if (id !== undefined && id !== '') {
        query = query.where('entry_id', '=', id);
      }
      const result = await query.executeTakeFirst();
      return ok(Number(result.numDeletedRows));
    } catch (error) {
      this.log.error({ err: error, realm, id }, 'Failed to delete cache bindings');
      return err(CacheError.storage('Failed to delete cache bindings', error));
    }
  }

  async listAll(): CacheResult<Binding[]> {
    try {
      const rows = await this.db
        .selectFrom('cache_bindings')
        .select(['event', 'entry_id', 'realm', 'tier'])
        .execute();

      const bindings: Binding[] = [];
      for (const row of rows) {
        const { tier } = row;
        if (!isCacheTier(tier)) {
          this.log.warn({ event: row.event, tier }, 'Skipping binding with unknown tier');
          continue;
        }
        bindings.push({ event: row.event, id: row.entry_id, realm: row.realm, tier });
      }
      return ok(bindings);
    } catch (error) {
      this.log.error({ err: error }, 'Failed to list cache bindings');
      return err(CacheError.storage('Failed to list cache bindings', error));
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a new BindingRepository instance.
 */
export const makeBindingRepo = (options: BindingRepoOptions): BindingRepository => {
  return new KyselyBindingRepo(options);
};
