/**
 * Event bindings: named application events tied to cache entries.
 */

import { Type, type Static } from '@sinclair/typebox';

import type { CacheResult, CacheTier } from '../ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/** Entry removed when the event fires */
export interface BindingTarget {
  id: string;
  realm: string;
  tier: CacheTier;
}

export interface Binding extends BindingTarget {
  event: string;
}

export const BindingTargetSchema = Type.Object({
  id: Type.String(),
  realm: Type.String(),
  tier: Type.Union([
    Type.Literal('all'),
    Type.Literal('disk'),
    Type.Literal('db'),
    Type.Literal('mem'),
  ]),
});

/** In-process lookup table, event name → targets. Persisted in the db tier. */
export const BindingMirrorSchema = Type.Record(Type.String(), Type.Array(BindingTargetSchema));

export type BindingMirror = Static<typeof BindingMirrorSchema>;

/** Entry name of the persisted mirror in the system realm */
export const BINDING_MIRROR_ID = 'cache_bindings';

// ─────────────────────────────────────────────────────────────────────────────
// Repository Port
// ─────────────────────────────────────────────────────────────────────────────

export interface BindingRepository {
  /**
   * Insert one binding. An identical existing row is left alone.
   * @returns Ok(true) if a row was added
   */
  insert(binding: Binding): CacheResult<boolean>;

  /**
   * Insert many bindings in one statement, ignoring duplicates.
   * @returns Number of rows added
   */
  insertMany(bindings: readonly Binding[]): CacheResult<number>;

  /**
   * Delete the bindings of a realm, optionally only those of one entry.
   * @returns Number of rows removed
   */
  deleteByRealm(realm: string, id?: string): CacheResult<number>;

  /** Every stored binding. Rows with an unknown tier are skipped. */
  listAll(): CacheResult<Binding[]>;
}
