/**
 * Binding registry: durable rows plus an in-process mirror.
 *
 * bind/unbind write the table and patch the mirror at once, so a trigger in
 * the same process sees them. The persisted copy of the mirror is refreshed
 * by resync(), which close() runs when anything changed.
 */

import { Value } from '@sinclair/typebox/value';

import { SYSTEM_REALM, type CacheTier, type DynamicStore } from '../ports.js';
import {
  BINDING_MIRROR_ID,
  BindingMirrorSchema,
  type Binding,
  type BindingMirror,
  type BindingRepository,
  type BindingTarget,
} from './ports.js';

import type { Logger } from 'pino';

export interface BindingRegistry {
  /**
   * Install the mirror auto-loaded from the db tier, or rebuild it from the
   * table when none was loaded or it is malformed.
   */
  warm(mirror: unknown): Promise<void>;

  bind(event: string, id: string, realm: string, tier: CacheTier): Promise<boolean>;

  /** @returns Number of bindings added */
  bindArray(bindings: readonly Binding[]): Promise<number>;

  /** @returns Number of bindings removed */
  unbind(realm: string, id?: string): Promise<number>;

  lookup(event: string): readonly BindingTarget[];

  /** Rebuild the mirror from the table and persist it. */
  resync(): Promise<boolean>;

  isDirty(): boolean;

  /** Resync when bindings changed during this process. */
  close(): Promise<void>;
}

export interface BindingRegistryOptions {
  repository: BindingRepository;
  /** Dynamic store holding the persisted mirror */
  db: Pick<DynamicStore, 'store'>;
  logger: Logger;
}

const sameTarget = (a: BindingTarget, b: BindingTarget): boolean =>
  a.id === b.id && a.realm === b.realm && a.tier === b.tier;

export const createBindingRegistry = (options: BindingRegistryOptions): BindingRegistry => {
  const { repository, db } = options;
  const log = options.logger.child({ component: 'bindings' });

  let mirror = new Map<string, BindingTarget[]>();
  let dirty = false;

  const addToMirror = (binding: Binding): void => {
    const target: BindingTarget = { id: binding.id, realm: binding.realm, tier: binding.tier };
    const targets = mirror.get(binding.event);
    if (targets === undefined) {
      mirror.set(binding.event, [target]);
    } else if (!targets.some((existing) => sameTarget(existing, target))) {
      targets.push(target);
    }
  };

  /** An absent or empty id removes every target of the realm */
  const removeFromMirror = (realm: string, id?: string): void => {
    const wholeRealm = id === undefined || id === '';
    for (const [event, targets] of mirror) {
      const kept = targets.filter(
        (target) => target.realm !== realm || (!wholeRealm && target.id !== id)
      );
      if (kept.length === 0) {
        mirror.delete(event);
      } else {
        mirror.set(event, kept);
      }
    }
  };

  const toRecord = (): BindingMirror => Object.fromEntries(mirror);

  const resync = async (): Promise<boolean> => {
    const rows = await repository.listAll();
    if (rows.isErr()) {
      log.error({ err: rows.error }, 'Failed to reread cache bindings');
      return false;
    }

    mirror = new Map();
    for (const binding of rows.value) {
      addToMirror(binding);
    }

    const stored = await db.store(BINDING_MIRROR_ID, toRecord(), SYSTEM_REALM, 0);
    if (stored.isErr()) {
      log.error({ err: stored.error }, 'Failed to persist binding mirror');
      return false;
    }

    dirty = false;
    log.debug({ events: mirror.size }, 'Binding mirror rebuilt');
    return true;
  };

  return {
    async warm(loaded: unknown) {
      if (loaded !== undefined && Value.Check(BindingMirrorSchema, loaded)) {
        mirror = new Map(Object.entries(loaded));
        return;
      }
      if (loaded !== undefined) {
        log.warn('Discarding malformed binding mirror');
      }
      await resync();
    },

    async bind(event: string, id: string, realm: string, tier: CacheTier) {
      const binding: Binding = { event, id, realm, tier };
      const inserted = await repository.insert(binding);
      if (inserted.isErr()) {
        log.warn({ err: inserted.error, event, id, realm }, 'Failed to bind cache entry');
        return false;
      }

      addToMirror(binding);
      dirty = true;
      return true;
    },

    async bindArray(bindings: readonly Binding[]) {
      const inserted = await repository.insertMany(bindings);
      if (inserted.isErr()) {
        log.warn({ err: inserted.error, count: bindings.length }, 'Failed to bind cache entries');
        return 0;
      }

      for (const binding of bindings) {
        addToMirror(binding);
      }
      if (inserted.value > 0) {
        dirty = true;
      }
      return inserted.value;
    },

    async unbind(realm: string, id?: string) {
      const removed = await repository.deleteByRealm(realm, id);
      if (removed.isErr()) {
        log.warn({ err: removed.error, realm, id }, 'Failed to unbind cache entries');
        return 0;
      }

      removeFromMirror(realm, id);
      if (removed.value > 0) {
        dirty = true;
      }
      return removed.value;
    },

    lookup(event: string) {
      return mirror.get(event) ?? [];
    },

    resync,

    isDirty() {
      return dirty;
    },

    async close() {
      if (dirty) {
        await resync();
      }
    },
  };
};
