/**
 * Counter operations composed from get + store.
 *
 * Not atomic across processes: two concurrent increments may both read the
 * same value. Drivers with a native atomic primitive override these.
 */

import { err, ok } from 'neverthrow';

import {
  DEFAULT_REALM,
  DEFAULT_TTL_MS,
  type AtomicCounter,
  type CacheResult,
  type DynamicStore,
} from './ports.js';
import { toCounterValue } from './serialization.js';

export interface ComposedCounterOptions {
  /** TTL applied when the new value is stored. Default: 1 hour */
  ttlMs?: number;
}

export const createComposedCounter = (
  store: Pick<DynamicStore, 'get' | 'store'>,
  options: ComposedCounterOptions = {}
): AtomicCounter => {
  const ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;

  const add = async (id: string, realm: string, delta: number): CacheResult<number> => {
    const current = await store.get(id, realm);
    if (current.isErr()) {
      return err(current.error);
    }

    const next = toCounterValue(current.value) + delta;
    const stored = await store.store(id, next, realm, ttlMs);
    if (stored.isErr()) {
      return err(stored.error);
    }

    return ok(next);
  };

  return {
    inc(id: string, realm: string = DEFAULT_REALM, delta = 1) {
      return add(id, realm, delta);
    },

    dec(id: string, realm: string = DEFAULT_REALM, delta = 1) {
      return add(id, realm, -delta);
    },
  };
};
