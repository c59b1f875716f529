/**
 * Cache port interfaces using Result pattern for explicit error handling.
 *
 * Drivers declare their capabilities by composing these small interfaces
 * instead of extending a driver base class.
 */

import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Error Types
// ─────────────────────────────────────────────────────────────────────────────

export type CacheError =
  | { type: 'ConnectionError'; message: string; cause?: unknown }
  | { type: 'SerializationError'; message: string; cause?: unknown }
  | { type: 'TimeoutError'; message: string; cause?: unknown }
  | { type: 'StorageError'; message: string; cause?: unknown }
  | { type: 'ConfigurationError'; message: string; cause?: unknown };

export const CacheError = {
  connection: (message: string, cause?: unknown): CacheError => ({
    type: 'ConnectionError',
    message,
    cause,
  }),
  serialization: (message: string, cause?: unknown): CacheError => ({
    type: 'SerializationError',
    message,
    cause,
  }),
  timeout: (message: string, cause?: unknown): CacheError => ({
    type: 'TimeoutError',
    message,
    cause,
  }),
  storage: (message: string, cause?: unknown): CacheError => ({
    type: 'StorageError',
    message,
    cause,
  }),
  configuration: (message: string, cause?: unknown): CacheError => ({
    type: 'ConfigurationError',
    message,
    cause,
  }),
} as const;

export type CacheResult<T> = Promise<Result<T, CacheError>>;

// ─────────────────────────────────────────────────────────────────────────────
// Tiers & Realms
// ─────────────────────────────────────────────────────────────────────────────

/** Realm used when the caller does not name one */
export const DEFAULT_REALM = 'default';

/** Realm holding controller-internal state (binding mirror) */
export const SYSTEM_REALM = 'system';

/** Default time to live for volatile entries: 1 hour */
export const DEFAULT_TTL_MS = 3_600_000;

export const CacheTier = {
  /** Every tier: mem, disk and db */
  ALL: 'all',
  DISK: 'disk',
  DB: 'db',
  MEMORY: 'mem',
} as const;

export type CacheTier = (typeof CacheTier)[keyof typeof CacheTier];

export const isCacheTier = (value: unknown): value is CacheTier =>
  value === CacheTier.ALL ||
  value === CacheTier.DISK ||
  value === CacheTier.DB ||
  value === CacheTier.MEMORY;

/** Milliseconds since epoch */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

// ─────────────────────────────────────────────────────────────────────────────
// Shared Shapes
// ─────────────────────────────────────────────────────────────────────────────

export interface EntryKey {
  id: string;
  realm: string;
}

export interface PendingStore extends EntryKey {
  /** Serialized value, fixed when the write was made */
  image: string;
  /** TTL requested by the caller, 0 for unlimited */
  ttlMs: number;
  /** Absolute expiration (ms since epoch), 0 for never */
  expiresAt: number;
}

/**
 * Memory usage figures in bytes. A driver reports -1 for any figure its
 * backend cannot provide.
 */
export interface MemoryUsage {
  available: number;
  occupied: number;
  max: number;
}

export const UNKNOWN_MEMORY_USAGE: MemoryUsage = { available: -1, occupied: -1, max: -1 };

// ─────────────────────────────────────────────────────────────────────────────
// Capabilities
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Operations common to every cache driver.
 */
export interface CacheStore {
  /**
   * Remove all entries of a realm, or of every realm when realm is empty.
   * @returns Ok(false) if the medium could not be read
   */
  clear(realm?: string): CacheResult<boolean>;

  /** Check if an entry exists (and is not expired). */
  exists(id: string, realm?: string): CacheResult<boolean>;

  /**
   * Retrieve an entry.
   * @returns Ok(value) if found, Ok(undefined) if not found, Err on failure
   */
  get(id: string, realm?: string): CacheResult<unknown>;

  /**
   * Remove an entry.
   * @returns Ok(true) if removed, Ok(false) if the entry didn't exist
   */
  remove(id: string, realm?: string): CacheResult<boolean>;
}

/**
 * Write-once/overwrite storage for large, rarely modified data. No expiry.
 */
export interface StaticStore extends CacheStore {
  store(id: string, data: unknown, realm?: string): CacheResult<boolean>;
}

/**
 * Storage with per-entry TTL. Base contract for every expiring tier.
 */
export interface DynamicStore extends CacheStore {
  /** @param ttlMs Time to live, 0 for unlimited */
  store(id: string, data: unknown, realm?: string, ttlMs?: number): CacheResult<boolean>;

  /** Memory usage of the backing medium. */
  getInfo(): Promise<MemoryUsage>;
}

export interface AtomicCounter {
  /** Add delta to a numeric entry (absent counts as 0) and return the new value. */
  inc(id: string, realm?: string, delta?: number): CacheResult<number>;

  /** Subtract delta from a numeric entry (absent counts as 0) and return the new value. */
  dec(id: string, realm?: string, delta?: number): CacheResult<number>;
}

/**
 * Batched persistence used by the write-back decorator.
 */
export interface BatchWriter {
  /** Insert-or-update every entry in one operation. */
  storeMany(entries: readonly PendingStore[]): CacheResult<number>;

  /** Delete every key in one operation. */
  removeMany(keys: readonly EntryKey[]): CacheResult<number>;
}

export interface FlushSummary {
  removed: number;
  stored: number;
}

/**
 * Dynamic store whose writes are buffered and persisted in one batch.
 */
export interface WriteBackStore extends DynamicStore {
  /** Write immediately, bypassing the buffer. */
  storeNow(id: string, data: unknown, realm?: string, ttlMs?: number): CacheResult<boolean>;

  /** Remove immediately, bypassing the buffer. */
  removeNow(id: string, realm?: string): CacheResult<boolean>;

  /** Persist all pending operations. */
  flush(): CacheResult<FlushSummary>;

  /** Flush exactly once; later writes go straight through. */
  close(): CacheResult<FlushSummary>;

  /** Number of queued stores and removals. */
  pendingCount(): number;
}

export type VolatileDriverId = 'memory' | 'redis';

/**
 * Accelerator tier driver: dynamic store with counters.
 */
export interface VolatileStore extends DynamicStore, AtomicCounter {
  readonly id: VolatileDriverId;

  /** Release connections held by the driver. */
  close(): Promise<void>;
}
