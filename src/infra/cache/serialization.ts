/**
 * Decimal.js- and Date-aware JSON serialization for cache values.
 * Every tier stores the same textual image.
 */

import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { CacheError } from './ports.js';

const DECIMAL_MARKER = '__decimal__';
const DATE_MARKER = '__date__';

const isDecimal = (val: unknown): val is Decimal => {
  return val !== null && typeof val === 'object' && val instanceof Decimal;
};

const isDecimalImage = (val: unknown): val is { [DECIMAL_MARKER]: string } => {
  return (
    val !== null &&
    typeof val === 'object' &&
    DECIMAL_MARKER in val &&
    typeof val[DECIMAL_MARKER] === 'string'
  );
};

const isDateImage = (val: unknown): val is { [DATE_MARKER]: string } => {
  return (
    val !== null &&
    typeof val === 'object' &&
    DATE_MARKER in val &&
    typeof val[DATE_MARKER] === 'string'
  );
};

/**
 * Replace Decimal and Date instances with marked objects.
 * Must run before JSON.stringify because their toJSON() is called first.
 */
const toStoredImage = (value: unknown): unknown => {
  if (isDecimal(value)) {
    return { [DECIMAL_MARKER]: value.toString() };
  }

  if (value instanceof Date) {
    return { [DATE_MARKER]: value.toISOString() };
  }

  if (Array.isArray(value)) {
    return value.map(toStoredImage);
  }

  if (value instanceof Map) {
    return Object.fromEntries(
      [...value.entries()].map(([key, val]) => [String(key), toStoredImage(val)])
    );
  }

  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      result[key] = toStoredImage(val);
    }
    return result;
  }

  return value;
};

/**
 * Serialize a value to its stored image.
 * `undefined`, functions and symbols have no image and are rejected.
 */
export const serialize = (value: unknown): Result<string, CacheError> => {
  try {
    // eslint-disable-next-line no-restricted-syntax -- JSON.stringify may throw on cycles and BigInt
    const json: unknown = JSON.stringify(toStoredImage(value));
    if (typeof json !== 'string') {
      return err(CacheError.serialization(`Cannot serialize value of type ${typeof value}`));
    }
    return ok(json);
  } catch (cause) {
    return err(CacheError.serialization('Failed to serialize value', cause));
  }
};

/**
 * Deserialize a stored image, restoring Decimal and Date instances.
 */
export const deserialize = (json: string): Result<unknown, CacheError> => {
  try {
    // eslint-disable-next-line no-restricted-syntax -- JSON.parse is wrapped in try-catch with proper error handling
    const value: unknown = JSON.parse(json, (_key, val: unknown) => {
      if (isDecimalImage(val)) {
        return new Decimal(val[DECIMAL_MARKER]);
      }
      if (isDateImage(val)) {
        return new Date(val[DATE_MARKER]);
      }
      return val;
    });
    return ok(value);
  } catch (cause) {
    return err(CacheError.serialization('Failed to deserialize cached value', cause));
  }
};

/**
 * Read a numeric counter value. Absent and non-numeric values count as 0.
 */
export const toCounterValue = (value: unknown): number => {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (isDecimal(value)) {
    return value.toNumber();
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
};
