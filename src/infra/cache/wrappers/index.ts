/**
 * Cache wrappers - decorators over store ports.
 */

export {
  createSilentStore,
  createSilentCounter,
  type SilentStore,
  type SilentCounter,
  type SilentCacheOptions,
} from './silent-cache.js';
export { createWriteBackStore, type WriteBackOptions } from './write-back.js';
