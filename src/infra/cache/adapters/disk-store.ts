/**
 * Static disk store: one directory per realm, one file per entry.
 * No multilevel structure, so it slows down when a realm grows very large,
 * but reads of individual entries stay fast.
 */

import { constants as fsConstants } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';

import { err, ok, type Result } from 'neverthrow';

import {
  CacheError,
  DEFAULT_REALM,
  type CacheResult,
  type StaticStore,
} from '../ports.js';
import { deserialize, serialize } from '../serialization.js';

import type { Logger } from 'pino';

export interface DiskStoreOptions {
  /** Cache root directory. Must exist and be writable. */
  dir: string;
  logger: Logger;
}

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && 'code' in error;

/**
 * Map a realm or id to a safe file name.
 * Percent-encoding removes separators; leading dots are escaped so that
 * `.` and `..` cannot address the parent directory.
 */
export const toFileName = (name: string): string =>
  encodeURIComponent(name).replace(/^\./, '%2E');

/**
 * Create a disk store rooted at `dir`.
 * Returns a ConfigurationError when the directory is missing or not writable.
 */
export const createDiskStore = async (
  options: DiskStoreOptions
): Promise<Result<StaticStore, CacheError>> => {
  const root = path.resolve(options.dir);
  const log = options.logger.child({ store: 'disk' });

  try {
    const stat = await fs.stat(root);
    if (!stat.isDirectory()) {
      return err(CacheError.configuration(`Cache directory ${root} is not a directory`));
    }
    await fs.access(root, fsConstants.W_OK);
  } catch (cause) {
    return err(CacheError.configuration(`Cache directory ${root} is not writable`, cause));
  }

  const realmDir = (realm: string): string => path.join(root, toFileName(realm));
  const entryPath = (id: string, realm: string): string =>
    path.join(realmDir(realm), toFileName(id));

  const clearRealmDir = async (dir: string): Promise<boolean> => {
    let names: string[];
    try {
      names = await fs.readdir(dir);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return true;
      }
      log.warn({ err: error, dir }, 'Cannot read realm directory');
      return false;
    }

    for (const name of names) {
      const file = path.join(dir, name);
      const stat = await fs.stat(file);
      if (stat.isFile()) {
        await fs.unlink(file);
      }
    }
    return true;
  };

  const store: StaticStore = {
    async clear(realm = '') {
      try {
        if (realm !== '') {
          return ok(await clearRealmDir(realmDir(realm)));
        }

        const entries = await fs.readdir(root, { withFileTypes: true });
        let cleared = true;
        for (const entry of entries) {
          if (entry.isDirectory() && !entry.name.startsWith('.')) {
            cleared = (await clearRealmDir(path.join(root, entry.name))) && cleared;
          }
        }
        return ok(cleared);
      } catch (cause) {
        log.warn({ err: cause, realm }, 'Disk cache clear failed');
        return ok(false);
      }
    },

    async exists(id: string, realm = DEFAULT_REALM) {
      try {
        await fs.access(entryPath(id, realm));
        return ok(true);
      } catch {
        return ok(false);
      }
    },

    async get(id: string, realm = DEFAULT_REALM): CacheResult<unknown> {
      let contents: string;
      try {
        contents = await fs.readFile(entryPath(id, realm), 'utf8');
      } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
          return ok(undefined);
        }
        return err(CacheError.storage(`Failed to read disk entry ${realm}/${id}`, error));
      }

      const result = deserialize(contents);
      if (result.isErr()) {
        log.warn({ id, realm }, 'Corrupted disk entry treated as absent');
        return ok(undefined);
      }
      return ok(result.value);
    },

    async remove(id: string, realm = DEFAULT_REALM) {
      try {
        await fs.unlink(entryPath(id, realm));
        return ok(true);
      } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
          return ok(false);
        }
        return err(CacheError.storage(`Failed to remove disk entry ${realm}/${id}`, error));
      }
    },

    async store(id: string, data: unknown, realm = DEFAULT_REALM) {
      const image = serialize(data);
      if (image.isErr()) {
        return err(image.error);
      }

      try {
        await fs.mkdir(realmDir(realm), { recursive: true });
        await fs.writeFile(entryPath(id, realm), image.value, 'utf8');
        log.debug({ id, realm }, 'Stored disk entry');
        return ok(true);
      } catch (cause) {
        return err(CacheError.storage(`Failed to write disk entry ${realm}/${id}`, cause));
      }
    },
  };

  return ok(store);
};
