/**
 * DiskCache - persistent tier of the cache, one file pair per entry
 *
 * Layout inside the cache directory:
 *   <sha256(key)>.cache       payload (JSON text, or a sealed blob when encrypted)
 *   <sha256(key)>.cache.meta  sidecar metadata (see CacheMetadata)
 *
 * Filenames are digests so they never reveal or depend on the logical key.
 * Every failure here is confined to one entry: it is logged, the entry is
 * removed where that makes sense, and the caller sees a miss or no-op.
 */

import { createHash, randomBytes } from 'node:crypto';
import { chmod, mkdir, readdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  CACHE_DIR_MODE,
  CACHE_FILE_EXTENSION,
  CACHE_FILE_MODE,
  CACHE_META_EXTENSION,
  MAX_CACHE_FILE_SIZE,
} from '../config/cache';
import type { CacheMetadata } from '../types/cache';
import { errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';
import type { PayloadCodec } from './cache-encryption';
import type { Clock } from './memory-cache';

const logger = createLogger('disk-cache');

const TEMP_FILE_EXTENSION = '.tmp';

/**
 * Result of a successful disk lookup
 */
export interface DiskHit<T = unknown> {
  value: T;
  /** Epoch milliseconds */
  createdAt: number;
  ttlSeconds: number;
}

interface EntryPaths {
  payload: string;
  meta: string;
}

export function hashCacheKey(key: string): string {
  return createHash('sha256').update(key, 'utf8').digest('hex');
}

function isCacheMetadata(value: unknown): value is CacheMetadata {
  return (
    typeof value === 'object' &&
    value !== null &&
    'created' in value &&
    typeof value.created === 'number' &&
    'ttl' in value &&
    typeof value.ttl === 'number' &&
    'data_type' in value &&
    typeof value.data_type === 'string' &&
    'cache_key' in value &&
    typeof value.cache_key === 'string' &&
    'encrypted' in value &&
    typeof value.encrypted === 'boolean'
  );
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class DiskCache {
  private dirReady: Promise<void> | null = null;

  constructor(
    readonly directory: string,
    private readonly codec: PayloadCodec,
    private readonly now: Clock = () => Date.now()
  ) {}

  get encrypted(): boolean {
    return this.codec.encrypted;
  }

  /**
   * Create the cache directory with owner-only permissions (lazy, once)
   */
  ensureDirectory(): Promise<void> {
    if (!this.dirReady) {
      this.dirReady = (async () => {
        await mkdir(this.directory, { recursive: true, mode: CACHE_DIR_MODE });
        await chmod(this.directory, CACHE_DIR_MODE);
      })();
      // Allow a later call to retry after a failure
      this.dirReady.catch(() => {
        this.dirReady = null;
      });
    }
    return this.dirReady;
  }

  pathsFor(key: string): EntryPaths {
    return this.pathsForFile(`${hashCacheKey(key)}${CACHE_FILE_EXTENSION}`);
  }

  /**
   * Read an entry, deleting it when expired, oversized, undecryptable or
   * written under a different encryption setting.
   *
   * @param fallbackTtl - TTL used when the sidecar does not record one
   * @param ttlOverride - TTL that wins over the recorded one
   */
  async read<T = unknown>(
    key: string,
    fallbackTtl: number,
    ttlOverride?: number
  ): Promise<DiskHit<T> | undefined> {
    const paths = this.pathsFor(key);

    try {
      const info = await stat(paths.payload);

      if (info.size > MAX_CACHE_FILE_SIZE) {
        logger.warn(`Cache file too large (${info.size} bytes), deleting: ${paths.payload}`);
        await this.removePaths(paths);
        return undefined;
      }

      const metadata = await this.readMetadata(paths.meta);
      const ttlSeconds = ttlOverride ?? metadata?.ttl ?? fallbackTtl;
      const createdAt = metadata ? metadata.created * 1000 : info.mtimeMs;

      if (this.now() - createdAt > ttlSeconds * 1000) {
        logger.debug(`Disk entry expired: ${key}`);
        await this.removePaths(paths);
        return undefined;
      }

      if (metadata && metadata.encrypted !== this.codec.encrypted) {
        logger.warn(`Cache format changed since write (encrypted=${metadata.encrypted}), deleting: ${key}`);
        await this.removePaths(paths);
        return undefined;
      }

      const payload = await readFile(paths.payload);
      let value: T;
      try {
        value = JSON.parse(this.codec.decode(payload)) as T;
      } catch (error) {
        logger.warn(`Failed to decode cache file (key changed?) ${paths.payload}: ${errorMessage(error)}`);
        await this.removePaths(paths);
        return undefined;
      }

      return { value, createdAt, ttlSeconds };
    } catch (error) {
      if (!isNotFound(error)) {
        logger.warn(`Failed to read cache file ${paths.payload}: ${errorMessage(error)}`);
      }
      return undefined;
    }
  }

  /**
   * Write payload then sidecar. Each file is written to its own temp name
   * and renamed into place, so overlapping writes of one key never share a
   * temp file. A failure removes only the failed write's temp file; the
   * pair already in place is left alone.
   *
   * @returns false when nothing was persisted
   */
  async write(key: string, json: string, ttlSeconds: number, dataType: string): Promise<boolean> {
    const paths = this.pathsFor(key);

    try {
      await this.ensureDirectory();

      const payload = this.codec.encode(json);
      if (payload.length > MAX_CACHE_FILE_SIZE) {
        logger.warn(`Data too large to cache on disk: ${payload.length} bytes`);
        return false;
      }

      await this.writeSecure(paths.payload, payload);

      const metadata: CacheMetadata = {
        created: this.now() / 1000,
        ttl: ttlSeconds,
        data_type: dataType,
        cache_key: key,
        encrypted: this.codec.encrypted,
      };
      await this.writeSecure(paths.meta, JSON.stringify(metadata));

      return true;
    } catch (error) {
      logger.error(`Failed to write cache file ${paths.payload}: ${errorMessage(error)}`);
      return false;
    }
  }

  async remove(key: string): Promise<boolean> {
    return this.removePaths(this.pathsFor(key));
  }

  /**
   * Remove entries, optionally only those whose metadata matches.
   * Entries without readable metadata never match a filter.
   *
   * @returns number of payload files removed
   */
  async clear(filter?: (metadata: CacheMetadata) => boolean): Promise<number> {
    const names = await this.listDirectory();
    let cleared = 0;

    for (const name of names) {
      const path = join(this.directory, name);

      if (!filter) {
        if (name.endsWith(CACHE_META_EXTENSION)) {
          await this.removeFile(path);
        } else if (name.endsWith(CACHE_FILE_EXTENSION) && (await this.removeFile(path))) {
          cleared++;
        }
        continue;
      }

      if (!name.endsWith(CACHE_FILE_EXTENSION)) continue;
      const paths = this.pathsForFile(name);
      const metadata = await this.readMetadata(paths.meta);
      if (metadata && filter(metadata) && (await this.removePaths(paths))) {
        cleared++;
      }
    }

    return cleared;
  }

  /**
   * Delete every entry older than its TTL (recorded TTL, else `defaultTtl`;
   * recorded creation time, else file mtime). Temp files left by an
   * interrupted write are deleted once their mtime is older than
   * `defaultTtl`; they are not counted.
   *
   * @returns number of entries removed
   */
  async sweepExpired(defaultTtl: number): Promise<number> {
    const names = await this.listDirectory();
    const now = this.now();
    let expired = 0;

    for (const name of names) {
      if (name.endsWith(TEMP_FILE_EXTENSION)) {
        await this.sweepTempFile(join(this.directory, name), now - defaultTtl * 1000);
        continue;
      }
      if (!name.endsWith(CACHE_FILE_EXTENSION)) continue;
      const paths = this.pathsForFile(name);

      try {
        const info = await stat(paths.payload);
        const metadata = await this.readMetadata(paths.meta);
        const ttlSeconds = metadata?.ttl ?? defaultTtl;
        const createdAt = metadata ? metadata.created * 1000 : info.mtimeMs;

        if (now - createdAt > ttlSeconds * 1000) {
          await this.removePaths(paths);
          expired++;
        }
      } catch (error) {
        // Another process may have removed it already
        if (!isNotFound(error)) {
          logger.warn(`Skipping cache file during sweep ${paths.payload}: ${errorMessage(error)}`);
        }
      }
    }

    if (expired > 0) {
      logger.info(`Cleaned up ${expired} expired cache entries`);
    }
    return expired;
  }

  private async sweepTempFile(path: string, cutoff: number): Promise<void> {
    try {
      const info = await stat(path);
      if (info.mtimeMs < cutoff) {
        await this.removeFile(path);
      }
    } catch (error) {
      if (!isNotFound(error)) {
        logger.warn(`Skipping temp file during sweep ${path}: ${errorMessage(error)}`);
      }
    }
  }

  async stats(): Promise<{ entries: number; bytes: number }> {
    const names = await this.listDirectory();
    let entries = 0;
    let bytes = 0;

    for (const name of names) {
      if (!name.endsWith(CACHE_FILE_EXTENSION)) continue;
      try {
        const info = await stat(join(this.directory, name));
        entries++;
        bytes += info.size;
      } catch (error) {
        if (!isNotFound(error)) {
          logger.warn(`Failed to stat cache file ${name}: ${errorMessage(error)}`);
        }
      }
    }

    return { entries, bytes };
  }

  private pathsForFile(payloadName: string): EntryPaths {
    const base = payloadName.slice(0, -CACHE_FILE_EXTENSION.length);
    return {
      payload: join(this.directory, payloadName),
      meta: join(this.directory, `${base}${CACHE_META_EXTENSION}`),
    };
  }

  private async listDirectory(): Promise<string[]> {
    try {
      return await readdir(this.directory);
    } catch (error) {
      if (!isNotFound(error)) {
        logger.error(`Failed to list cache directory ${this.directory}: ${errorMessage(error)}`);
      }
      return [];
    }
  }

  private async readMetadata(path: string): Promise<CacheMetadata | undefined> {
    try {
      const parsed: unknown = JSON.parse(await readFile(path, 'utf8'));
      if (isCacheMetadata(parsed)) return parsed;
      logger.warn(`Ignoring malformed cache metadata: ${path}`);
    } catch (error) {
      if (!isNotFound(error)) {
        logger.warn(`Ignoring unreadable cache metadata ${path}: ${errorMessage(error)}`);
      }
    }
    return undefined;
  }

  private async writeSecure(path: string, data: string | Buffer): Promise<void> {
    const tmp = `${path}.${process.pid}.${randomBytes(6).toString('hex')}${TEMP_FILE_EXTENSION}`;
    try {
      await writeFile(tmp, data, { mode: CACHE_FILE_MODE });
      await chmod(tmp, CACHE_FILE_MODE);
      await rename(tmp, path);
    } catch (error) {
      await rm(tmp, { force: true });
      throw error;
    }
  }

  private async removePaths(paths: EntryPaths): Promise<boolean> {
    const payloadRemoved = await this.removeFile(paths.payload);
    const metaRemoved = await this.removeFile(paths.meta);
    return payloadRemoved || metaRemoved;
  }

  private async removeFile(path: string): Promise<boolean> {
    try {
      await rm(path);
      return true;
    } catch (error) {
      if (!isNotFound(error)) {
        logger.warn(`Failed to delete cache file ${path}: ${errorMessage(error)}`);
      }
      return false;
    }
  }
}
