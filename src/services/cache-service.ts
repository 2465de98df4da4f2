/**
 * CacheService - Manages two-level caching with an in-memory map and disk
 *
 * Layer 1: MemoryCache (process-local, bounded, fastest)
 * Layer 2: DiskCache (persistent, optionally encrypted)
 *
 * Expiry is lazy: entries are checked when read. `sweepExpired()` reclaims
 * disk space on demand. Disk is an optimization, so disk failures never turn
 * a successful memory write into a failure.
 */

import {
  CACHE_TTLS,
  DEFAULT_MEMORY_CACHE_SIZE,
  DEFAULT_TTL_SECONDS,
  MAX_CACHE_FILE_SIZE,
  ttlFor,
} from '../config/cache';
import type { CacheDataType, CacheOptions, CacheStats } from '../types/cache';
import { errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { createPayloadCodec } from './cache-encryption';
import { DiskCache } from './disk-cache';
import { MemoryCache, type Clock } from './memory-cache';

const logger = createLogger('cache');

interface MemoryRecord {
  value: unknown;
  dataType: string;
}

/**
 * Result of a lookup that also reports which layer answered
 */
export interface CacheLookup<T = unknown> {
  value: T;
  source: 'memory' | 'disk';
}

/**
 * CacheService handles all caching operations for both layers
 */
export class CacheService {
  private readonly memory: MemoryCache<MemoryRecord>;
  private readonly disk: DiskCache | null;
  private readonly now: Clock;
  readonly defaultTtl: number;

  constructor(options: Partial<CacheOptions> = {}, now: Clock = () => Date.now()) {
    this.now = now;
    this.defaultTtl = options.defaultTtl ?? DEFAULT_TTL_SECONDS;
    this.memory = new MemoryCache<MemoryRecord>(
      options.memoryCacheSize ?? DEFAULT_MEMORY_CACHE_SIZE,
      this.defaultTtl,
      now
    );

    if (options.diskCacheDir) {
      const codec = createPayloadCodec(options.enableEncryption ?? true, {
        key: options.encryptionKey,
        passphrase: options.passphrase,
      });
      this.disk = new DiskCache(options.diskCacheDir, codec, now);
    } else {
      this.disk = null;
    }

    logger.info(
      `Cache initialized - Memory: ${this.memory.maxSize}, ` +
        `Disk: ${this.disk?.directory ?? 'disabled'}, Encrypted: ${this.encrypted}`
    );
  }

  get encrypted(): boolean {
    return this.disk?.encrypted ?? false;
  }

  /**
   * Get the TTL for a data class
   */
  ttlFor(dataType: string): number {
    return ttlFor(dataType, this.defaultTtl);
  }

  /**
   * Get a value, memory first, then disk (promoting disk hits into memory)
   */
  async get<T = unknown>(
    key: string,
    dataType: string = 'default',
    ttlOverride?: number
  ): Promise<T | undefined> {
    const lookup = await this.lookup<T>(key, dataType, ttlOverride);
    return lookup?.value;
  }

  /**
   * Like get(), but also reports which layer answered
   */
  async lookup<T = unknown>(
    key: string,
    dataType: string = 'default',
    ttlOverride?: number
  ): Promise<CacheLookup<T> | undefined> {
    const cached = this.memory.get(key);
    if (cached) {
      logger.debug(`GET ${key} - memory hit`);
      return { value: cached.value as T, source: 'memory' };
    }

    if (this.disk) {
      const hit = await this.disk.read<T>(key, this.ttlFor(dataType), ttlOverride);
      if (hit) {
        const remainingSeconds = (hit.createdAt + hit.ttlSeconds * 1000 - this.now()) / 1000;
        this.memory.set(key, { value: hit.value, dataType }, remainingSeconds);
        logger.debug(`GET ${key} - disk hit`);
        return { value: hit.value, source: 'disk' };
      }
    }

    logger.debug(`GET ${key} - miss`);
    return undefined;
  }

  /**
   * Store a value in both layers
   *
   * @returns false only when the value cannot be cached at all
   * (not serializable, or larger than the payload limit)
   */
  async set(
    key: string,
    value: unknown,
    dataType: string = 'default',
    ttlOverride?: number
  ): Promise<boolean> {
    const ttl = ttlOverride ?? this.ttlFor(dataType);

    let json: string | undefined;
    try {
      json = JSON.stringify(value);
    } catch (error) {
      logger.warn(`Value for ${key} is not serializable: ${errorMessage(error)}`);
      return false;
    }
    if (json === undefined) {
      logger.warn(`Value for ${key} is not serializable`);
      return false;
    }

    const size = Buffer.byteLength(json, 'utf8');
    if (size > MAX_CACHE_FILE_SIZE) {
      logger.warn(`Data too large to cache: ${size} bytes`);
      return false;
    }

    // Store a detached copy so later mutation by the caller can't leak in
    const stored: unknown = JSON.parse(json);
    this.memory.set(key, { value: stored, dataType }, ttl);
    logger.debug(`SET ${key} (ttl=${ttl}s)`);

    if (this.disk) {
      await this.disk.write(key, json, ttl, dataType);
    }
    return true;
  }

  /**
   * Delete a key from both layers
   *
   * @returns true if either layer held the key
   */
  async delete(key: string): Promise<boolean> {
    const inMemory = this.memory.delete(key);
    const onDisk = this.disk ? await this.disk.remove(key) : false;
    logger.debug(`DELETE ${key}`);
    return inMemory || onDisk;
  }

  /**
   * Clear everything, or only entries of one data class (matched on the
   * recorded data type or a substring of the logical key)
   *
   * @returns number of entries cleared
   */
  async clear(dataType?: string): Promise<number> {
    let cleared: number;

    if (dataType === undefined) {
      cleared = this.memory.clear();
      if (this.disk) {
        cleared += await this.disk.clear();
      }
    } else {
      const removed = new Set<string>();
      for (const key of this.memory.keys()) {
        const record = this.memory.get(key);
        if (record && (record.dataType === dataType || key.includes(dataType))) {
          this.memory.delete(key);
          removed.add(key);
        }
      }
      if (this.disk) {
        await this.disk.clear((meta) => {
          const matches = meta.data_type === dataType || meta.cache_key.includes(dataType);
          if (matches) removed.add(meta.cache_key);
          return matches;
        });
      }
      cleared = removed.size;
    }

    logger.info(`Cleared ${cleared} cache entries`);
    return cleared;
  }

  /**
   * Remove expired disk entries
   *
   * @returns number of entries removed
   */
  async sweepExpired(): Promise<number> {
    if (!this.disk) return 0;
    return this.disk.sweepExpired(this.defaultTtl);
  }

  async stats(): Promise<CacheStats> {
    const disk = this.disk ? await this.disk.stats() : { entries: 0, bytes: 0 };
    const ttlConfig: Record<CacheDataType, number> = { ...CACHE_TTLS, default: this.defaultTtl };

    return {
      memoryEntries: this.memory.size,
      memoryMaxSize: this.memory.maxSize,
      defaultTtl: this.defaultTtl,
      diskEntries: disk.entries,
      diskBytes: disk.bytes,
      diskDirectory: this.disk?.directory ?? null,
      encrypted: this.encrypted,
      ttlConfig,
    };
  }
}
