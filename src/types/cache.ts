/**
 * Cache type definitions for the two-level (memory + disk) caching system
 */

/**
 * Data classes with their own TTL
 */
export type CacheDataType =
  | 'realtime'
  | 'historical'
  | 'diagnosis'
  | 'forecast'
  | 'device_info'
  | 'report'
  | 'default';

/**
 * Configuration for a CacheService instance
 */
export interface CacheOptions {
  /** Maximum number of entries held in memory */
  memoryCacheSize: number;
  /** Default TTL in seconds, also the upper bound for memory entries */
  defaultTtl: number;
  /** Directory for the disk tier; `null` disables the disk tier */
  diskCacheDir: string | null;
  /** Encrypt disk payloads */
  enableEncryption: boolean;
  /** Passphrase for key derivation (falls back to an ephemeral key) */
  passphrase?: string;
  /** Explicit key material, takes precedence over the passphrase */
  encryptionKey?: Uint8Array;
}

/**
 * Sidecar metadata written next to every disk payload (`*.cache.meta`).
 * Field names are part of the on-disk format.
 */
export interface CacheMetadata {
  /** Epoch seconds (fractional) when the payload was written */
  created: number;
  /** TTL in seconds */
  ttl: number;
  data_type: string;
  cache_key: string;
  encrypted: boolean;
}

/**
 * Where a lookup was satisfied from
 */
export type CacheSource = 'memory' | 'disk' | 'upstream';

/**
 * Snapshot returned by CacheService.stats()
 */
export interface CacheStats {
  memoryEntries: number;
  memoryMaxSize: number;
  defaultTtl: number;
  diskEntries: number;
  diskBytes: number;
  diskDirectory: string | null;
  encrypted: boolean;
  ttlConfig: Readonly<Record<CacheDataType, number>>;
}
