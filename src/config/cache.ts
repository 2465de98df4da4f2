/**
 * Cache configuration constants for the FoxESS data classes
 */

import type { CacheDataType } from '../types/cache';

/**
 * TTL in seconds by data class
 *
 * - realtime: inverter readings refresh every few minutes
 * - historical/report: closed intervals, only the tail changes
 * - device_info: static device metadata
 */
export const CACHE_TTLS = {
  realtime: 180, // 3 minutes
  historical: 3600, // 1 hour
  diagnosis: 1800, // 30 minutes
  forecast: 1800, // 30 minutes
  device_info: 86400, // 24 hours
  report: 3600, // 1 hour
  default: 300, // 5 minutes
} as const satisfies Record<CacheDataType, number>;

/**
 * Largest serialized payload accepted by either tier (10 MB)
 */
export const MAX_CACHE_FILE_SIZE = 10 * 1024 * 1024;

export const DEFAULT_MEMORY_CACHE_SIZE = 1000;

export const DEFAULT_TTL_SECONDS = CACHE_TTLS.default;

/**
 * Subdirectory of the OS temp dir used when no cache directory is configured
 */
export const DEFAULT_CACHE_DIR_NAME = 'foxess_mcp_cache';

export const CACHE_FILE_EXTENSION = '.cache';

export const CACHE_META_EXTENSION = '.cache.meta';

/** Owner read/write/execute */
export const CACHE_DIR_MODE = 0o700;

/** Owner read/write */
export const CACHE_FILE_MODE = 0o600;

/**
 * Resolve the TTL for a data class, falling back to the default
 */
export function ttlFor(dataType: string, defaultTtl: number = DEFAULT_TTL_SECONDS): number {
  if (isCacheDataType(dataType) && dataType !== 'default') {
    return CACHE_TTLS[dataType];
  }
  return defaultTtl;
}

export function isCacheDataType(value: string): value is CacheDataType {
  return Object.prototype.hasOwnProperty.call(CACHE_TTLS, value);
}
