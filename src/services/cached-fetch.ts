/**
 * Cached Fetch - cache-then-fetch-then-populate orchestration
 *
 * 1. Check the cache (memory, then disk)
 * 2. On a miss, coalesce concurrent callers and run the fetch function once
 * 3. Store non-empty results back into the cache
 *
 * Fetch failures propagate to every waiting caller untouched, and nothing
 * is cached for them.
 */

import type { CacheSource } from '../types/cache';
import type { CacheService } from './cache-service';
import type { RequestCoalescer } from './request-coalescer';

/**
 * Options for cached fetch
 */
export interface CachedFetchOptions<T> {
  cache: CacheService;
  coalescer: RequestCoalescer;
  /** Unique cache key for this request */
  cacheKey: string;
  /** Data class, selects the TTL */
  dataType: string;
  /** Produces the value on a miss */
  fetchFn: () => Promise<T>;
  /** Overrides the data class TTL (seconds) */
  ttlOverride?: number;
}

/**
 * Result of a cached fetch
 */
export interface CacheResult<T> {
  data: T;
  source: CacheSource;
}

export async function cachedFetch<T>(options: CachedFetchOptions<T>): Promise<CacheResult<T>> {
  const { cache, coalescer, cacheKey, dataType, fetchFn, ttlOverride } = options;

  const cached = await cache.lookup<T>(cacheKey, dataType, ttlOverride);
  if (cached) {
    return { data: cached.value, source: cached.source };
  }

  // Only the request that actually fetched writes the result back
  const data = await coalescer.coalesce(cacheKey, async () => {
    const fresh = await fetchFn();
    if (fresh !== null && fresh !== undefined) {
      await cache.set(cacheKey, fresh, dataType, ttlOverride);
    }
    return fresh;
  });

  return { data, source: 'upstream' };
}

/**
 * Build response headers for cache debugging
 */
export function buildCacheHeaders(source: CacheSource, ttlSeconds: number): Record<string, string> {
  return {
    'X-Cache': source === 'upstream' ? 'MISS' : 'HIT',
    'X-Cache-Source': source,
    'Cache-Control': `private, max-age=${ttlSeconds}`,
  };
}
