/**
 * MemoryCache - bounded in-process map with per-entry expiry
 *
 * Expiry is checked lazily on access. An entry never outlives the smaller of
 * its own TTL and the cache-wide default TTL. When full, expired entries are
 * purged first, then the oldest insertion is evicted.
 */

interface MemoryEntry<T> {
  value: T;
  expiresAt: number;
}

export type Clock = () => number;

export class MemoryCache<T = unknown> {
  private readonly entries = new Map<string, MemoryEntry<T>>();

  constructor(
    readonly maxSize: number,
    readonly defaultTtlSeconds: number,
    private readonly now: Clock = () => Date.now()
  ) {
    if (maxSize <= 0) {
      throw new RangeError('maxSize must be positive');
    }
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.now() > entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  /**
   * Store a value for at most `ttlSeconds` (capped at the default TTL)
   */
  set(key: string, value: T, ttlSeconds: number = this.defaultTtlSeconds): void {
    const lifetime = Math.min(ttlSeconds, this.defaultTtlSeconds);
    if (lifetime <= 0) {
      this.entries.delete(key);
      return;
    }

    // Re-inserting moves the key to the end of the eviction order
    this.entries.delete(key);
    if (this.entries.size >= this.maxSize) {
      this.makeRoom();
    }

    this.entries.set(key, { value, expiresAt: this.now() + lifetime * 1000 });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): number {
    const count = this.size;
    this.entries.clear();
    return count;
  }

  /**
   * Live keys, purging expired ones on the way
   */
  keys(): string[] {
    this.purgeExpired();
    return Array.from(this.entries.keys());
  }

  get size(): number {
    this.purgeExpired();
    return this.entries.size;
  }

  private purgeExpired(): void {
    const now = this.now();
    for (const [key, entry] of this.entries) {
      if (now > entry.expiresAt) {
        this.entries.delete(key);
      }
    }
  }

  private makeRoom(): void {
    this.purgeExpired();
    while (this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) return;
      this.entries.delete(oldest.value);
    }
  }
}
