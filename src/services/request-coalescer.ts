/**
 * RequestCoalescer - Prevents duplicate in-flight requests
 *
 * When several callers miss the cache for the same key at once, only the
 * first one reaches the upstream API; the others wait for and share its
 * result. Each API client owns its own coalescer.
 */

/**
 * Timestamped so hung promises can be dropped
 */
interface InFlightEntry {
  promise: Promise<unknown>;
  createdAt: number;
}

/**
 * Maximum time to keep a request in the in-flight map (safety timeout)
 */
const MAX_IN_FLIGHT_TIME_MS = 60000; // 60 seconds

/**
 * How often to run cleanup sweep
 */
const CLEANUP_INTERVAL_MS = 10000; // 10 seconds

export class RequestCoalescer {
  private readonly inFlight = new Map<string, InFlightEntry>();
  private lastCleanupTime = 0;

  /**
   * Execute a fetch function with request coalescing
   *
   * If an identical request is already in flight, returns its result.
   * Otherwise runs `fetchFn` and shares the result with concurrent callers.
   * The entry is dropped as soon as the promise settles, so a failure is
   * never replayed to later callers.
   */
  async coalesce<T>(key: string, fetchFn: () => Promise<T>): Promise<T> {
    this.cleanupStaleEntries();

    const existing = this.inFlight.get(key);
    if (existing) {
      return existing.promise as Promise<T>;
    }

    const promise = fetchFn();
    const entry: InFlightEntry = { promise, createdAt: Date.now() };
    this.inFlight.set(key, entry);

    try {
      return await promise;
    } finally {
      // A newer request may have replaced a stale entry under the same key
      if (this.inFlight.get(key) === entry) {
        this.inFlight.delete(key);
      }
    }
  }

  isInFlight(key: string): boolean {
    return this.inFlight.has(key);
  }

  /**
   * Get the current number of in-flight requests (for debugging)
   */
  getInFlightCount(): number {
    return this.inFlight.size;
  }

  private cleanupStaleEntries(): void {
    const now = Date.now();

    // Don't cleanup too frequently
    if (now - this.lastCleanupTime < CLEANUP_INTERVAL_MS) {
      return;
    }
    this.lastCleanupTime = now;

    for (const [key, entry] of this.inFlight) {
      if (now - entry.createdAt > MAX_IN_FLIGHT_TIME_MS) {
        this.inFlight.delete(key);
      }
    }
  }
}
