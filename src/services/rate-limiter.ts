/**
 * Rate Limiter Service
 *
 * Sliding-window quota plus minimum spacing for calls to the FoxESS API.
 * State lives on the instance: each API client owns exactly one limiter and
 * nothing is shared between clients.
 *
 * - Quota: at most `dailyLimit` accepted requests in any trailing 24 hours.
 *   History is pruned on every check and never evicted early.
 * - Spacing: `update` calls need a longer gap than `query` calls, measured
 *   against one shared `lastRequestAt` (the upstream quota is per device, not
 *   per endpoint).
 *
 * The limiter never sleeps. It reports how long the caller should wait.
 *
 * @module services/rate-limiter
 */

import { DAILY_REQUEST_LIMIT, MIN_INTERVAL_SECONDS, RATE_WINDOW_MS } from '../config/foxess';
import type { RequestType } from '../types/foxess';
import type { Clock } from './memory-cache';

/**
 * Rate limit configuration
 */
export interface RateLimitConfig {
  /** Maximum accepted requests per window */
  dailyLimit: number;
  /** Window duration in milliseconds */
  windowMs: number;
  /** Minimum seconds between requests, by request type */
  minIntervalSeconds: Readonly<Record<RequestType, number>>;
}

/**
 * Outcome of tryAcquire()
 */
export interface RateLimitDecision {
  /** Whether the request was admitted (and recorded) */
  allowed: boolean;
  /** Seconds until a retry could succeed; 0 when allowed */
  retryAfterSeconds: number;
  /** Requests left in the trailing window after this decision */
  remaining: number;
}

export const DEFAULT_RATE_LIMIT_CONFIG: RateLimitConfig = {
  dailyLimit: DAILY_REQUEST_LIMIT,
  windowMs: RATE_WINDOW_MS,
  minIntervalSeconds: MIN_INTERVAL_SECONDS,
};

export class RateLimiter {
  private history: number[] = [];
  private lastRequestAt: number | null = null;
  private readonly config: RateLimitConfig;

  constructor(config: Partial<RateLimitConfig> = {}, private readonly now: Clock = () => Date.now()) {
    this.config = { ...DEFAULT_RATE_LIMIT_CONFIG, ...config };
  }

  get dailyLimit(): number {
    return this.config.dailyLimit;
  }

  /**
   * Check whether a request of this type may go out now. Does not record it.
   */
  canProceed(requestType: RequestType = 'query'): boolean {
    const now = this.now();
    this.prune(now);

    if (this.history.length >= this.config.dailyLimit) {
      return false;
    }
    return this.intervalDeficitMs(requestType, now) <= 0;
  }

  /**
   * Record a request that was permitted and attempted
   */
  record(_requestType: RequestType = 'query'): void {
    const now = this.now();
    this.history.push(now);
    this.lastRequestAt = now;
  }

  /**
   * Check and record as one step. Both halves run synchronously, so no other
   * caller on the event loop can pass the same check in between.
   */
  tryAcquire(requestType: RequestType = 'query'): RateLimitDecision {
    if (!this.canProceed(requestType)) {
      return {
        allowed: false,
        retryAfterSeconds: this.retryAfterSeconds(requestType),
        remaining: this.remainingToday(),
      };
    }

    this.record(requestType);
    return {
      allowed: true,
      retryAfterSeconds: 0,
      remaining: this.remainingToday(),
    };
  }

  /**
   * Seconds left before the minimum interval for this type has elapsed
   */
  waitSeconds(requestType: RequestType = 'query'): number {
    return Math.max(0, this.intervalDeficitMs(requestType, this.now())) / 1000;
  }

  /**
   * Seconds until a request of this type could be admitted, taking the daily
   * quota into account as well as the interval
   */
  retryAfterSeconds(requestType: RequestType = 'query'): number {
    const now = this.now();
    this.prune(now);

    let waitMs = Math.max(0, this.intervalDeficitMs(requestType, now));
    if (this.history.length >= this.config.dailyLimit) {
      const excess = this.history.length - this.config.dailyLimit;
      const freedAt = this.history[excess] + this.config.windowMs;
      waitMs = Math.max(waitMs, freedAt - now);
    }
    return waitMs / 1000;
  }

  /**
   * Requests left in the trailing window
   */
  remainingToday(): number {
    this.prune(this.now());
    return Math.max(0, this.config.dailyLimit - this.history.length);
  }

  /**
   * Number of requests currently inside the window
   */
  get used(): number {
    this.prune(this.now());
    return this.history.length;
  }

  /**
   * Forget all history (for tests and manual resets)
   */
  reset(): void {
    this.history = [];
    this.lastRequestAt = null;
  }

  private prune(now: number): void {
    const cutoff = now - this.config.windowMs;
    if (this.history.length > 0 && this.history[0] <= cutoff) {
      this.history = this.history.filter((ts) => ts > cutoff);
    }
  }

  private intervalDeficitMs(requestType: RequestType, now: number): number {
    if (this.lastRequestAt === null) return 0;
    const minIntervalMs = this.config.minIntervalSeconds[requestType] * 1000;
    return minIntervalMs - (now - this.lastRequestAt);
  }
}
