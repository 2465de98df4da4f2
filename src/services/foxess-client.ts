/**
 * FoxESS API client - the access façade over the protection layer
 *
 * Outbound calls go rate check → sign → fetch → map errors.
 * Reads go cache → (coalesced) outbound call → cache write.
 *
 * One client owns one rate limiter, one authenticator, one coalescer and one
 * cache. Separate clients never share quota state.
 */

import {
  DEFAULT_LANG,
  DEFAULT_TIMEOUT_SECONDS,
  FOXESS_API_BASE,
  FOXESS_ENDPOINTS,
  UPSTREAM_RATE_LIMIT_RETRY_AFTER,
} from '../config/foxess';
import type { CacheOptions } from '../types/cache';
import type {
  AppConfig,
  FoxEssEnvelope,
  HistoryQuery,
  HttpMethod,
  ReportQuery,
  RequestType,
} from '../types/foxess';
import {
  NetworkError,
  RateLimitExceededError,
  UpstreamAuthError,
  UpstreamError,
  errorMessage,
} from '../utils/errors';
import { createLogger } from '../utils/logger';
import { validateDeviceSn } from '../utils/validation';
import { buildKey, historicalKey, realtimeKey, reportKey, type KeyParams } from './cache-keys';
import { CacheService } from './cache-service';
import { cachedFetch, type CacheResult } from './cached-fetch';
import type { Clock } from './memory-cache';
import { RateLimiter, type RateLimitConfig } from './rate-limiter';
import { RequestAuthenticator } from './request-auth';
import { RequestCoalescer } from './request-coalescer';

const logger = createLogger('foxess-client');

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface FoxEssClientOptions {
  apiToken: string;
  deviceSerial: string;
  baseUrl?: string;
  timeoutSeconds?: number;
  lang?: string;
  /** An existing cache, or options for a new one (memory-only by default) */
  cache?: CacheService | Partial<CacheOptions>;
  rateLimit?: Partial<RateLimitConfig>;
  fetch?: FetchLike;
  now?: Clock;
}

export interface QuotaStatus {
  remainingToday: number;
  dailyLimit: number;
  waitSeconds: number;
}

function toEnvelope(payload: unknown): FoxEssEnvelope | undefined {
  if (typeof payload !== 'object' || payload === null) return undefined;
  if (!('errno' in payload) || typeof payload.errno !== 'number') return undefined;

  return {
    errno: payload.errno,
    msg: 'msg' in payload && typeof payload.msg === 'string' ? payload.msg : undefined,
    message: 'message' in payload && typeof payload.message === 'string' ? payload.message : undefined,
    result: 'result' in payload ? payload.result : undefined,
  };
}

export class FoxEssClient {
  readonly cache: CacheService;
  private readonly limiter: RateLimiter;
  private readonly auth: RequestAuthenticator;
  private readonly coalescer = new RequestCoalescer();
  private readonly fetchImpl: FetchLike;
  private readonly baseUrl: string;
  private readonly timeoutSeconds: number;
  private readonly lang: string;
  private readonly now: Clock;

  constructor(options: FoxEssClientOptions) {
    const now = options.now ?? (() => Date.now());
    this.now = now;

    this.auth = new RequestAuthenticator(options.apiToken, options.deviceSerial, now);
    this.limiter = new RateLimiter(options.rateLimit, now);
    this.cache =
      options.cache instanceof CacheService ? options.cache : new CacheService(options.cache, now);
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.baseUrl = (options.baseUrl ?? FOXESS_API_BASE).replace(/\/+$/, '');
    this.timeoutSeconds = options.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS;
    this.lang = options.lang ?? DEFAULT_LANG;

    logger.info('FoxESS API client initialized');
  }

  static fromConfig(config: AppConfig, fetchImpl?: FetchLike): FoxEssClient {
    return new FoxEssClient({
      ...config.foxess,
      cache: config.cache,
      fetch: fetchImpl,
    });
  }

  get deviceSerial(): string {
    return this.auth.deviceSerial;
  }

  /**
   * Rate-check, sign, send and unwrap one request
   *
   * @param path - endpoint path, optionally with a query string (only the
   *   path part is signed)
   * @throws RateLimitExceededError when the local limiter or the upstream refuses
   * @throws UpstreamAuthError on 401/403
   * @throws UpstreamError on other HTTP errors, bad JSON or a non-zero errno
   * @throws NetworkError on transport failure or timeout
   */
  async authorizedCall(
    method: HttpMethod,
    path: string,
    body?: unknown,
    requestType: RequestType = 'query'
  ): Promise<FoxEssEnvelope> {
    const decision = this.limiter.tryAcquire(requestType);
    if (!decision.allowed) {
      const wait = decision.retryAfterSeconds;
      throw new RateLimitExceededError(
        `Rate limit exceeded. Wait ${wait.toFixed(1)} seconds. ` +
          `Remaining requests today: ${decision.remaining}`,
        Math.floor(wait) + 1,
        decision.remaining
      );
    }

    const signedPath = path.split('?')[0];
    const url = `${this.baseUrl}${path}`;
    const headers = this.auth.headers(signedPath, this.lang);
    const startedAt = Date.now();

    logger.debug(`${method} ${url}`);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers,
        body: method === 'POST' && body !== undefined ? JSON.stringify(body) : undefined,
        signal: AbortSignal.timeout(this.timeoutSeconds * 1000),
      });
    } catch (error) {
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        throw new NetworkError(`Request timeout after ${this.timeoutSeconds} seconds`);
      }
      throw new NetworkError(`Request failed: ${errorMessage(error)}`);
    }

    logger.debug(`${method} ${signedPath} -> ${response.status} in ${Date.now() - startedAt}ms`);

    if (response.status === 401 || response.status === 403) {
      throw new UpstreamAuthError(response.status);
    }
    if (response.status === 429) {
      throw new RateLimitExceededError('Rate limit exceeded by FoxESS API', UPSTREAM_RATE_LIMIT_RETRY_AFTER);
    }
    if (!response.ok) {
      throw new UpstreamError(response.status, response.statusText);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new UpstreamError(response.status, `Invalid JSON response: ${errorMessage(error)}`);
    }

    const envelope = toEnvelope(payload);
    if (!envelope) {
      throw new UpstreamError(response.status, 'Response is missing errno');
    }
    if (envelope.errno !== 0) {
      throw new UpstreamError(
        response.status,
        envelope.msg ?? envelope.message ?? 'Unknown API error',
        envelope.errno
      );
    }

    return envelope;
  }

  /**
   * Return the cached value for (operation, device, params), or run
   * `fetchFn`, cache its result and return it. Fetch failures propagate.
   */
  async fetchWithCache<T>(
    operation: string,
    deviceId: string,
    params: KeyParams,
    dataType: string,
    fetchFn: () => Promise<T>
  ): Promise<T> {
    const result = await this.cached(buildKey(operation, deviceId, params), dataType, fetchFn);
    return result.data;
  }

  async getDeviceList(): Promise<CacheResult<unknown>> {
    return this.cached(buildKey('device_list', 'all'), 'device_info', () =>
      this.resultOf('GET', FOXESS_ENDPOINTS.deviceList)
    );
  }

  async getDeviceDetail(deviceSn?: string): Promise<CacheResult<unknown>> {
    const sn = this.resolveSerial(deviceSn);
    return this.cached(buildKey('device_detail', sn), 'device_info', () =>
      this.resultOf('POST', FOXESS_ENDPOINTS.deviceDetail, { sn })
    );
  }

  async getRealtimeData(deviceSn?: string, variables?: string[]): Promise<CacheResult<unknown>> {
    const sn = this.resolveSerial(deviceSn);
    const body = variables && variables.length > 0 ? { sn, variables } : { sn };
    return this.cached(realtimeKey(sn, variables, this.now()), 'realtime', () =>
      this.resultOf('POST', FOXESS_ENDPOINTS.realtimeData, body)
    );
  }

  async getHistoricalData(deviceSn: string | undefined, query: HistoryQuery): Promise<CacheResult<unknown>> {
    const sn = this.resolveSerial(deviceSn);
    const { begin, end, variables, dimension = 'hour' } = query;
    const body =
      variables && variables.length > 0 ? { sn, begin, end, variables } : { sn, begin, end };
    return this.cached(historicalKey(sn, begin, end, variables, dimension), 'historical', () =>
      this.resultOf('POST', FOXESS_ENDPOINTS.historicalData, body)
    );
  }

  async getReportData(deviceSn: string | undefined, query: ReportQuery): Promise<CacheResult<unknown>> {
    const sn = this.resolveSerial(deviceSn);
    const body = { sn, reportType: query.reportType, date: query.date };
    return this.cached(reportKey(sn, query.reportType, query.date), 'report', () =>
      this.resultOf('POST', FOXESS_ENDPOINTS.reportData, body)
    );
  }

  async getGeneration(deviceSn?: string): Promise<CacheResult<unknown>> {
    const sn = this.resolveSerial(deviceSn);
    const path = `${FOXESS_ENDPOINTS.generation}?sn=${encodeURIComponent(sn)}`;
    return this.cached(buildKey('generation', sn), 'realtime', () => this.resultOf('GET', path));
  }

  quota(requestType: RequestType = 'query'): QuotaStatus {
    return {
      remainingToday: this.limiter.remainingToday(),
      dailyLimit: this.limiter.dailyLimit,
      waitSeconds: this.limiter.waitSeconds(requestType),
    };
  }

  private cached<T>(cacheKey: string, dataType: string, fetchFn: () => Promise<T>): Promise<CacheResult<T>> {
    return cachedFetch({
      cache: this.cache,
      coalescer: this.coalescer,
      cacheKey,
      dataType,
      fetchFn,
    });
  }

  private async resultOf(method: HttpMethod, path: string, body?: unknown): Promise<unknown> {
    const envelope = await this.authorizedCall(method, path, body);
    return envelope.result;
  }

  private resolveSerial(deviceSn?: string): string {
    return deviceSn === undefined ? this.auth.deviceSerial : validateDeviceSn(deviceSn);
  }
}
