/**
 * Error taxonomy for the proxy
 *
 * Every error carries a stable machine-readable `code` and serializes to
 * `{ error: { code, message, details } }` for the HTTP surface.
 */

export type ErrorDetails = Record<string, unknown>;

export class ProxyError extends Error {
  readonly code: string;
  readonly details: ErrorDetails;

  constructor(message: string, code = 'UNKNOWN_ERROR', details: ErrorDetails = {}) {
    super(message);
    this.name = 'ProxyError';
    this.code = code;
    this.details = details;
  }

  toJSON(): { error: { code: string; message: string; details: ErrorDetails } } {
    return {
      error: {
        code: this.code,
        message: this.message,
        details: this.details,
      },
    };
  }
}

/**
 * Missing or malformed configuration/credentials. Fatal, never retried.
 */
export class ConfigurationError extends ProxyError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Local quota or upstream 429. Retryable after `retryAfterSeconds`.
 */
export class RateLimitExceededError extends ProxyError {
  readonly retryAfterSeconds: number;
  readonly remainingToday: number | undefined;

  constructor(message: string, retryAfterSeconds: number, remainingToday?: number) {
    const details: ErrorDetails = { retry_after_seconds: retryAfterSeconds };
    if (remainingToday !== undefined) {
      details.remaining_today = remainingToday;
    }
    super(message, 'RATE_LIMIT_ERROR', details);
    this.name = 'RateLimitExceededError';
    this.retryAfterSeconds = retryAfterSeconds;
    this.remainingToday = remainingToday;
  }
}

/**
 * Filesystem or decryption failure on one cache entry.
 * Recovered inside the cache store by treating the entry as absent.
 */
export class CacheIOError extends ProxyError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, 'CACHE_ERROR', details);
    this.name = 'CacheIOError';
  }
}

/**
 * Signature or token rejected upstream. Not retried: the same clock skew or
 * secret fails the same way.
 */
export class UpstreamAuthError extends ProxyError {
  readonly status: number;

  constructor(status: number, message = 'Authentication failed. Check your API token.') {
    super(message, 'AUTHENTICATION_ERROR', { status_code: status });
    this.name = 'UpstreamAuthError';
    this.status = status;
  }
}

/**
 * Custom error for upstream API failures
 */
export class UpstreamError extends ProxyError {
  readonly status: number;
  readonly statusText: string;
  readonly errno: number | undefined;

  constructor(status: number, statusText: string, errno?: number) {
    const message =
      errno !== undefined
        ? `FoxESS API error ${errno}: ${statusText}`
        : `Upstream API error: ${status} ${statusText}`;
    const details: ErrorDetails = { status_code: status };
    if (errno !== undefined) {
      details.errno = errno;
    }
    super(message, 'API_ERROR', details);
    this.name = 'UpstreamError';
    this.status = status;
    this.statusText = statusText;
    this.errno = errno;
  }
}

/**
 * Transport failure (connection refused, DNS, timeout)
 */
export class NetworkError extends ProxyError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, 'NETWORK_ERROR', details);
    this.name = 'NetworkError';
  }
}

/**
 * Invalid caller input
 */
export class ValidationError extends ProxyError {
  readonly field: string | undefined;

  constructor(message: string, field?: string) {
    super(message, 'VALIDATION_ERROR', field ? { field } : {});
    this.name = 'ValidationError';
    this.field = field;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
