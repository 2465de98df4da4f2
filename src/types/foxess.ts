/**
 * FoxESS Cloud open API types
 */

/**
 * Request classes with different minimum spacing on the upstream side
 */
export type RequestType = 'query' | 'update';

export type HttpMethod = 'GET' | 'POST';

/**
 * Caller credentials. Validated once, never mutated.
 */
export interface Credential {
  readonly apiToken: string;
  readonly deviceSerial: string;
}

/**
 * Envelope every FoxESS endpoint responds with
 */
export interface FoxEssEnvelope<T = unknown> {
  errno: number;
  msg?: string;
  message?: string;
  result?: T;
}

export type HistoryDimension = 'hour' | 'day' | 'month';

export type ReportType = 'day' | 'month' | 'year';

export interface HistoryQuery {
  /** Epoch milliseconds */
  begin: number;
  /** Epoch milliseconds */
  end: number;
  variables?: string[];
  dimension?: HistoryDimension;
}

export interface ReportQuery {
  reportType: ReportType;
  /** Epoch milliseconds */
  date: number;
}

/**
 * Runtime configuration resolved from the environment
 */
export interface AppConfig {
  environment: string;
  port: number;
  allowedOrigins: string[];
  logLevel: LogLevel;
  foxess: {
    apiToken: string;
    deviceSerial: string;
    baseUrl: string;
    timeoutSeconds: number;
    lang: string;
  };
  cache: {
    memoryCacheSize: number;
    defaultTtl: number;
    diskCacheDir: string | null;
    enableEncryption: boolean;
    passphrase?: string;
  };
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
