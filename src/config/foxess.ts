/**
 * FoxESS Cloud open API contract
 *
 * Endpoint paths, quota numbers and credential shapes are fixed by the
 * upstream API and must match it exactly.
 *
 * @module config/foxess
 */

import type { RequestType } from '../types/foxess';

export const FOXESS_API_BASE = 'https://www.foxesscloud.com';

/**
 * Open API endpoint paths. The path (not the full URL) is the signed component.
 */
export const FOXESS_ENDPOINTS = {
  deviceList: '/op/v0/device/list',
  deviceDetail: '/op/v0/device/detail',
  realtimeData: '/op/v0/device/real/query',
  historicalData: '/op/v0/device/history/query',
  reportData: '/op/v0/device/report/query',
  generation: '/op/v0/device/generation',
} as const;

export type FoxEssEndpoint = (typeof FOXESS_ENDPOINTS)[keyof typeof FOXESS_ENDPOINTS];

/**
 * Upstream quota: requests per device per rolling 24 hours
 */
export const DAILY_REQUEST_LIMIT = 1440;

export const RATE_WINDOW_MS = 24 * 60 * 60 * 1000;

/**
 * Minimum spacing between consecutive requests, in seconds
 */
export const MIN_INTERVAL_SECONDS = {
  query: 1,
  update: 2,
} as const satisfies Record<RequestType, number>;

/**
 * Retry-After suggested when the upstream itself answers 429
 */
export const UPSTREAM_RATE_LIMIT_RETRY_AFTER = 60;

export const DEFAULT_TIMEOUT_SECONDS = 30;

export const DEFAULT_LANG = 'en';

/**
 * 8-4-4-4-12 hexadecimal groups
 */
export const TOKEN_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export const DEVICE_SN_PATTERN = /^[A-Z0-9]{10,20}$/;

export const USER_AGENT = 'foxess-cloud-proxy/1.0';

/**
 * Longest custom history range accepted
 */
export const MAX_HISTORY_RANGE_MS = 365 * 24 * 60 * 60 * 1000;
