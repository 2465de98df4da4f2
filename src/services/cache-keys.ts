/**
 * Cache key construction
 *
 * Keys are deterministic: the same operation, device and parameters always
 * give the same key, whatever order the parameters were supplied in.
 * Realtime, diagnosis and forecast keys are bucketed into a time window so
 * that requests inside the same window share an entry.
 */

import { createHash } from 'node:crypto';

export type KeyParams = Record<string, unknown>;

const KEY_PREFIX = 'foxess';

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

function shortHash(input: string): string {
  return createHash('sha256').update(input, 'utf8').digest('hex').slice(0, 32);
}

/**
 * Start of the window of `sizeMs` containing `timestamp`, in epoch seconds
 */
function bucket(timestamp: number, sizeMs: number): number {
  return (Math.floor(timestamp / sizeMs) * sizeMs) / 1000;
}

function variablesKey(variables?: readonly string[]): string {
  return variables && variables.length > 0 ? [...variables].sort().join(',') : 'all';
}

function timeString(value: Date | string | number): string {
  return value instanceof Date ? value.toISOString() : String(value);
}

/**
 * Generic key: `foxess:<operation>:<hash>` where the hash covers the
 * operation, device and every defined parameter sorted by name.
 * Parameters are hashed as JSON so separators inside values and the
 * difference between `'1'` and `1` both survive.
 */
export function buildKey(operation: string, deviceId: string, params: KeyParams = {}): string {
  const entries: Array<[string, unknown]> = [];

  for (const name of Object.keys(params).sort()) {
    const value = params[name];
    if (value === undefined) continue;
    entries.push([name, value]);
  }

  return `${KEY_PREFIX}:${operation}:${shortHash(JSON.stringify([operation, deviceId, entries]))}`;
}

/**
 * Realtime data, bucketed by minute
 */
export function realtimeKey(
  deviceSn: string,
  variables?: readonly string[],
  now: number = Date.now()
): string {
  return `realtime:${deviceSn}:${bucket(now, MINUTE_MS)}:${variablesKey(variables)}`;
}

/**
 * Historical data. The time range and variables are hashed to keep keys short.
 */
export function historicalKey(
  deviceSn: string,
  start: Date | string | number,
  end: Date | string | number,
  variables?: readonly string[],
  dimension = 'hour'
): string {
  const input = [deviceSn, timeString(start), timeString(end), variablesKey(variables), dimension];
  return `historical:${deviceSn}:${shortHash(JSON.stringify(input))}`;
}

/**
 * Diagnosis results, bucketed by hour
 */
export function diagnosisKey(deviceSn: string, checkType: string, now: number = Date.now()): string {
  return `diagnosis:${deviceSn}:${checkType}:${bucket(now, HOUR_MS)}`;
}

/**
 * Forecasts, bucketed by day
 */
export function forecastKey(
  deviceSn: string,
  forecastType: string,
  weatherIntegration = false,
  now: number = Date.now()
): string {
  const weather = weatherIntegration ? 'weather' : 'no_weather';
  return `forecast:${deviceSn}:${forecastType}:${weather}:${bucket(now, DAY_MS)}`;
}

export function reportKey(deviceSn: string, reportType: string, date: Date | string | number): string {
  return `report:${deviceSn}:${reportType}:${timeString(date)}`;
}
