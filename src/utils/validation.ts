/**
 * Request argument validation for the HTTP surface
 */

import { DEVICE_SN_PATTERN, MAX_HISTORY_RANGE_MS } from '../config/foxess';
import type { HistoryDimension, ReportType } from '../types/foxess';
import { ValidationError } from './errors';

const VARIABLE_PATTERN = /^[A-Za-z][A-Za-z0-9_]{0,63}$/;

const DIMENSIONS: readonly HistoryDimension[] = ['hour', 'day', 'month'];
const REPORT_TYPES: readonly ReportType[] = ['day', 'month', 'year'];

export function validateDeviceSn(deviceSn: string): string {
  const sn = deviceSn.toUpperCase();
  if (!DEVICE_SN_PATTERN.test(sn)) {
    throw new ValidationError(
      'Invalid device serial number format. Must be 10-20 alphanumeric characters.',
      'device_sn'
    );
  }
  return sn;
}

/**
 * Comma-separated variable names; empty or missing means "all"
 */
export function parseVariables(raw: string | undefined): string[] | undefined {
  if (!raw) return undefined;
  const variables = raw
    .split(',')
    .map((v) => v.trim())
    .filter((v) => v.length > 0);

  for (const variable of variables) {
    if (!VARIABLE_PATTERN.test(variable)) {
      throw new ValidationError(`Invalid variable name: ${variable}`, 'variables');
    }
  }
  return variables.length > 0 ? Array.from(new Set(variables)) : undefined;
}

/**
 * Epoch milliseconds or an ISO-8601 date/time
 */
export function parseTimestamp(raw: string, field: string): number {
  if (/^\d+$/.test(raw)) {
    return parseInt(raw, 10);
  }
  const parsed = Date.parse(raw);
  if (isNaN(parsed)) {
    throw new ValidationError(`Invalid datetime format: ${raw}`, field);
  }
  return parsed;
}

/**
 * Resolve a history range, defaulting to the 24 hours before `now`
 */
export function parseTimeRange(
  beginRaw: string | undefined,
  endRaw: string | undefined,
  now: number = Date.now()
): { begin: number; end: number } {
  const end = endRaw ? parseTimestamp(endRaw, 'end') : now;
  const begin = beginRaw ? parseTimestamp(beginRaw, 'begin') : end - 24 * 60 * 60 * 1000;

  if (end <= begin) {
    throw new ValidationError('End time must be after start time', 'time_range');
  }
  if (end - begin > MAX_HISTORY_RANGE_MS) {
    throw new ValidationError('Time range too large. Maximum allowed: 365 days', 'time_range');
  }
  return { begin, end };
}

export function parseDimension(raw: string | undefined): HistoryDimension {
  if (!raw) return 'hour';
  const match = DIMENSIONS.find((d) => d === raw);
  if (!match) {
    throw new ValidationError(`Invalid dimension. Must be one of: ${DIMENSIONS.join(', ')}`, 'dimension');
  }
  return match;
}

export function parseReportType(raw: string | undefined): ReportType {
  if (!raw) return 'day';
  const match = REPORT_TYPES.find((t) => t === raw);
  if (!match) {
    throw new ValidationError(`Invalid report type. Must be one of: ${REPORT_TYPES.join(', ')}`, 'type');
  }
  return match;
}
