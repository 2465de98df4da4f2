/**
 * Tests for cache configuration
 */

import { describe, it, expect } from 'vitest';
import {
  CACHE_TTLS,
  MAX_CACHE_FILE_SIZE,
  DEFAULT_TTL_SECONDS,
  isCacheDataType,
  ttlFor,
} from './cache';

describe('CACHE_TTLS', () => {
  it('should cover every data class', () => {
    expect(Object.keys(CACHE_TTLS).sort()).toEqual([
      'default',
      'device_info',
      'diagnosis',
      'forecast',
      'historical',
      'realtime',
      'report',
    ]);
  });

  it('should keep realtime data the shortest-lived class', () => {
    // 3 minutes
    expect(CACHE_TTLS.realtime).toBe(180);
    Object.entries(CACHE_TTLS).forEach(([key, ttl]) => {
      expect(ttl, key).toBeGreaterThanOrEqual(CACHE_TTLS.realtime);
    });
  });

  it('should cache device info for a day', () => {
    expect(CACHE_TTLS.device_info).toBe(86400);
  });

  it('should use matching TTLs for closed-interval data', () => {
    expect(CACHE_TTLS.historical).toBe(3600);
    expect(CACHE_TTLS.report).toBe(3600);
    expect(CACHE_TTLS.diagnosis).toBe(1800);
    expect(CACHE_TTLS.forecast).toBe(1800);
  });

  it('should default to 5 minutes', () => {
    expect(DEFAULT_TTL_SECONDS).toBe(300);
  });

  it('should cap payloads at 10 MB', () => {
    expect(MAX_CACHE_FILE_SIZE).toBe(10485760);
  });
});

describe('ttlFor', () => {
  it('should return the table value for known classes', () => {
    expect(ttlFor('realtime')).toBe(180);
    expect(ttlFor('device_info', 60)).toBe(86400);
  });

  it('should fall back to the given default for unknown classes', () => {
    expect(ttlFor('weather', 42)).toBe(42);
    expect(ttlFor('weather')).toBe(300);
  });

  it('should let the configured default replace the table default', () => {
    expect(ttlFor('default', 900)).toBe(900);
  });
});

describe('isCacheDataType', () => {
  it('should accept table keys only', () => {
    expect(isCacheDataType('historical')).toBe(true);
    expect(isCacheDataType('toString')).toBe(false);
    expect(isCacheDataType('')).toBe(false);
  });
});
