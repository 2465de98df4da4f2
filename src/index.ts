/**
 * FoxESS Cloud Proxy
 *
 * HTTP front for the FoxESS Cloud open API with:
 * - Proper CORS headers on ALL responses (including errors)
 * - Two-tier caching (memory + encrypted disk) per data class
 * - Local enforcement of the upstream daily quota and request spacing
 * - Request coalescing to prevent duplicate upstream requests
 *
 * @module foxess-cloud-proxy
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { isCacheDataType } from './config/cache';
import { buildCacheHeaders, type CacheResult } from './services/cached-fetch';
import type { FoxEssClient } from './services/foxess-client';
import type { AppConfig } from './types/foxess';
import { ProxyError, RateLimitExceededError, UpstreamError, ValidationError } from './utils/errors';
import { createLogger } from './utils/logger';
import {
  parseDimension,
  parseReportType,
  parseTimeRange,
  parseTimestamp,
  parseVariables,
} from './utils/validation';

const logger = createLogger('app');

const SERVICE_NAME = 'foxess-cloud-proxy';
const SERVICE_VERSION = '1.0.0';

/**
 * Upstream statuses passed through as-is; anything else becomes 502
 */
const PASSTHROUGH_STATUSES = [400, 404, 408, 409, 422, 500, 501, 502, 503, 504] as const;

type ErrorStatus = 400 | 401 | 429 | 500 | 502 | (typeof PASSTHROUGH_STATUSES)[number];

function upstreamStatus(status: number): ErrorStatus {
  return PASSTHROUGH_STATUSES.find((s) => s === status) ?? 502;
}

function statusFor(error: ProxyError): ErrorStatus {
  switch (error.code) {
    case 'VALIDATION_ERROR':
      return 400;
    case 'AUTHENTICATION_ERROR':
      return 401;
    case 'RATE_LIMIT_ERROR':
      return 429;
    case 'NETWORK_ERROR':
      return 502;
    case 'API_ERROR':
      return error instanceof UpstreamError ? upstreamStatus(error.status) : 502;
    default:
      return 500;
  }
}

export interface AppDependencies {
  client: FoxEssClient;
  config: Pick<AppConfig, 'environment' | 'allowedOrigins'>;
}

export function createApp({ client, config }: AppDependencies): Hono {
  const app = new Hono();
  const isDevelopment = config.environment === 'development';

  const withCacheHeaders = (result: CacheResult<unknown>, dataType: string) =>
    buildCacheHeaders(result.source, client.cache.ttlFor(dataType));

  // ===========================================================================
  // CORS Middleware - Applied to ALL responses including errors
  // ===========================================================================

  app.use('*', async (c, next) => {
    const allowedOrigins = config.allowedOrigins;
    const origin = c.req.header('Origin') || '';

    const isAllowed = isDevelopment
      ? // In development, allow localhost on any port
        origin.startsWith('http://localhost:') || origin.startsWith('http://127.0.0.1:')
      : allowedOrigins.includes(origin);

    return cors({
      origin: isAllowed ? origin : allowedOrigins[0] ?? '',
      allowMethods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
      allowHeaders: ['Content-Type', 'Accept'],
      exposeHeaders: ['X-Cache', 'X-Cache-Source', 'Retry-After'],
      maxAge: 86400, // Cache preflight for 24 hours
      credentials: false,
    })(c, next);
  });

  // ===========================================================================
  // Health Check
  // ===========================================================================

  app.get('/', (c) => {
    return c.json({
      name: SERVICE_NAME,
      status: 'ok',
      environment: config.environment,
      version: SERVICE_VERSION,
    });
  });

  app.get('/health', (c) => {
    return c.json({ status: 'ok' });
  });

  // ===========================================================================
  // Device Routes
  // ===========================================================================

  app.get('/api/v1/devices', async (c) => {
    const result = await client.getDeviceList();
    return c.json({ data: result.data }, 200, withCacheHeaders(result, 'device_info'));
  });

  app.get('/api/v1/devices/:sn', async (c) => {
    const result = await client.getDeviceDetail(c.req.param('sn'));
    return c.json({ data: result.data }, 200, withCacheHeaders(result, 'device_info'));
  });

  /**
   * GET /api/v1/devices/:sn/realtime?variables=pvPower,loadsPower
   */
  app.get('/api/v1/devices/:sn/realtime', async (c) => {
    const variables = parseVariables(c.req.query('variables'));
    const result = await client.getRealtimeData(c.req.param('sn'), variables);
    return c.json({ data: result.data }, 200, withCacheHeaders(result, 'realtime'));
  });

  /**
   * GET /api/v1/devices/:sn/history?begin=&end=&variables=&dimension=
   *
   * Times are epoch milliseconds or ISO-8601; the range defaults to the
   * last 24 hours.
   */
  app.get('/api/v1/devices/:sn/history', async (c) => {
    const { begin, end } = parseTimeRange(c.req.query('begin'), c.req.query('end'));
    const result = await client.getHistoricalData(c.req.param('sn'), {
      begin,
      end,
      variables: parseVariables(c.req.query('variables')),
      dimension: parseDimension(c.req.query('dimension')),
    });
    return c.json({ data: result.data }, 200, withCacheHeaders(result, 'historical'));
  });

  /**
   * GET /api/v1/devices/:sn/report?type=day|month|year&date=
   */
  app.get('/api/v1/devices/:sn/report', async (c) => {
    const dateParam = c.req.query('date');
    const result = await client.getReportData(c.req.param('sn'), {
      reportType: parseReportType(c.req.query('type')),
      date: dateParam ? parseTimestamp(dateParam, 'date') : Date.now(),
    });
    return c.json({ data: result.data }, 200, withCacheHeaders(result, 'report'));
  });

  app.get('/api/v1/devices/:sn/generation', async (c) => {
    const result = await client.getGeneration(c.req.param('sn'));
    return c.json({ data: result.data }, 200, withCacheHeaders(result, 'realtime'));
  });

  // ===========================================================================
  // Quota & Cache Management
  // ===========================================================================

  app.get('/api/v1/quota', (c) => {
    return c.json(client.quota());
  });

  app.get('/api/v1/cache/stats', async (c) => {
    return c.json(await client.cache.stats());
  });

  app.post('/api/v1/cache/sweep', async (c) => {
    const removed = await client.cache.sweepExpired();
    return c.json({ removed });
  });

  /**
   * DELETE /api/v1/cache?type=realtime
   */
  app.delete('/api/v1/cache', async (c) => {
    const dataType = c.req.query('type');
    if (dataType !== undefined && !isCacheDataType(dataType)) {
      throw new ValidationError(`Unknown cache data type: ${dataType}`, 'type');
    }
    const cleared = await client.cache.clear(dataType);
    return c.json({ cleared });
  });

  // ===========================================================================
  // 404 Handler
  // ===========================================================================

  app.notFound((c) => {
    return c.json(
      {
        error: 'Not Found',
        message: 'The requested endpoint does not exist',
        availableEndpoints: [
          '/api/v1/devices',
          '/api/v1/devices/:sn',
          '/api/v1/devices/:sn/realtime',
          '/api/v1/devices/:sn/history',
          '/api/v1/devices/:sn/report',
          '/api/v1/devices/:sn/generation',
          '/api/v1/quota',
          '/api/v1/cache/stats',
          '/api/v1/cache/sweep',
          '/api/v1/cache',
        ],
      },
      404
    );
  });

  // ===========================================================================
  // Global Error Handler
  // ===========================================================================

  app.onError((err, c) => {
    if (err instanceof ProxyError) {
      const status = statusFor(err);
      if (status >= 500) {
        logger.error(`${c.req.method} ${c.req.path} failed: ${err.message}`);
      } else {
        logger.warn(`${c.req.method} ${c.req.path} rejected: ${err.message}`);
      }

      const headers: Record<string, string> = {};
      if (err instanceof RateLimitExceededError) {
        headers['Retry-After'] = String(Math.ceil(err.retryAfterSeconds));
      }
      return c.json(err.toJSON(), status, headers);
    }

    logger.error('Unhandled error:', err);
    return c.json(
      {
        error: {
          code: 'INTERNAL_ERROR',
          message: isDevelopment ? err.message : 'An unexpected error occurred',
          details: {},
        },
      },
      500
    );
  });

  return app;
}
