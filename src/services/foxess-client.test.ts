import { describe, it, expect, beforeEach, vi } from 'vitest';
import { TEST_SERIAL, TEST_TOKEN, createMockFetch, envelopeResponse } from '../test-setup';
import {
  NetworkError,
  RateLimitExceededError,
  UpstreamAuthError,
  UpstreamError,
  ValidationError,
} from '../utils/errors';
import { FoxEssClient, type FetchLike } from './foxess-client';
import { RequestAuthenticator } from './request-auth';

const T0 = 1_700_000_000_000;
const BASE = 'https://foxess.test';

describe('FoxEssClient', () => {
  let now: number;

  beforeEach(() => {
    now = T0;
  });

  function createClient(fetchImpl: FetchLike) {
    return new FoxEssClient({
      apiToken: TEST_TOKEN,
      deviceSerial: TEST_SERIAL,
      baseUrl: `${BASE}/`,
      fetch: fetchImpl,
      now: () => now,
    });
  }

  describe('authorizedCall', () => {
    it('should send signed requests to the endpoint', async () => {
      const fetchMock = createMockFetch(envelopeResponse([{ sn: TEST_SERIAL }]));
      const client = createClient(fetchMock);

      const envelope = await client.authorizedCall('POST', '/op/v0/device/detail', { sn: TEST_SERIAL });

      expect(envelope).toEqual({ errno: 0, msg: 'success', message: undefined, result: [{ sn: TEST_SERIAL }] });
      expect(fetchMock).toHaveBeenCalledTimes(1);

      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe('https://foxess.test/op/v0/device/detail');
      expect(init.method).toBe('POST');
      expect(init.body).toBe('{"sn":"ABC1234567890"}');
      expect(init.headers).toMatchObject({
        token: TEST_TOKEN,
        timestamp: '1700000000000',
        lang: 'en',
      });
    });

    it('should sign only the path of a URL with a query string', async () => {
      const fetchMock = createMockFetch(envelopeResponse({}));
      const client = createClient(fetchMock);

      await client.authorizedCall('GET', '/op/v0/device/generation?sn=ABC1234567890');

      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe('https://foxess.test/op/v0/device/generation?sn=ABC1234567890');
      expect(init.body).toBeUndefined();
      const auth = new RequestAuthenticator(TEST_TOKEN, TEST_SERIAL);
      expect(init.headers).toMatchObject({
        signature: auth.signature('/op/v0/device/generation', T0),
      });
    });

    it.each([401, 403])('should map HTTP %i to an authentication error', async (status) => {
      const client = createClient(createMockFetch(new Response('nope', { status })));
      await expect(client.authorizedCall('GET', '/op/v0/device/list')).rejects.toBeInstanceOf(UpstreamAuthError);
    });

    it('should map HTTP 429 to a rate limit error', async () => {
      const client = createClient(createMockFetch(new Response('slow', { status: 429 })));
      await expect(client.authorizedCall('GET', '/op/v0/device/list')).rejects.toMatchObject({
        name: 'RateLimitExceededError',
        retryAfterSeconds: 60,
      });
    });

    it('should map other HTTP errors', async () => {
      const client = createClient(
        createMockFetch(new Response('oops', { status: 503, statusText: 'Service Unavailable' }))
      );
      await expect(client.authorizedCall('GET', '/op/v0/device/list')).rejects.toThrow(
        'Upstream API error: 503 Service Unavailable'
      );
    });

    it('should reject non-JSON bodies', async () => {
      const client = createClient(createMockFetch(new Response('<html>', { status: 200 })));
      await expect(client.authorizedCall('GET', '/op/v0/device/list')).rejects.toThrow(/Invalid JSON response/);
    });

    it('should reject bodies without errno', async () => {
      const client = createClient(createMockFetch(new Response('{"result":[]}', { status: 200 })));
      await expect(client.authorizedCall('GET', '/op/v0/device/list')).rejects.toThrow('Response is missing errno');
    });

    it('should surface a non-zero errno', async () => {
      const client = createClient(createMockFetch(envelopeResponse(null, 40256)));
      const error = await client.authorizedCall('GET', '/op/v0/device/list').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UpstreamError);
      expect(error).toMatchObject({ errno: 40256, message: 'FoxESS API error 40256: failed' });
    });

    it('should wrap transport failures', async () => {
      const client = createClient(
        vi.fn<FetchLike>(async () => {
          throw new TypeError('fetch failed');
        })
      );
      await expect(client.authorizedCall('GET', '/op/v0/device/list')).rejects.toThrow(
        new NetworkError('Request failed: fetch failed')
      );
    });

    it('should report timeouts', async () => {
      const client = createClient(
        vi.fn<FetchLike>(async () => {
          throw Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
        })
      );
      await expect(client.authorizedCall('GET', '/op/v0/device/list')).rejects.toThrow(
        'Request timeout after 30 seconds'
      );
    });

    it('should refuse locally before touching the network', async () => {
      const fetchMock = createMockFetch(envelopeResponse({}));
      const client = createClient(fetchMock);

      await client.authorizedCall('GET', '/op/v0/device/list');
      now += 400;
      const error = await client.authorizedCall('GET', '/op/v0/device/list').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RateLimitExceededError);
      expect(error).toMatchObject({
        message: 'Rate limit exceeded. Wait 0.6 seconds. Remaining requests today: 1439',
        retryAfterSeconds: 1,
        remainingToday: 1439,
      });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('should count failed requests against the quota', async () => {
      const client = createClient(createMockFetch(new Response('oops', { status: 500 })));
      await expect(client.authorizedCall('GET', '/op/v0/device/list')).rejects.toThrow(UpstreamError);
      expect(client.quota().remainingToday).toBe(1439);
    });
  });

  describe('cached operations', () => {
    it('should cache the device list', async () => {
      const fetchMock = createMockFetch(envelopeResponse([{ deviceSN: TEST_SERIAL }]));
      const client = createClient(fetchMock);

      const first = await client.getDeviceList();
      now += 5000;
      const second = await client.getDeviceList();

      expect(first).toEqual({ data: [{ deviceSN: TEST_SERIAL }], source: 'upstream' });
      expect(second).toEqual({ data: [{ deviceSN: TEST_SERIAL }], source: 'memory' });
      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(fetchMock.mock.calls[0][0]).toBe('https://foxess.test/op/v0/device/list');
    });

    it('should default to the configured device and upper-case serials', async () => {
      const fetchMock = createMockFetch(envelopeResponse({ deviceType: 'H1' }));
      const client = createClient(fetchMock);

      await client.getDeviceDetail();
      now += 5000;
      const again = await client.getDeviceDetail('abc1234567890');

      expect(again.source).toBe('memory');
      expect(fetchMock.mock.calls[0][1].body).toBe('{"sn":"ABC1234567890"}');
    });

    it('should reject malformed serials', async () => {
      const client = createClient(createMockFetch(envelopeResponse({})));
      await expect(client.getRealtimeData('bad-sn')).rejects.toBeInstanceOf(ValidationError);
    });

    it('should send realtime variables', async () => {
      const fetchMock = createMockFetch(envelopeResponse([]));
      const client = createClient(fetchMock);

      await client.getRealtimeData(undefined, ['pvPower']);

      expect(fetchMock.mock.calls[0][0]).toBe('https://foxess.test/op/v0/device/real/query');
      expect(fetchMock.mock.calls[0][1].body).toBe('{"sn":"ABC1234567890","variables":["pvPower"]}');
    });

    it('should send history and report queries', async () => {
      const fetchMock = createMockFetch(envelopeResponse([]));
      const client = createClient(fetchMock);

      await client.getHistoricalData(undefined, { begin: 1000, end: 2000 });
      now += 5000;
      await client.getReportData(undefined, { reportType: 'month', date: 3000 });

      expect(fetchMock.mock.calls[0][1].body).toBe('{"sn":"ABC1234567890","begin":1000,"end":2000}');
      expect(fetchMock.mock.calls[1][0]).toBe('https://foxess.test/op/v0/device/report/query');
      expect(fetchMock.mock.calls[1][1].body).toBe('{"sn":"ABC1234567890","reportType":"month","date":3000}');
    });

    it('should request generation with the serial in the query string', async () => {
      const fetchMock = createMockFetch(envelopeResponse({ today: 12.5 }));
      const client = createClient(fetchMock);

      const result = await client.getGeneration();

      expect(result.data).toEqual({ today: 12.5 });
      expect(fetchMock.mock.calls[0][0]).toBe('https://foxess.test/op/v0/device/generation?sn=ABC1234567890');
    });

    it('should not cache failures', async () => {
      const fetchMock = createMockFetch(
        new Response('oops', { status: 502, statusText: 'Bad Gateway' }),
        envelopeResponse([{ deviceSN: TEST_SERIAL }])
      );
      const client = createClient(fetchMock);

      await expect(client.getDeviceList()).rejects.toThrow(UpstreamError);
      now += 5000;
      await expect(client.getDeviceList()).resolves.toMatchObject({ source: 'upstream' });
    });
  });

  describe('fetchWithCache', () => {
    it('should run the fetch once per key', async () => {
      const client = createClient(createMockFetch(envelopeResponse({})));
      const fetchFn = vi.fn().mockResolvedValue({ score: 93 });

      const a = await client.fetchWithCache('diagnosis', TEST_SERIAL, { check: 'health' }, 'diagnosis', fetchFn);
      const b = await client.fetchWithCache('diagnosis', TEST_SERIAL, { check: 'health' }, 'diagnosis', fetchFn);

      expect(a).toEqual({ score: 93 });
      expect(b).toEqual({ score: 93 });
      expect(fetchFn).toHaveBeenCalledTimes(1);
    });

    it('should propagate fetch errors', async () => {
      const client = createClient(createMockFetch(envelopeResponse({})));
      const fetchFn = vi.fn().mockRejectedValue(new NetworkError('Request failed: boom'));

      await expect(client.fetchWithCache('x', TEST_SERIAL, {}, 'default', fetchFn)).rejects.toBeInstanceOf(
        NetworkError
      );
    });
  });

  describe('quota', () => {
    it('should report remaining requests and spacing', async () => {
      const client = createClient(createMockFetch(envelopeResponse({})));
      await client.authorizedCall('GET', '/op/v0/device/list');
      now += 250;

      expect(client.quota()).toEqual({ remainingToday: 1439, dailyLimit: 1440, waitSeconds: 0.75 });
    });

    it('should keep quota state per client', async () => {
      const fetchMock = createMockFetch(envelopeResponse({}));
      const a = createClient(fetchMock);
      const b = createClient(fetchMock);

      await a.authorizedCall('GET', '/op/v0/device/list');

      expect(a.quota().remainingToday).toBe(1439);
      expect(b.quota().remainingToday).toBe(1440);
    });
  });
});
