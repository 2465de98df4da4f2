/**
 * Test Setup - shared fixtures for the Node.js test environment
 *
 * - Silences the logger
 * - Temporary cache directories, removed after each test
 * - A scripted stand-in for the upstream `fetch`
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, vi } from 'vitest';
import type { FetchLike } from './services/foxess-client';
import { setLogLevel } from './utils/logger';

export const TEST_TOKEN = 'aaaaaaaa-bbbb-cccc-dddd-eeeeeeeeeeee';
export const TEST_SERIAL = 'ABC1234567890';

setLogLevel('silent');

const tempDirs: string[] = [];

/**
 * Create a fresh directory under the OS temp dir for one test
 */
export async function createTempDir(prefix = 'foxess-cache-test-'): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

afterEach(async () => {
  const dirs = tempDirs.splice(0);
  await Promise.all(dirs.map((dir) => rm(dir, { recursive: true, force: true })));
});

/**
 * A JSON response shaped like the FoxESS envelope
 */
export function envelopeResponse(result: unknown, errno = 0, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify({ errno, msg: errno === 0 ? 'success' : 'failed', result }), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
    ...init,
  });
}

/**
 * Mock upstream fetch answering with the given responses in order
 * (the last one repeats)
 */
export function createMockFetch(...responses: Array<Response | (() => Response | Promise<Response>)>) {
  let call = 0;
  return vi.fn<FetchLike>(async () => {
    const next = responses[Math.min(call, responses.length - 1)];
    call++;
    if (next === undefined) {
      return envelopeResponse(null);
    }
    // A Response body can only be read once
    return typeof next === 'function' ? next() : next.clone();
  });
}
