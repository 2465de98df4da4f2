/**
 * Node.js entry point
 */

import { serve } from '@hono/node-server';
import { loadConfig } from './config/env';
import { createApp } from './index';
import { FoxEssClient } from './services/foxess-client';
import { errorMessage } from './utils/errors';
import { createLogger, setLogLevel } from './utils/logger';

const logger = createLogger('server');

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const client = FoxEssClient.fromConfig(config);
  const removed = await client.cache.sweepExpired();
  if (removed > 0) {
    logger.info(`Removed ${removed} expired cache entries at startup`);
  }

  const app = createApp({ client, config });
  serve({ fetch: app.fetch, port: config.port }, (info) => {
    logger.info(`Listening on http://localhost:${info.port} (${config.environment})`);
  });
}

main().catch((error: unknown) => {
  logger.error(`Failed to start: ${errorMessage(error)}`);
  process.exitCode = 1;
});
