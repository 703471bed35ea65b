#!/usr/bin/env node

/**
 * REST API server for edgar-investors.
 *
 * Usage:
 *   npm run web                  # Start on default port 3005
 *   PORT=8080 npm run web        # Custom port
 */

import { loadConfig } from '../core/config.js';
import { ResponseCache, cachePathFor } from '../core/cache.js';
import { EdgarClient } from '../core/edgar-client.js';
import { createConsoleLogger } from '../core/logger.js';
import { RateLimiter } from '../core/rate-limiter.js';
import { buildServer } from './app.js';

const config = loadConfig();
const logger = createConsoleLogger();
const cache = new ResponseCache(cachePathFor(config.cacheDir));

// One limiter for the whole process: concurrent API requests share the SEC budget
const client = new EdgarClient({
  rateLimiter: new RateLimiter({ requestsPerSecond: config.requestsPerSecond, burst: config.burst }),
  userAgent: config.userAgent,
  maxAttempts: config.maxAttempts,
  timeoutMs: config.timeoutMs,
  cache,
  logger,
});

const server = buildServer({ client, cache, concurrency: config.concurrency, logger });
server.addHook('onClose', async () => cache.close());

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    server.close().then(() => process.exit(0), (err: unknown) => {
      logger.error(`Shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    });
  });
}

await server.listen({ port: config.port, host: '0.0.0.0' });

console.log(`
  edgar-investors API
  http://localhost:${config.port}

  API: http://localhost:${config.port}/api/investors?limit=20
  Press Ctrl+C to stop
`);
