import Fastify, { type FastifyInstance } from 'fastify';
import type { ResponseCache } from '../core/cache.js';
import type { Logger } from '../core/logger.js';
import type { EdgarSource } from '../core/pipeline.js';
import { registerInvestorRoutes } from './routes/investors.js';
import { registerClassifyRoutes } from './routes/classify.js';
import { registerMetaRoutes } from './routes/meta.js';
import { apiError, errorToHttpStatus } from './serialization.js';

export interface AppDependencies {
  client: EdgarSource;
  cache: ResponseCache | null;
  concurrency: number;
  logger: Logger;
}

/**
 * Build the REST API without listening, so tests can drive it with inject().
 */
export function buildServer(deps: AppDependencies): FastifyInstance {
  const server = Fastify({ logger: false });

  registerInvestorRoutes(server, deps);
  registerClassifyRoutes(server);
  registerMetaRoutes(server, deps);

  server.setErrorHandler((error: Error, _request, reply) => {
    deps.logger.error(`Server error: ${error.message}`);
    reply.status(errorToHttpStatus('internal')).send(apiError('internal', 'Internal server error'));
  });

  return server;
}
