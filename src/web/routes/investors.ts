import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { runPipeline } from '../../core/pipeline.js';
import { FORMS_BY_OPTION } from '../../core/types.js';
import { renderInvestorCsv } from '../../output/csv-renderer.js';
import { serializeInvestor } from '../../output/investor-renderer.js';
import type { AppDependencies } from '../app.js';
import { apiError, errorToHttpStatus, validationError } from '../serialization.js';

const querySchema = z.object({
  form: z.enum(['adv', '13f', 'all']).default('all'),
  limit: z.coerce.number().int().min(1).max(500).default(50),
  format: z.enum(['json', 'csv']).default('json'),
  wide: z.enum(['true', 'false']).default('false').transform(v => v === 'true'),
});

export function registerInvestorRoutes(server: FastifyInstance, deps: AppDependencies) {
  server.get('/api/investors', async (request, reply) => {
    const parsed = querySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(errorToHttpStatus('validation')).send(validationError(parsed.error));
    }

    const { form, limit, format, wide } = parsed.data;
    const result = await runPipeline({
      client: deps.client,
      forms: FORMS_BY_OPTION[form],
      limit,
      concurrency: deps.concurrency,
      logger: deps.logger,
    });

    // Nothing came back and something failed upstream: report it as a gateway error
    if (result.investors.length === 0 && result.failures.length > 0) {
      return reply.status(errorToHttpStatus('upstream_failed')).send({
        ...apiError('upstream_failed', 'SEC EDGAR requests failed', result.failures.map(f => f.message)),
        failures: result.failures,
      });
    }

    if (format === 'csv') {
      return reply
        .header('content-type', 'text/csv; charset=utf-8')
        .send(renderInvestorCsv(result.investors, { wide }));
    }

    return reply.send({
      investors: result.investors.map(serializeInvestor),
      summary: result.summary,
      skipped: result.skipped,
      failures: result.failures,
    });
  });
}
