import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { adHocRecord, classify, findMatchingRule } from '../../processing/investor-classifier.js';
import { errorToHttpStatus, validationError } from '../serialization.js';

const bodySchema = z.object({
  entity_name: z.string().trim().min(1),
  filing_type: z.enum(['ADV', '13F']).default('ADV'),
  filing_date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).optional(),
  sic_description: z.string().optional(),
  aum: z.number().nonnegative().optional(),
  table_entry_total: z.number().int().nonnegative().optional(),
});

export function registerClassifyRoutes(server: FastifyInstance) {
  server.post('/api/classify', async (request, reply) => {
    const parsed = bodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(errorToHttpStatus('validation')).send(validationError(parsed.error));
    }

    const { table_entry_total, ...entity } = parsed.data;
    const record = adHocRecord({ ...entity, positions: table_entry_total }, 'api');

    const investor = classify(record);
    const rule = findMatchingRule(record);

    return reply.send({
      entity_name: investor.entity_name,
      category: investor.category,
      aum: investor.aum,
      rule: rule ? { id: rule.id, description: rule.description } : null,
    });
  });
}
