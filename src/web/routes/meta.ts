import type { FastifyInstance } from 'fastify';
import { CATEGORY_LABELS, INVESTOR_CATEGORIES } from '../../core/types.js';
import { CLASSIFICATION_RULES } from '../../processing/classification-rules.js';
import type { AppDependencies } from '../app.js';

export function registerMetaRoutes(server: FastifyInstance, deps: AppDependencies) {
  server.get('/api/rules', async () => {
    return {
      categories: INVESTOR_CATEGORIES.map(id => ({ id, label: CATEGORY_LABELS[id] })),
      rules: CLASSIFICATION_RULES.map((rule, i) => ({
        priority: i + 1,
        id: rule.id,
        category: rule.category,
        description: rule.description,
      })),
    };
  });

  server.get('/api/cache-stats', async () => {
    if (!deps.cache) return { enabled: false, entries: 0, size_bytes: 0, size_mb: '0.0' };
    const stats = deps.cache.stats();
    return {
      enabled: true,
      entries: stats.entries,
      size_bytes: stats.sizeBytes,
      size_mb: (stats.sizeBytes / 1024 / 1024).toFixed(1),
    };
  });
}
