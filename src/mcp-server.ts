#!/usr/bin/env node

/**
 * MCP (Model Context Protocol) server entry point for edgar-investors.
 *
 * Tools:
 *   - scrape_investors: fetch and classify advisers / 13F filers from EDGAR
 *   - classify_entity: classify a name without fetching anything
 *   - list_classification_rules: the rule table in priority order
 *
 * Resources:
 *   - edgar-investors://rules: classification rules as JSON
 *
 * Logs go to stderr; stdout carries the protocol.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { loadConfig } from './core/config.js';
import { ResponseCache, cachePathFor } from './core/cache.js';
import { EdgarClient } from './core/edgar-client.js';
import { createConsoleLogger } from './core/logger.js';
import { runPipeline } from './core/pipeline.js';
import { RateLimiter } from './core/rate-limiter.js';
import { FORMS_BY_OPTION } from './core/types.js';
import { CLASSIFICATION_RULES } from './processing/classification-rules.js';
import { adHocRecord, classify, findMatchingRule } from './processing/investor-classifier.js';
import { renderInvestorCsv } from './output/csv-renderer.js';
import { serializeInvestor } from './output/investor-renderer.js';

const config = loadConfig();
const logger = createConsoleLogger();
const cache = new ResponseCache(cachePathFor(config.cacheDir));
const client = new EdgarClient({
  rateLimiter: new RateLimiter({ requestsPerSecond: config.requestsPerSecond, burst: config.burst }),
  userAgent: config.userAgent,
  maxAttempts: config.maxAttempts,
  timeoutMs: config.timeoutMs,
  cache,
  logger,
});

function rulesJson(): string {
  return JSON.stringify({
    rules: CLASSIFICATION_RULES.map((rule, i) => ({
      priority: i + 1,
      id: rule.id,
      category: rule.category,
      description: rule.description,
    })),
    fallback: 'Other',
  }, null, 2);
}

const server = new McpServer(
  { name: 'edgar-investors', version: '0.1.0' },
  { capabilities: { tools: {}, resources: {} } }
);

// ── Tools ──────────────────────────────────────────────────────────────

server.tool(
  'scrape_investors',
  'Fetch investment advisers (SEC company registry) and/or recent 13F-HR filers from SEC EDGAR, classify each as VC, PE, Family Office, Hedge Fund or Other, and return the records. Requests are rate limited to the SEC fair access ceiling, so large limits take a while.',
  {
    form: z.enum(['adv', '13f', 'all']).optional().default('all').describe('Source: adv (adviser registry), 13f (recent 13F-HR filings) or all'),
    limit: z.number().int().min(1).max(200).optional().default(25).describe('Maximum filings to fetch (1-200, default 25)'),
    format: z.enum(['json', 'csv']).optional().default('json').describe('Output format'),
  },
  async ({ form, limit, format }) => {
    const result = await runPipeline({
      client,
      forms: FORMS_BY_OPTION[form],
      limit,
      concurrency: config.concurrency,
      logger,
    });

    if (result.investors.length === 0 && result.failures.length > 0) {
      return {
        content: [{ type: 'text', text: 'SEC EDGAR requests failed:\n' + result.failures.map(f => `  ${f.stage} ${f.filing_type}: ${f.message}`).join('\n') }],
        isError: true,
      };
    }

    const text = format === 'csv'
      ? renderInvestorCsv(result.investors)
      : JSON.stringify({
          investors: result.investors.map(serializeInvestor),
          summary: result.summary,
          skipped: result.skipped.length,
          failures: result.failures.length > 0 ? result.failures : undefined,
        }, null, 2);

    return { content: [{ type: 'text', text }] };
  }
);

server.tool(
  'classify_entity',
  'Classify an investor by name (plus optional SIC description, AUM and 13F position count) using the same rules as the scraper. No network access.',
  {
    entity_name: z.string().min(1).describe('Entity name, e.g. "Blue Harbor Family Office LLC"'),
    sic_description: z.string().optional().describe('SEC SIC description, if known'),
    filing_type: z.enum(['ADV', '13F']).optional().default('ADV').describe('Filing the entity comes from'),
    aum: z.number().nonnegative().optional().describe('Assets under management in dollars'),
    positions: z.number().int().nonnegative().optional().describe('Number of 13F holdings'),
  },
  async ({ entity_name, sic_description, filing_type, aum, positions }) => {
    const record = adHocRecord({ entity_name, filing_type, sic_description, aum, positions }, 'mcp');

    const investor = classify(record);
    const rule = findMatchingRule(record);

    return {
      content: [{
        type: 'text',
        text: JSON.stringify({
          entity_name: investor.entity_name,
          category: investor.category,
          aum: investor.aum,
          rule: rule ? { id: rule.id, description: rule.description } : null,
        }, null, 2),
      }],
    };
  }
);

server.tool(
  'list_classification_rules',
  'List the investor classification rules in the order they are evaluated (first match wins).',
  {},
  async () => ({ content: [{ type: 'text', text: rulesJson() }] })
);

// ── Resources ──────────────────────────────────────────────────────────

server.resource(
  'classification-rules',
  'edgar-investors://rules',
  { description: 'Investor classification rules in priority order', mimeType: 'application/json' },
  async (uri) => ({
    contents: [{ uri: uri.href, mimeType: 'application/json', text: rulesJson() }],
  })
);

// ── Start Server ───────────────────────────────────────────────────────

process.once('exit', () => cache.close());

const transport = new StdioServerTransport();
await server.connect(transport);
