#!/usr/bin/env node

import { Command, Option } from 'commander';
import chalk from 'chalk';
import { loadConfig, type AppConfig } from './core/config.js';
import { ConfigError, IOError, errorMessage } from './core/errors.js';
import { createConsoleLogger } from './core/logger.js';
import { RateLimiter } from './core/rate-limiter.js';
import { EdgarClient } from './core/edgar-client.js';
import { ResponseCache, cachePathFor } from './core/cache.js';
import { DEFAULT_LIMIT, runPipeline } from './core/pipeline.js';
import { CATEGORY_LABELS, FORMS_BY_OPTION, type FormOption } from './core/types.js';
import { CLASSIFICATION_RULES } from './processing/classification-rules.js';
import { adHocRecord, classify, findMatchingRule } from './processing/investor-classifier.js';
import { exportInvestors } from './output/csv-exporter.js';
import { renderInvestorCsv } from './output/csv-renderer.js';
import { renderCategorySummary, renderResultJson, renderSampleTable } from './output/investor-renderer.js';
import { formatCurrency } from './output/format-utils.js';
import { checkOutputOptions, parseAmount, parsePositiveInt } from './cli-options.js';

interface ScrapeOptions {
  limit: number;
  form: FormOption;
  output: string;
  concurrency?: number;
  wide?: boolean;
  json?: boolean;
  cache: boolean;
  allowPartial?: boolean;
  verbose?: boolean;
}

function readConfig(): AppConfig | null {
  try {
    return loadConfig();
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    console.error(chalk.red(err.message));
    return null;
  }
}

async function executeScrape(options: ScrapeOptions): Promise<number> {
  const conflict = checkOutputOptions(options);
  if (conflict) {
    console.error(chalk.red(conflict));
    return 1;
  }

  const config = readConfig();
  if (!config) return 1;

  const logger = createConsoleLogger({ verbose: options.verbose });
  const cache = options.cache ? new ResponseCache(cachePathFor(config.cacheDir)) : null;
  const client = new EdgarClient({
    rateLimiter: new RateLimiter({ requestsPerSecond: config.requestsPerSecond, burst: config.burst }),
    userAgent: config.userAgent,
    maxAttempts: config.maxAttempts,
    timeoutMs: config.timeoutMs,
    cache,
    logger,
  });

  // Ctrl+C stops new fetches; in-flight requests finish and partial results are exported
  const controller = new AbortController();
  const onSigint = () => {
    logger.warn('Stopping: waiting for in-flight requests (Ctrl+C again to force quit)...');
    controller.abort();
    process.once('SIGINT', () => process.exit(130));
  };
  process.once('SIGINT', onSigint);

  try {
    const result = await runPipeline({
      client,
      forms: FORMS_BY_OPTION[options.form],
      limit: options.limit,
      concurrency: options.concurrency ?? config.concurrency,
      signal: controller.signal,
      logger,
    });

    if (options.output === '-') {
      process.stdout.write(renderInvestorCsv(result.investors, { wide: options.wide }));
    } else {
      try {
        const written = await exportInvestors(result.investors, options.output, { wide: options.wide });
        logger.info(chalk.green(`Saved ${written.rows} rows to ${options.output}`));
      } catch (err) {
        if (!(err instanceof IOError)) throw err;
        logger.error(err.message);
        return 1;
      }
    }

    if (options.json) {
      console.log(renderResultJson(result));
    } else if (options.output !== '-') {
      console.log('');
      console.log(renderCategorySummary(result.summary, result.investors.length));
      console.log('');
      console.log(renderSampleTable(result.investors));
      console.log('');
    }

    if (result.skipped.length > 0) {
      logger.warn(`${result.skipped.length} documents skipped (unparseable)`);
    }

    if (result.failures.length > 0) {
      for (const f of result.failures) {
        logger.error(`${f.stage} ${f.filing_type}: ${f.message}`);
      }
      if (!options.allowPartial) return 1;
    }

    return 0;
  } finally {
    process.off('SIGINT', onSigint);
    cache?.close();
  }
}

const program = new Command();

program
  .name('edgar-investors')
  .description('Scrape SEC EDGAR for investment advisers and 13F filers, classify them, and export CSV')
  .version('0.1.0');

program
  .command('scrape', { isDefault: true })
  .description('Fetch, classify and export investors')
  .option('-l, --limit <n>', 'Maximum number of filings to fetch', parsePositiveInt, DEFAULT_LIMIT)
  .addOption(new Option('-f, --form <form>', 'Which source to scrape').choices(['adv', '13f', 'all']).default('all'))
  .option('-o, --output <file>', 'CSV destination ("-" for stdout)', 'vc_database.csv')
  .option('-c, --concurrency <n>', 'Concurrent fetchers (shares one rate limit)', parsePositiveInt)
  .option('-w, --wide', 'Add cik, state, sic_description and source columns')
  .option('-j, --json', 'Print results as JSON instead of tables')
  .option('--no-cache', 'Bypass the local response cache')
  .option('--allow-partial', 'Exit 0 even if some fetches failed')
  .option('-v, --verbose', 'Log every request')
  .action(async (options: ScrapeOptions) => {
    try {
      process.exitCode = await executeScrape(options);
    } catch (err) {
      console.error(chalk.red(`Error: ${errorMessage(err)}`));
      process.exitCode = 1;
    }
  });

program
  .command('classify')
  .description('Classify an entity name without fetching anything')
  .argument('<name...>', 'Entity name (e.g., "Blue Harbor Family Office")')
  .option('-s, --sic <description>', 'SIC description to match alongside the name')
  .option('-a, --aum <dollars>', 'Reported assets under management', parseAmount)
  .option('-p, --positions <n>', 'Number of 13F holdings', parsePositiveInt)
  .addOption(new Option('-f, --form <form>', 'Filing type').choices(['adv', '13f']).default('adv'))
  .action((nameParts: string[], options: { sic?: string; aum?: number; positions?: number; form: 'adv' | '13f' }) => {
    const record = adHocRecord({
      entity_name: nameParts.join(' '),
      filing_type: options.form === '13f' ? '13F' : 'ADV',
      sic_description: options.sic,
      aum: options.aum,
      positions: options.positions,
    }, 'command line');

    const investor = classify(record);
    const rule = findMatchingRule(record);

    console.log(`\n  ${chalk.bold(investor.entity_name)}`);
    console.log(`  Category: ${chalk.cyan(CATEGORY_LABELS[investor.category])}`);
    console.log(`  Rule:     ${rule ? `${rule.id} ${chalk.dim(`(${rule.description})`)}` : chalk.dim('no rule matched')}`);
    if (investor.aum !== null) console.log(`  AUM:      ${formatCurrency(investor.aum)}`);
    console.log('');
  });

program
  .command('rules')
  .description('List classification rules in priority order')
  .action(() => {
    console.log(chalk.bold('\nClassification Rules (first match wins)\n'));
    CLASSIFICATION_RULES.forEach((rule, i) => {
      console.log(`  ${String(i + 1).padStart(2)}. ${chalk.cyan(rule.id.padEnd(24))} ${CATEGORY_LABELS[rule.category]}`);
      console.log(`      ${chalk.dim(rule.description)}`);
    });
    console.log(`\n  Anything else is classified as ${chalk.cyan('Other')}.\n`);
  });

program
  .command('cache')
  .description('Manage the local response cache')
  .option('--clear', 'Clear all cached responses')
  .option('--stats', 'Show cache statistics')
  .action((options: { clear?: boolean; stats?: boolean }) => {
    const config = readConfig();
    if (!config) {
      process.exitCode = 1;
      return;
    }

    const cache = new ResponseCache(cachePathFor(config.cacheDir));
    try {
      if (options.clear) {
        cache.clear();
        console.log(chalk.green('Cache cleared.'));
        return;
      }
      const stats = cache.stats();
      const sizeMb = (stats.sizeBytes / 1024 / 1024).toFixed(1);
      if (options.stats) {
        console.log(`\n  Cache entries: ${stats.entries}`);
        console.log(`  Cache size:    ${sizeMb} MB`);
        console.log(`  Location:      ${cache.dbPath}\n`);
      } else {
        console.log(`\n  Cache: ${stats.entries} entries, ${sizeMb} MB`);
        console.log(`  Use --clear to reset, --stats for details\n`);
      }
    } finally {
      cache.close();
    }
  });

await program.parseAsync();
