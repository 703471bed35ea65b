import chalk from 'chalk';
import { CATEGORY_LABELS, INVESTOR_CATEGORIES } from '../core/types.js';
import type { CategorySummary, ClassifiedInvestor } from '../core/types.js';
import type { PipelineResult } from '../core/pipeline.js';
import { formatCurrency, padRight, truncate } from './format-utils.js';

/**
 * Terminal and JSON renderers for scrape results.
 */

export function renderCategorySummary(summary: CategorySummary, total: number): string {
  const lines: string[] = [];
  const header = `Investors found: ${total}`;
  lines.push(chalk.bold(header));
  lines.push(chalk.dim('='.repeat(header.length)));
  lines.push('');
  lines.push(`  ${chalk.underline(padRight('Category', 18))}${chalk.underline(padRight('Count', 8))}${chalk.underline('Share')}`);

  for (const category of INVESTOR_CATEGORIES) {
    const count = summary[category];
    const share = total > 0 ? `${((count / total) * 100).toFixed(1)}%` : '--';
    lines.push(`  ${padRight(CATEGORY_LABELS[category], 18)}${padRight(String(count), 8)}${chalk.dim(share)}`);
  }

  return lines.join('\n');
}

export function renderSampleTable(investors: readonly ClassifiedInvestor[], max: number = 10): string {
  if (investors.length === 0) return chalk.dim('  No investors to show.');

  const sample = investors.slice(0, max);
  const lines: string[] = [];
  lines.push(
    `  ${chalk.underline(padRight('Name', 42))}${chalk.underline(padRight('Type', 16))}` +
    `${chalk.underline(padRight('Form', 6))}${chalk.underline(padRight('State', 7))}${chalk.underline('AUM')}`
  );

  for (const inv of sample) {
    const aum = inv.aum === null ? chalk.dim('--') : formatCurrency(inv.aum);
    lines.push(
      `  ${padRight(truncate(inv.entity_name, 40), 42)}${padRight(CATEGORY_LABELS[inv.category], 16)}` +
      `${padRight(inv.source_filing.filing_type, 6)}${padRight(inv.source_filing.raw_fields.state ?? '--', 7)}${aum}`
    );
  }

  if (investors.length > max) {
    lines.push(chalk.dim(`  … ${investors.length - max} more`));
  }

  return lines.join('\n');
}

export function serializeInvestor(inv: ClassifiedInvestor) {
  return {
    entity_name: inv.entity_name,
    category: inv.category,
    aum: inv.aum,
    filing: {
      filing_type: inv.source_filing.filing_type,
      filing_date: inv.source_filing.filing_date,
      source: inv.source_filing.source,
      fields: inv.source_filing.raw_fields,
    },
  };
}

/** Structured JSON for programmatic use */
export function renderResultJson(result: PipelineResult): string {
  return JSON.stringify({
    investors: result.investors.map(serializeInvestor),
    summary: result.summary,
    skipped: result.skipped,
    failures: result.failures,
    cancelled: result.cancelled,
  }, null, 2);
}
