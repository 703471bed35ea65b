/**
 * Scrape pipeline: index → fetch → parse → classify.
 *
 * Returns structured data and never prints; progress and skipped documents
 * go to the injected logger. Used by the CLI, the web API and the MCP server.
 *
 * Failure policy:
 * - ParseError on a document: logged, counted in `skipped`, run continues
 * - NetworkError on a document or index (after retries): counted in
 *   `failures`, run continues with the remaining documents
 * - anything else is a bug and propagates
 */

import pLimit from 'p-limit';
import { NetworkError, ParseError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import type { EdgarClient } from './edgar-client.js';
import { parseFiling } from '../processing/filing-parser.js';
import { classify, summarizeCategories } from '../processing/investor-classifier.js';
import { FILING_TYPES } from './types.js';
import type { CategorySummary, ClassifiedInvestor, DocumentRef, FilingType } from './types.js';

export type EdgarSource = Pick<EdgarClient, 'fetchIndex' | 'fetchDocument'>;

export interface PipelineOptions {
  client: EdgarSource;
  forms?: readonly FilingType[];
  /** Upper bound on documents fetched across all forms */
  limit?: number;
  concurrency?: number;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface SkippedDocument {
  source: string;
  entity_name: string;
  filing_type: FilingType;
  reason: string;
  missing_fields: string[];
}

export interface FetchFailure {
  stage: 'index' | 'document';
  filing_type: FilingType;
  url: string;
  status_code: number;
  message: string;
}

export interface PipelineResult {
  investors: ClassifiedInvestor[];
  skipped: SkippedDocument[];
  failures: FetchFailure[];
  /** Documents never fetched because the run was aborted */
  cancelled: number;
  summary: CategorySummary;
}

type DocumentOutcome =
  | { kind: 'classified'; investor: ClassifiedInvestor }
  | { kind: 'skipped'; skipped: SkippedDocument }
  | { kind: 'failed'; failure: FetchFailure }
  | { kind: 'cancelled' };

export const DEFAULT_LIMIT = 250;
export const DEFAULT_CONCURRENCY = 4;

/** Stable output order: name, then source URL */
export function sortInvestors(investors: readonly ClassifiedInvestor[]): ClassifiedInvestor[] {
  const key = (inv: ClassifiedInvestor) => [inv.entity_name.toLowerCase(), inv.source_filing.source] as const;
  return [...investors].sort((a, b) => {
    const [nameA, srcA] = key(a);
    const [nameB, srcB] = key(b);
    if (nameA !== nameB) return nameA < nameB ? -1 : 1;
    if (srcA !== srcB) return srcA < srcB ? -1 : 1;
    return 0;
  });
}

/** Keep the first ref per CIK, in order */
export function dedupeByCik(refs: readonly DocumentRef[]): DocumentRef[] {
  const seen = new Set<string>();
  const out: DocumentRef[] = [];
  for (const ref of refs) {
    if (seen.has(ref.cik)) continue;
    seen.add(ref.cik);
    out.push(ref);
  }
  return out;
}

function networkFailure(err: NetworkError, stage: FetchFailure['stage'], filingType: FilingType): FetchFailure {
  return {
    stage,
    filing_type: filingType,
    url: err.url,
    status_code: err.statusCode,
    message: err.message,
  };
}

async function collectRefs(
  client: EdgarSource,
  forms: readonly FilingType[],
  limit: number,
  failures: FetchFailure[],
  logger: Logger,
  signal: AbortSignal | undefined
): Promise<DocumentRef[]> {
  // Each form gets an even share of the limit
  const quota = Math.ceil(limit / forms.length);
  const refs: DocumentRef[] = [];

  for (const form of forms) {
    if (signal?.aborted) break;
    try {
      const found = await client.fetchIndex({ form, limit: quota });
      logger.info(`${form}: ${found.length} candidate filings`);
      refs.push(...found);
    } catch (err) {
      if (err instanceof NetworkError) {
        failures.push(networkFailure(err, 'index', form));
        logger.error(`${form} index failed: ${err.message}`);
      } else if (err instanceof ParseError) {
        failures.push({ stage: 'index', filing_type: form, url: err.source, status_code: 0, message: err.message });
        logger.error(`${form} index unreadable: ${err.message}`);
      } else {
        throw err;
      }
    }
  }

  return dedupeByCik(refs).slice(0, limit);
}

export async function runPipeline(options: PipelineOptions): Promise<PipelineResult> {
  const {
    client,
    forms = FILING_TYPES,
    limit = DEFAULT_LIMIT,
    concurrency = DEFAULT_CONCURRENCY,
    signal,
    logger = silentLogger,
  } = options;

  const failures: FetchFailure[] = [];
  const refs = forms.length > 0 && limit > 0
    ? await collectRefs(client, forms, limit, failures, logger, signal)
    : [];

  logger.info(`Fetching ${refs.length} documents (${concurrency} at a time)`);

  const limitTask = pLimit(Math.max(1, concurrency));
  let done = 0;

  const processRef = async (ref: DocumentRef): Promise<DocumentOutcome> => {
    // Stop issuing new fetches once aborted; in-flight ones finish
    if (signal?.aborted) return { kind: 'cancelled' };

    let raw: string;
    try {
      raw = await client.fetchDocument(ref);
    } catch (err) {
      if (!(err instanceof NetworkError)) throw err;
      logger.warn(`Fetch failed for ${ref.entity_name}: ${err.message}`);
      return { kind: 'failed', failure: networkFailure(err, 'document', ref.filing_type) };
    } finally {
      done += 1;
      if (done % 20 === 0) logger.info(`  processed ${done}/${refs.length}`);
    }

    const parsed = parseFiling(raw, ref.filing_type, { source: ref.url, filingDate: ref.filing_date });
    if (!parsed.ok) {
      logger.warn(`Skipping ${ref.entity_name} (${ref.url}): ${parsed.error.message}`);
      return {
        kind: 'skipped',
        skipped: {
          source: ref.url,
          entity_name: ref.entity_name,
          filing_type: ref.filing_type,
          reason: parsed.error.message,
          missing_fields: parsed.error.missingFields,
        },
      };
    }

    const investor = classify(parsed.record);
    logger.debug(`${investor.entity_name} -> ${investor.category}`);
    return { kind: 'classified', investor };
  };

  const outcomes = await Promise.all(refs.map(ref => limitTask(() => processRef(ref))));

  const investors: ClassifiedInvestor[] = [];
  const skipped: SkippedDocument[] = [];
  let cancelled = 0;

  for (const outcome of outcomes) {
    switch (outcome.kind) {
      case 'classified':
        investors.push(outcome.investor);
        break;
      case 'skipped':
        skipped.push(outcome.skipped);
        break;
      case 'failed':
        failures.push(outcome.failure);
        break;
      case 'cancelled':
        cancelled += 1;
        break;
    }
  }

  if (cancelled > 0) logger.warn(`Run aborted: ${cancelled} documents not fetched`);

  const sorted = sortInvestors(investors);
  return {
    investors: sorted,
    skipped,
    failures,
    cancelled,
    summary: summarizeCategories(sorted),
  };
}
