import type { RateLimiter } from './rate-limiter.js';
import type { ResponseCache } from './cache.js';
import { silentLogger, type Logger } from './logger.js';
import {
  NetworkError,
  NotFoundError,
  RateLimitError,
  TimeoutError,
  errorMessage,
} from './errors.js';
import {
  ARCHIVES_BASE_URL,
  SUBMISSIONS_BASE_URL,
  parseCurrentFilingsFeed,
  selectAdviserCandidates,
} from '../processing/index-parser.js';
import type { DocumentRef, IndexQuery } from './types.js';

/**
 * SEC EDGAR client.
 *
 * Uses the free EDGAR endpoints:
 * - www.sec.gov/cgi-bin/browse-edgar (getcurrent Atom feed) for recent 13F-HR filings
 * - www.sec.gov/files/company_tickers.json for the adviser registry
 * - data.sec.gov/submissions/ and www.sec.gov/Archives/ for documents
 *
 * Every network call waits on the shared RateLimiter first. Transient
 * failures (timeouts, transport errors, 429, 5xx) are retried with
 * exponential backoff; other 4xx responses fail immediately.
 */

export const WWW_BASE_URL = 'https://www.sec.gov';
const TICKERS_PATH = '/files/company_tickers.json';

/** Feed sizes the getcurrent endpoint accepts */
const FEED_COUNTS = [10, 20, 40, 80, 100];

// Cache TTLs in hours
const TTL_FEED = 1;
const TTL_REGISTRY = 168;
const TTL_SUBMISSIONS = 24;
const TTL_ARCHIVE = 720; // filings are immutable

export type FetchLike = (
  url: string,
  init: { headers: Record<string, string>; signal: AbortSignal }
) => Promise<Response>;

export interface EdgarClientOptions {
  rateLimiter: RateLimiter;
  userAgent: string;
  maxAttempts?: number;
  timeoutMs?: number;
  cache?: ResponseCache | null;
  logger?: Logger;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  /** Jitter source in [0, 1) */
  random?: () => number;
  wwwBaseUrl?: string;
  archivesBaseUrl?: string;
  submissionsBaseUrl?: string;
}

interface FetchTextOptions {
  accept: string;
  cacheTtlHours: number;
}

/** Exponential backoff with jitter: 1s, 2s, 4s (+ up to 500ms) */
export function backoffMs(attempt: number, random: () => number = Math.random): number {
  const base = 1000 * Math.pow(2, attempt);
  const jitter = random() * 500;
  return base + jitter;
}

export function feedCountFor(limit: number): number {
  return FEED_COUNTS.find(count => count >= limit) ?? FEED_COUNTS[FEED_COUNTS.length - 1];
}

function statusError(response: Response, url: string): NetworkError {
  const { status } = response;

  if (status === 404) return new NotFoundError(url);
  if (status === 429) return new RateLimitError(url);
  if (status === 403) {
    return new NetworkError(
      'SEC rejected the request (403 Forbidden). Set SEC_USER_AGENT to a name and contact email; SEC requires one.',
      403,
      url
    );
  }
  if (status >= 500) {
    return new NetworkError(`SEC server error: ${status}`, status, url, true);
  }
  return new NetworkError(`SEC request failed: ${status} ${response.statusText}`.trim(), status, url);
}

export class EdgarClient {
  readonly rateLimiter: RateLimiter;
  private readonly userAgent: string;
  private readonly maxAttempts: number;
  private readonly timeoutMs: number;
  private readonly cache: ResponseCache | null;
  private readonly logger: Logger;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly wwwBaseUrl: string;
  private readonly archivesBaseUrl: string;
  private readonly submissionsBaseUrl: string;

  constructor(options: EdgarClientOptions) {
    this.rateLimiter = options.rateLimiter;
    this.userAgent = options.userAgent;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.cache = options.cache ?? null;
    this.logger = options.logger ?? silentLogger;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)));
    this.random = options.random ?? Math.random;
    this.wwwBaseUrl = options.wwwBaseUrl ?? WWW_BASE_URL;
    this.archivesBaseUrl = options.archivesBaseUrl ?? ARCHIVES_BASE_URL;
    this.submissionsBaseUrl = options.submissionsBaseUrl ?? SUBMISSIONS_BASE_URL;
  }

  /**
   * List documents to fetch for one filing type.
   * Index bodies that cannot be read fail with ParseError.
   */
  async fetchIndex(query: IndexQuery): Promise<DocumentRef[]> {
    if (query.limit <= 0) return [];

    if (query.form === '13F') {
      const url = `${this.wwwBaseUrl}/cgi-bin/browse-edgar?action=getcurrent&type=13F-HR&company=&dateb=&owner=include&count=${feedCountFor(query.limit)}&output=atom`;
      const body = await this.fetchText(url, { accept: 'application/atom+xml, application/xml', cacheTtlHours: TTL_FEED });
      return parseCurrentFilingsFeed(body, url, this.archivesBaseUrl).slice(0, query.limit);
    }

    const url = `${this.wwwBaseUrl}${TICKERS_PATH}`;
    const body = await this.fetchText(url, { accept: 'application/json', cacheTtlHours: TTL_REGISTRY });
    return selectAdviserCandidates(body, url, query.limit, this.submissionsBaseUrl);
  }

  /** Fetch the raw text of one referenced document */
  async fetchDocument(ref: DocumentRef): Promise<string> {
    return ref.filing_type === '13F'
      ? this.fetchText(ref.url, { accept: 'application/xml, text/xml', cacheTtlHours: TTL_ARCHIVE })
      : this.fetchText(ref.url, { accept: 'application/json', cacheTtlHours: TTL_SUBMISSIONS });
  }

  private async fetchText(url: string, options: FetchTextOptions): Promise<string> {
    const cached = this.readCache(url);
    if (cached !== null) {
      this.logger.debug(`cache hit ${url}`);
      return cached;
    }

    let lastError: NetworkError | null = null;

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      if (attempt > 0) {
        const delay = backoffMs(attempt - 1, this.random);
        this.logger.debug(`retry ${attempt}/${this.maxAttempts - 1} for ${url} in ${Math.round(delay)}ms (${lastError?.message ?? 'transient error'})`);
        await this.sleep(delay);
      }

      try {
        const body = await this.attempt(url, options.accept);
        this.writeCache(url, body, options.cacheTtlHours);
        return body;
      } catch (err) {
        if (!(err instanceof NetworkError) || !err.retryable) throw err;
        lastError = err;
      }
    }

    throw lastError ?? new NetworkError(`Failed after ${this.maxAttempts} attempts`, 0, url);
  }

  private async attempt(url: string, accept: string): Promise<string> {
    await this.rateLimiter.acquire();
    this.logger.debug(`GET ${url}`);

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        headers: {
          'User-Agent': this.userAgent,
          'Accept': accept,
        },
        signal: controller.signal,
      });

      if (!response.ok) throw statusError(response, url);
      return await response.text();
    } catch (err) {
      if (err instanceof NetworkError) throw err;
      if (controller.signal.aborted) throw new TimeoutError(url, this.timeoutMs);
      throw new NetworkError(`Network error fetching ${url}: ${errorMessage(err)}`, 0, url, true);
    } finally {
      clearTimeout(timer);
    }
  }

  private readCache(url: string): string | null {
    if (!this.cache) return null;
    try {
      return this.cache.get(url);
    } catch (err) {
      this.logger.debug(`cache read failed, fetching instead: ${errorMessage(err)}`);
      return null;
    }
  }

  private writeCache(url: string, body: string, ttlHours: number): void {
    if (!this.cache) return;
    try {
      this.cache.set(url, body, ttlHours);
    } catch (err) {
      this.logger.debug(`cache write failed: ${errorMessage(err)}`);
    }
  }
}
