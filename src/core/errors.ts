/**
 * Error types for the scrape pipeline.
 *
 * NetworkError and its subclasses come from the EDGAR client, ParseError from
 * the filing parser, IOError from the exporter. Callers branch on the class
 * (or on `retryable`) to decide what is fatal for a run.
 */

export class NetworkError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly url: string,
    public readonly retryable: boolean = false
  ) {
    super(message);
    this.name = 'NetworkError';
  }
}

export class NotFoundError extends NetworkError {
  constructor(url: string, detail: string = '') {
    super(`Not found: ${detail || url}`, 404, url, false);
    this.name = 'NotFoundError';
  }
}

export class RateLimitError extends NetworkError {
  constructor(url: string) {
    super(
      'SEC rate limit exceeded (429). Requests are throttled to the fair access ceiling; wait a moment and retry.',
      429,
      url,
      true
    );
    this.name = 'RateLimitError';
  }
}

export class TimeoutError extends NetworkError {
  constructor(url: string, public readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms: ${url}`, 0, url, true);
    this.name = 'TimeoutError';
  }
}

export class ParseError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    public readonly missingFields: string[] = []
  ) {
    super(message);
    this.name = 'ParseError';
  }
}

export class IOError extends Error {
  constructor(
    message: string,
    public readonly destination: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'IOError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[]) {
    super(issues.length > 0 ? `${message}\n  ${issues.join('\n  ')}` : message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
