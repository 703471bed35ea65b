import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/core/config.js';
import { ConfigError } from '../src/core/errors.js';

describe('loadConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    const config = loadConfig({ EDGAR_CACHE_DIR: '/tmp/edgar-test' });

    expect(config).toEqual({
      userAgent: 'edgar-investors research contact@example.com',
      requestsPerSecond: 10,
      burst: 1,
      maxAttempts: 3,
      timeoutMs: 30_000,
      concurrency: 4,
      cacheDir: '/tmp/edgar-test',
      port: 3005,
    });
  });

  it('reads and coerces overrides', () => {
    const config = loadConfig({
      SEC_USER_AGENT: '  Example Research ops@example.com ',
      EDGAR_RATE_LIMIT: '2.5',
      EDGAR_BURST: '3',
      EDGAR_MAX_ATTEMPTS: '5',
      EDGAR_TIMEOUT_MS: '1000',
      EDGAR_CONCURRENCY: '8',
      PORT: '8080',
    });

    expect(config).toMatchObject({
      userAgent: 'Example Research ops@example.com',
      requestsPerSecond: 2.5,
      burst: 3,
      maxAttempts: 5,
      timeoutMs: 1000,
      concurrency: 8,
      port: 8080,
    });
  });

  it('treats empty values as unset', () => {
    expect(loadConfig({ EDGAR_RATE_LIMIT: '', SEC_USER_AGENT: '' })).toMatchObject({
      requestsPerSecond: 10,
      userAgent: 'edgar-investors research contact@example.com',
    });
  });

  it('refuses a rate above the SEC ceiling', () => {
    expect(() => loadConfig({ EDGAR_RATE_LIMIT: '25' })).toThrow(ConfigError);
  });

  it('names every invalid variable', () => {
    try {
      loadConfig({ EDGAR_CONCURRENCY: '0', PORT: 'http' });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (!(err instanceof ConfigError)) return;
      expect(err.issues.map(issue => issue.split(':')[0])).toEqual(['EDGAR_CONCURRENCY', 'PORT']);
      expect(err.message.startsWith('Invalid configuration:\n  EDGAR_CONCURRENCY: ')).toBe(true);
    }
  });
});
