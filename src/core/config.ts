import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors.js';

/**
 * Runtime configuration read from the environment.
 * CLI flags override these per run.
 */

const envSchema = z.object({
  SEC_USER_AGENT: z
    .string()
    .trim()
    .min(1)
    .default('edgar-investors research contact@example.com'),
  // SEC fair access ceiling is 10 req/s
  EDGAR_RATE_LIMIT: z.coerce.number().positive().max(10).default(10),
  EDGAR_BURST: z.coerce.number().int().min(1).default(1),
  EDGAR_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  EDGAR_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  EDGAR_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(4),
  EDGAR_CACHE_DIR: z.string().min(1).default(join(homedir(), '.edgar-investors')),
  PORT: z.coerce.number().int().min(1).max(65535).default(3005),
});

export type AppEnv = z.infer<typeof envSchema>;

export interface AppConfig {
  userAgent: string;
  requestsPerSecond: number;
  burst: number;
  maxAttempts: number;
  timeoutMs: number;
  concurrency: number;
  cacheDir: string;
  port: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Treat empty strings as unset so `FOO= cmd` falls back to defaults
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      'Invalid configuration:',
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const e = parsed.data;
  return {
    userAgent: e.SEC_USER_AGENT,
    requestsPerSecond: e.EDGAR_RATE_LIMIT,
    burst: e.EDGAR_BURST,
    maxAttempts: e.EDGAR_MAX_ATTEMPTS,
    timeoutMs: e.EDGAR_TIMEOUT_MS,
    concurrency: e.EDGAR_CONCURRENCY,
    cacheDir: e.EDGAR_CACHE_DIR,
    port: e.PORT,
  };
}
