/**
 * Shared helpers for the web API layer.
 * Maps error types to HTTP status codes and formats zod validation failures.
 */

import type { ZodError } from 'zod';

// ── Error Mapping ─────────────────────────────────────────────────────

export type ApiErrorType = 'validation' | 'upstream_failed' | 'internal';

const ERROR_STATUS_MAP: Record<ApiErrorType, number> = {
  validation: 400,
  upstream_failed: 502,
  internal: 500,
};

export function errorToHttpStatus(errorType: ApiErrorType): number {
  return ERROR_STATUS_MAP[errorType];
}

export function apiError(type: ApiErrorType, message: string, details?: string[]) {
  return { error: details ? { type, message, details } : { type, message } };
}

export function validationError(error: ZodError) {
  return apiError(
    'validation',
    'Invalid request',
    error.issues.map(issue => `${issue.path.join('.') || '(body)'}: ${issue.message}`)
  );
}
