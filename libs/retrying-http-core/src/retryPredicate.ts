import type { AttemptOutcome } from './types';

const HTTP_CONFLICT = 409;
const HTTP_INTERNAL_SERVER_ERROR = 500;

/**
 * Decides whether an attempt warrants another one.
 *
 * Transport failures, 5xx and 409 are retried. Everything else is final,
 * 429 included.
 */
export function wantRetry(error: unknown, response?: Pick<Response, 'status'>): boolean {
  if (error !== undefined || !response) {
    return true;
  }
  return response.status >= HTTP_INTERNAL_SERVER_ERROR || response.status === HTTP_CONFLICT;
}

export function isRetryableOutcome(outcome: AttemptOutcome): boolean {
  return wantRetry(outcome.error, outcome.response);
}
