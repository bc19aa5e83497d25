import { MAX_TIMER_DELAY_MS } from './config';
import { isRetryableOutcome } from './retryPredicate';
import type {
  AttemptOutcome,
  AttemptSender,
  DispatchRequest,
  HttpTransport,
  Logger,
  RequestContext,
} from './types';

const MIN_JITTER_MS = 1;
const MAX_JITTER_MS = 4;

/**
 * Delay before retry number `attempt` (1-based): `2^attempt * baseDelayMs`
 * minus 1-4ms of jitter, never below zero and never above the longest delay
 * a timer can hold.
 */
export function computeBackoffDelay(attempt: number, baseDelayMs: number): number {
  const jitterMs = MIN_JITTER_MS + Math.floor(Math.random() * (MAX_JITTER_MS - MIN_JITTER_MS + 1));
  return Math.min(MAX_TIMER_DELAY_MS, Math.max(0, 2 ** attempt * baseDelayMs - jitterMs));
}

/**
 * Resolves after `ms`, or rejects with `signal.reason` as soon as the signal
 * aborts, whichever comes first.
 */
export function sleepUnlessAborted(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.min(ms, MAX_TIMER_DELAY_MS));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface BackoffRun {
  context: RequestContext;
  transport: HttpTransport;
  request: DispatchRequest;
  sender: AttemptSender;
  /** Outcome of the attempt that preceded the first retry. */
  initial: AttemptOutcome;
  maxRetries: number;
  baseDelayMs: number;
  logger?: Logger;
  logMeta?: Record<string, unknown>;
}

/**
 * Retries a request until it produces a final outcome, runs out of retries or
 * is cancelled.
 *
 * Cancellation is checked while sleeping and again straight after each send;
 * either way the caller's abort reason replaces whatever the attempt
 * produced. When retries run out the last outcome is returned as is.
 */
export async function runBackoff(run: BackoffRun): Promise<AttemptOutcome> {
  const { context, transport, request, sender, maxRetries, baseDelayMs, logger } = run;
  const signal = context.signal;
  let outcome = run.initial;

  for (let retry = 1; retry <= maxRetries; retry += 1) {
    if (signal?.aborted) {
      logger?.info('http.request.canceled', { ...run.logMeta, attempt: retry + 1, phase: 'backoff' });
      return { error: signal.reason };
    }

    const delayMs = computeBackoffDelay(retry, baseDelayMs);
    logger?.warn('http.request.retry', {
      ...run.logMeta,
      attempt: retry + 1,
      delayMs,
      status: outcome.response?.status,
      error: describeError(outcome.error),
    });

    try {
      await sleepUnlessAborted(delayMs, signal);
    } catch (reason) {
      logger?.info('http.request.canceled', { ...run.logMeta, attempt: retry + 1, phase: 'backoff' });
      return { error: reason };
    }

    outcome = await sender(context, transport, request);
    if (signal?.aborted) {
      logger?.info('http.request.canceled', { ...run.logMeta, attempt: retry + 1, phase: 'send' });
      return { error: signal.reason };
    }
    if (!isRetryableOutcome(outcome)) {
      return outcome;
    }
  }

  logger?.error('http.request.exhausted', {
    ...run.logMeta,
    attempts: maxRetries + 1,
    status: outcome.response?.status,
    error: describeError(outcome.error),
  });
  return outcome;
}

function describeError(error: unknown): string | undefined {
  if (error === undefined) return undefined;
  return error instanceof Error ? error.message : String(error);
}
