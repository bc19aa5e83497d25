export * from './types';
export { RetryingHttpClient, TimeoutError } from './HttpClient';
export { ConsoleLogger, createDefaultHttpClient, clientWithTimeout, clientWithNoRetryPaths, createHttpClientFromEnv } from './factories';
export { computeBackoffDelay, sleepUnlessAborted, runBackoff, type BackoffRun } from './backoff';
export { wantRetry, isRetryableOutcome } from './retryPredicate';
export * from './correlation';
export * from './config';
export * from './body';
export * from './request';
export * from './transport/fetchTransport';
export * from './transport/axiosTransport';
