import { RetryingHttpClient } from './HttpClient';
import { clientConfigFromEnv } from './config';
import { fetchTransport } from './transport/fetchTransport';
import type { Logger, RetryingHttpClientOptions } from './types';

/**
 * Console logger implementation for use with createDefaultHttpClient.
 * Logs to console.debug, console.info, console.warn, and console.error.
 */
export class ConsoleLogger implements Logger {
  debug(message: string, meta?: Record<string, unknown>): void {
    console.debug(message, meta);
  }
  info(message: string, meta?: Record<string, unknown>): void {
    console.info(message, meta);
  }
  warn(message: string, meta?: Record<string, unknown>): void {
    console.warn(message, meta);
  }
  error(message: string, meta?: Record<string, unknown>): void {
    console.error(message, meta);
  }
}

/**
 * Creates a client with the stock settings: 10 retries starting from a 20ms
 * base delay, a 10s request timeout, no exempt paths, the fetch transport and
 * a console logger. Any field of `overrides` replaces the matching default.
 *
 * @example
 * ```typescript
 * const client = createDefaultHttpClient({ noRetryPaths: ['/v1/payments'] });
 * const response = await client.get({}, 'https://api.example.com/v1/items');
 * ```
 */
export function createDefaultHttpClient(overrides: RetryingHttpClientOptions = {}): RetryingHttpClient {
  return new RetryingHttpClient({
    transport: fetchTransport,
    logger: new ConsoleLogger(),
    ...overrides,
  });
}

/** Returns a copy of `client` (or of a default client) with a new request timeout. */
export function clientWithTimeout(client: RetryingHttpClient | undefined, requestTimeoutMs: number): RetryingHttpClient {
  return (client ?? createDefaultHttpClient()).withTimeout(requestTimeoutMs);
}

/** Returns a copy of `client` (or of a default client) that never retries `paths`. */
export function clientWithNoRetryPaths(client: RetryingHttpClient | undefined, paths: Iterable<string>): RetryingHttpClient {
  return (client ?? createDefaultHttpClient()).withNoRetryPaths(paths);
}

/**
 * Factory function to create a client from `HTTP_*` environment variables
 *
 * @param env - Environment to read, `process.env` by default
 * @param overrides - Optional transport, logger or setting overrides
 */
export function createHttpClientFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: RetryingHttpClientOptions = {},
): RetryingHttpClient {
  const config = clientConfigFromEnv(env);
  return createDefaultHttpClient({
    maxRetries: config.maxRetries,
    baseRetryDelayMs: config.baseRetryDelayMs,
    noRetryPaths: config.noRetryPaths,
    requestTimeoutMs: config.requestTimeoutMs,
    ...overrides,
  });
}
