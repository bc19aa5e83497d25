import { z } from 'zod';
import type { ClientConfig } from './types';

export const DEFAULT_MAX_RETRIES = 10;
export const DEFAULT_BASE_RETRY_DELAY_MS = 20;
export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

/** Longest delay a Node timer honours; anything above fires after ~1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export const clientConfigSchema = z.object({
  maxRetries: z.coerce.number().int().min(0).default(DEFAULT_MAX_RETRIES),
  baseRetryDelayMs: z.coerce.number().finite().min(0).max(MAX_TIMER_DELAY_MS).default(DEFAULT_BASE_RETRY_DELAY_MS),
  noRetryPaths: z
    .array(z.string())
    .default([])
    .transform((paths) => new Set(paths)),
  requestTimeoutMs: z.coerce.number().finite().positive().max(MAX_TIMER_DELAY_MS).default(DEFAULT_REQUEST_TIMEOUT_MS),
});

/**
 * Validates the options, fills in defaults and freezes the result. The
 * returned config is shared by every dispatch of a client and never changes.
 */
export function resolveClientConfig(input: {
  maxRetries?: number;
  baseRetryDelayMs?: number;
  noRetryPaths?: Iterable<string>;
  requestTimeoutMs?: number;
} = {}): ClientConfig {
  const parsed = clientConfigSchema.parse({
    ...input,
    noRetryPaths: input.noRetryPaths ? [...input.noRetryPaths] : undefined,
  });
  return Object.freeze(parsed);
}

const envSchema = z.object({
  HTTP_MAX_RETRIES: z.string().optional(),
  HTTP_BASE_RETRY_DELAY_MS: z.string().optional(),
  HTTP_NO_RETRY_PATHS: z.string().optional(),
  HTTP_REQUEST_TIMEOUT_MS: z.string().optional(),
});

/**
 * Reads client settings from `HTTP_*` environment variables. Unset or empty
 * variables fall back to the defaults.
 */
export function clientConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const vars = envSchema.parse(env);
  const nonEmpty = (value?: string) => (value && value.trim() ? value.trim() : undefined);

  const noRetryPaths = nonEmpty(vars.HTTP_NO_RETRY_PATHS)
    ?.split(',')
    .map((path) => path.trim())
    .filter(Boolean);

  const parsed = clientConfigSchema.parse({
    maxRetries: nonEmpty(vars.HTTP_MAX_RETRIES),
    baseRetryDelayMs: nonEmpty(vars.HTTP_BASE_RETRY_DELAY_MS),
    noRetryPaths,
    requestTimeoutMs: nonEmpty(vars.HTTP_REQUEST_TIMEOUT_MS),
  });
  return Object.freeze(parsed);
}
