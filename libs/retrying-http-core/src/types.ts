export type HttpMethod = 'GET' | 'HEAD' | 'OPTIONS' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type HttpHeaders = Record<string, string>;

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Per-call context handed to every dispatch.
 *
 * The signal is one-shot: once aborted it stays aborted, and its `reason` is
 * what a cancelled dispatch rejects with.
 */
export interface RequestContext {
  signal?: AbortSignal;
  /** Inbound correlation chain, e.g. `"abc123,de4"`. */
  requestId?: string;
  /** Identity of the user the call is made on behalf of. */
  userIdentity?: string;
}

/**
 * A request body that can be read again from the start on every attempt.
 */
export interface ReplayableBody {
  readonly contentLength: number;
  open(): ReadableStream<Uint8Array>;
}

export interface DispatchRequest {
  method: HttpMethod;
  url: URL;
  headers: Headers;
  body?: ReplayableBody;
}

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: HttpHeaders;
  body?: ArrayBuffer;
}

export interface RawHttpResponse {
  status: number;
  headers: HttpHeaders;
  body: ArrayBuffer;
}

export type HttpTransport = (req: TransportRequest, signal: AbortSignal) => Promise<RawHttpResponse>;

/**
 * Result of a single send attempt: a response or a failure, never both.
 */
export type AttemptOutcome = { response: Response; error?: undefined } | { error: unknown; response?: undefined };

export type AttemptSender = (
  context: RequestContext,
  transport: HttpTransport,
  request: DispatchRequest,
) => Promise<AttemptOutcome>;

export interface ClientConfig {
  maxRetries: number;
  baseRetryDelayMs: number;
  noRetryPaths: ReadonlySet<string>;
  requestTimeoutMs: number;
}

export interface RetryingHttpClientOptions {
  maxRetries?: number;
  baseRetryDelayMs?: number;
  noRetryPaths?: Iterable<string>;
  requestTimeoutMs?: number;
  transport?: HttpTransport;
  logger?: Logger;
}
