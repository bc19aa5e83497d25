import { runBackoff } from './backoff';
import { readReplayableBody, type ReplayableBodyInit } from './body';
import { resolveClientConfig } from './config';
import {
  REQUEST_ID_HEADER,
  applyCorrelationHeader,
  applyUserIdentityHeader,
  buildCorrelationChain,
} from './correlation';
import { CONTENT_TYPE_HEADER, FORM_URLENCODED_CONTENT_TYPE, createDispatchRequest } from './request';
import { isRetryableOutcome } from './retryPredicate';
import { fetchTransport } from './transport/fetchTransport';
import type {
  AttemptSender,
  ClientConfig,
  DispatchRequest,
  HttpHeaders,
  HttpTransport,
  Logger,
  RawHttpResponse,
  ReplayableBody,
  RequestContext,
  RetryingHttpClientOptions,
} from './types';

const NULL_BODY_STATUSES = new Set([101, 204, 205, 304]);

function rawResponseToResponse(raw: RawHttpResponse): Response {
  const headers = new Headers();
  for (const [key, value] of Object.entries(raw.headers)) {
    headers.set(key, value);
  }
  return new Response(NULL_BODY_STATUSES.has(raw.status) ? null : raw.body, {
    status: raw.status,
    headers,
  });
}

function headersToPlainObject(headers: Headers): HttpHeaders {
  const result: HttpHeaders = {};
  headers.forEach((value, key) => {
    result[key] = value;
  });
  return result;
}

/**
 * HTTP client that retries failed requests with exponential backoff, stops as
 * soon as the caller's signal aborts, and forwards an `X-Request-Id`
 * correlation chain.
 *
 * A client's settings are fixed at construction. `withTimeout`,
 * `withMaxRetries` and `withNoRetryPaths` return new clients and leave the
 * original untouched, so one client can be shared by concurrent callers.
 *
 * @example
 * ```typescript
 * const client = new RetryingHttpClient({ maxRetries: 3, noRetryPaths: ['/healthcheck'] });
 * const controller = new AbortController();
 * const response = await client.get({ signal: controller.signal, requestId: 'upstream42' }, 'https://api.example.com/items');
 * if (response.status >= 500) {
 *   // retries ran out, this is what the last attempt returned
 * }
 * ```
 */
export class RetryingHttpClient {
  private readonly config: ClientConfig;
  private readonly transport: HttpTransport;
  private readonly logger?: Logger;

  constructor(options: RetryingHttpClientOptions = {}) {
    this.config = resolveClientConfig(options);
    this.transport = options.transport ?? fetchTransport;
    this.logger = options.logger;
  }

  get maxRetries(): number {
    return this.config.maxRetries;
  }

  get baseRetryDelayMs(): number {
    return this.config.baseRetryDelayMs;
  }

  get requestTimeoutMs(): number {
    return this.config.requestTimeoutMs;
  }

  get pathsWithNoRetries(): string[] {
    return [...this.config.noRetryPaths];
  }

  withTimeout(requestTimeoutMs: number): RetryingHttpClient {
    return this.derive({ requestTimeoutMs });
  }

  withMaxRetries(maxRetries: number): RetryingHttpClient {
    return this.derive({ maxRetries });
  }

  withNoRetryPaths(noRetryPaths: Iterable<string>): RetryingHttpClient {
    return this.derive({ noRetryPaths });
  }

  /**
   * Sends the request, retrying transport failures, 5xx and 409 responses.
   *
   * Resolves with the final response whatever its status. Rejects with the
   * transport error of the last attempt, or with the signal's abort reason
   * once the caller cancels.
   */
  async send(context: RequestContext, request: DispatchRequest): Promise<Response> {
    applyUserIdentityHeader(request.headers, context.userIdentity);
    applyCorrelationHeader(request.headers, buildCorrelationChain(context.requestId));

    const path = request.url.pathname;
    const logMeta = {
      method: request.method,
      path,
      requestId: request.headers.get(REQUEST_ID_HEADER),
    };

    let outcome = await this.sendAttempt(context, this.transport, request);
    const retriesAllowed = !this.config.noRetryPaths.has(path) && this.config.maxRetries > 0;
    if (retriesAllowed && isRetryableOutcome(outcome)) {
      outcome = await runBackoff({
        context,
        transport: this.transport,
        request,
        sender: this.sendAttempt,
        initial: outcome,
        maxRetries: this.config.maxRetries,
        baseDelayMs: this.config.baseRetryDelayMs,
        logger: this.logger,
        logMeta,
      });
    }

    if (outcome.response !== undefined) {
      this.logger?.debug('http.request.completed', { ...logMeta, status: outcome.response.status });
      return outcome.response;
    }
    throw outcome.error;
  }

  get(context: RequestContext, url: string | URL): Promise<Response> {
    return this.dispatch(context, 'GET', url);
  }

  head(context: RequestContext, url: string | URL): Promise<Response> {
    return this.dispatch(context, 'HEAD', url);
  }

  post(
    context: RequestContext,
    url: string | URL,
    contentType: string,
    body: ReplayableBody | ReplayableBodyInit,
  ): Promise<Response> {
    return this.dispatch(context, 'POST', url, contentType, body);
  }

  put(
    context: RequestContext,
    url: string | URL,
    contentType: string,
    body: ReplayableBody | ReplayableBodyInit,
  ): Promise<Response> {
    return this.dispatch(context, 'PUT', url, contentType, body);
  }

  postForm(context: RequestContext, url: string | URL, values: URLSearchParams | Record<string, string>): Promise<Response> {
    const form = values instanceof URLSearchParams ? values : new URLSearchParams(values);
    return this.post(context, url, FORM_URLENCODED_CONTENT_TYPE, form);
  }

  private async dispatch(
    context: RequestContext,
    method: DispatchRequest['method'],
    url: string | URL,
    contentType?: string,
    body?: ReplayableBody | ReplayableBodyInit,
  ): Promise<Response> {
    const request = createDispatchRequest(method, url, body);
    if (contentType) {
      request.headers.set(CONTENT_TYPE_HEADER, contentType);
    }
    return this.send(context, request);
  }

  /**
   * One attempt: re-reads the body, links the caller's signal to a per-attempt
   * controller and arms the request timeout. Never throws.
   */
  private readonly sendAttempt: AttemptSender = async (context, transport, request) => {
    const parent = context.signal;
    if (parent?.aborted) {
      return { error: parent.reason };
    }

    const timeoutMs = this.config.requestTimeoutMs;
    const controller = new AbortController();
    const onParentAbort = () => controller.abort(parent?.reason);
    parent?.addEventListener('abort', onParentAbort, { once: true });
    const timeoutHandle = setTimeout(() => {
      controller.abort(new TimeoutError(`Request timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    this.logger?.debug('http.request.attempt', {
      method: request.method,
      path: request.url.pathname,
      timeoutMs,
    });

    try {
      const body =
        request.body && request.body.contentLength !== 0 ? await readReplayableBody(request.body, controller.signal) : undefined;
      const raw = await transport(
        {
          method: request.method,
          url: request.url.toString(),
          headers: headersToPlainObject(request.headers),
          body,
        },
        controller.signal,
      );
      if (parent?.aborted) {
        return { error: parent.reason };
      }
      return { response: rawResponseToResponse(raw) };
    } catch (error) {
      if (parent?.aborted) {
        return { error: parent.reason };
      }
      if (controller.signal.reason instanceof TimeoutError) {
        return { error: controller.signal.reason };
      }
      return { error };
    } finally {
      clearTimeout(timeoutHandle);
      parent?.removeEventListener('abort', onParentAbort);
    }
  };

  private derive(overrides: Partial<RetryingHttpClientOptions>): RetryingHttpClient {
    return new RetryingHttpClient({
      maxRetries: this.config.maxRetries,
      baseRetryDelayMs: this.config.baseRetryDelayMs,
      noRetryPaths: this.config.noRetryPaths,
      requestTimeoutMs: this.config.requestTimeoutMs,
      transport: this.transport,
      logger: this.logger,
      ...overrides,
    });
  }
}

export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}
