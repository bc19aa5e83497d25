import { isReplayableBody, replayableBody, type ReplayableBodyInit } from './body';
import type { DispatchRequest, HttpMethod, ReplayableBody } from './types';

export const CONTENT_TYPE_HEADER = 'Content-Type';
export const FORM_URLENCODED_CONTENT_TYPE = 'application/x-www-form-urlencoded';

/**
 * Builds a request for {@link RetryingHttpClient.send}. Plain bodies are
 * buffered so they can be replayed on retry; pass a {@link ReplayableBody}
 * to keep control over how each copy is produced.
 *
 * @throws {TypeError} When `url` is not an absolute URL.
 */
export function createDispatchRequest(
  method: HttpMethod,
  url: string | URL,
  body?: ReplayableBody | ReplayableBodyInit,
): DispatchRequest {
  return {
    method,
    url: new URL(url),
    headers: new Headers(),
    body: body === undefined || isReplayableBody(body) ? body : replayableBody(body),
  };
}
