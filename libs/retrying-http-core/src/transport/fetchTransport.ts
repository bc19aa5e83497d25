import type { HttpTransport, TransportRequest, RawHttpResponse, HttpHeaders } from '../types';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

/**
 * Builds a transport on top of a fetch implementation. Connection pooling,
 * connect and TLS handshake timeouts belong to whatever `fetchImpl` is
 * configured with.
 */
export const createFetchTransport = (fetchImpl: FetchLike): HttpTransport => {
  return async (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse> => {
    const init: RequestInit = {
      method: req.method,
      headers: req.headers,
      body: req.body,
      signal,
    };

    const response = await fetchImpl(req.url, init);
    const body = await response.arrayBuffer();

    const headers: HttpHeaders = {};
    response.headers.forEach((value, key) => {
      headers[key] = value;
    });

    return {
      status: response.status,
      headers,
      body,
    };
  };
};

/** Transport backed by the global fetch. */
export const fetchTransport: HttpTransport = createFetchTransport((input, init) => fetch(input, init));
