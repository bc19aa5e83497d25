import type { HttpTransport, TransportRequest, RawHttpResponse, HttpHeaders } from '../types';

export interface AxiosInstanceLike {
  request<T = unknown>(config: {
    url?: string;
    method?: string;
    headers?: Record<string, string>;
    data?: unknown;
    signal?: AbortSignal;
    responseType?: 'arraybuffer';
    validateStatus?: (status: number) => boolean;
  }): Promise<{
    status: number;
    headers: Record<string, unknown>;
    data: T;
  }>;
}

const acceptEveryStatus = () => true;

/**
 * Transport that sends through an axios instance. Every status is handed back
 * as a response so that retry decisions stay with the dispatcher.
 */
export const createAxiosTransport = (axiosInstance: AxiosInstanceLike): HttpTransport => {
  return async (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse> => {
    const response = await axiosInstance.request<ArrayBuffer>({
      url: req.url,
      method: req.method,
      headers: req.headers,
      data: req.body,
      signal,
      responseType: 'arraybuffer',
      validateStatus: acceptEveryStatus,
    });

    const headers: HttpHeaders = {};
    for (const [key, value] of Object.entries(response.headers ?? {})) {
      if (value === undefined || value === null) continue;
      headers[key.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
    }

    return {
      status: response.status,
      headers,
      body: response.data,
    };
  };
};
