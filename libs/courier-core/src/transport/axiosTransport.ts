import type { HttpHeaders, HttpTransport, RawHttpResponse, TransportRequest } from '../types';

/**
 * The part of an axios instance this transport calls. Callers pass their own
 * configured instance, so axios itself is not a dependency.
 */
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

const toHttpHeaders = (source: Record<string, unknown> | undefined): HttpHeaders => {
  const headers: HttpHeaders = {};
  for (const [name, value] of Object.entries(source ?? {})) {
    if (value === undefined || value === null) continue;
    headers[name] = Array.isArray(value) ? value.join(', ') : String(value);
  }
  return headers;
};

/**
 * Adapts an axios instance to HttpTransport. `validateStatus` is forced to
 * accept everything: 4xx and 5xx become Responses, not axios errors.
 */
export const createAxiosTransport =
  (axiosInstance: AxiosInstanceLike): HttpTransport =>
  async (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse> => {
    const { status, headers, data } = await axiosInstance.request<ArrayBuffer>({
      url: req.url,
      method: req.method,
      headers: req.headers,
      data: req.body,
      signal,
      responseType: 'arraybuffer',
      validateStatus: () => true,
    });

    return { status, headers: toHttpHeaders(headers), body: data };
  };
