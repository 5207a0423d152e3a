import type { HttpMethod, HttpHeaders, HttpTransport, RawHttpResponse, TransportRequest } from '../types';

const BODYLESS_METHODS = new Set<HttpMethod>(['GET', 'HEAD']);

const flattenHeaders = (source: Headers): HttpHeaders => {
  const headers: HttpHeaders = {};
  source.forEach((value, key) => {
    headers[key] = value;
  });
  // forEach comma-joins set-cookie values, and cookie expiry dates contain commas.
  const cookies = source.getSetCookie();
  if (cookies.length > 0) {
    headers['set-cookie'] = cookies.join('\n');
  }
  return headers;
};

/**
 * Transport over the global fetch API (Node 20 ships undici).
 * Bodies are never attached to GET or HEAD, which fetch rejects.
 */
export const fetchTransport: HttpTransport = async (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse> => {
  const init: RequestInit = { method: req.method, headers: req.headers, signal };
  if (req.body !== undefined && !BODYLESS_METHODS.has(req.method)) {
    init.body = req.body;
  }

  const response = await fetch(req.url, init);

  return {
    status: response.status,
    headers: flattenHeaders(response.headers),
    body: await response.arrayBuffer(),
  };
};
