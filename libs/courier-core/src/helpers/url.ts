import type { QueryParams } from '../types';

export function isAbsoluteUrl(path: string): boolean {
  try {
    const { protocol } = new URL(path);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Joins a base URL and an endpoint with exactly one slash between them.
 * An absolute endpoint replaces the base URL entirely.
 */
export function joinUrl(baseUrl: string, endpoint: string): string {
  if (endpoint && isAbsoluteUrl(endpoint)) {
    return endpoint;
  }
  const base = baseUrl.trim().replace(/\/+$/, '');
  const path = endpoint.trim().replace(/^\/+/, '');
  if (!path) {
    return base;
  }
  return base ? `${base}/${path}` : `/${path}`;
}

/**
 * Encodes query parameters with RFC 3986 percent-encoding (spaces become %20),
 * keeping the insertion order of the record.
 */
export function buildQueryString(query: QueryParams): string {
  return Object.entries(query)
    .map(([key, value]) => `${encodeURIComponent(key)}=${encodeURIComponent(String(value))}`)
    .join('&');
}

/**
 * Appends an encoded query string, respecting any query the URL already has.
 */
export function appendQuery(url: string, query: QueryParams): string {
  const queryString = buildQueryString(query);
  if (!queryString) {
    return url;
  }
  return `${url}${url.includes('?') ? '&' : '?'}${queryString}`;
}
