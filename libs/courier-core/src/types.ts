export type HttpMethod = 'GET' | 'HEAD' | 'OPTIONS' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type HttpHeaders = Record<string, string>;

export type QueryValue = string | number | boolean;

export type QueryParams = Record<string, QueryValue>;

export type BodyData = Record<string, unknown>;

/**
 * Free-form options read by senders and plugins.
 *
 * Known keys:
 * - `timeout`: per-request timeout in milliseconds, enforced by the sender
 * - `bodyFormat`: how the body bag is serialized (`json` by default)
 */
export type ConfigOptions = Record<string, unknown>;

export type BodyFormat = 'json' | 'form';

/**
 * What a transport hands back: any status, headers flattened to one string
 * per name, body as raw bytes.
 */
export interface RawHttpResponse {
  status: number;
  headers: HttpHeaders;
  body: ArrayBuffer;
}

/**
 * Input to a transport. The URL already carries the encoded query and the
 * body is already serialized.
 */
export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: HttpHeaders;
  body?: ArrayBuffer;
}

/**
 * Performs the I/O for one request. Rejects only when no response arrived.
 */
export interface HttpTransport {
  (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse>;
}

/**
 * Coarse classification of a failed response, attached to RequestException.
 * 401/403 auth, 404 not_found, 400/422 validation, 402 quota, 429 rate_limit,
 * 408 timeout, 5xx transient.
 */
export type ErrorCategory =
  | 'auth'
  | 'not_found'
  | 'validation'
  | 'quota'
  | 'rate_limit'
  | 'timeout'
  | 'transient'
  | 'unknown';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LoggerMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LoggerMeta): void;
  info(message: string, meta?: LoggerMeta): void;
  warn(message: string, meta?: LoggerMeta): void;
  error(message: string, meta?: LoggerMeta): void;
}
