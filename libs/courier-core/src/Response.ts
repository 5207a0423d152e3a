import { RequestException } from './errors';
import type { PendingRequest } from './PendingRequest';
import type { ErrorCategory, HttpHeaders, RawHttpResponse } from './types';

export type ResponseClass = new (
  pendingRequest: PendingRequest,
  raw: RawHttpResponse,
  mocked: boolean,
) => Response;

const statusToCategory = (status: number): ErrorCategory => {
  if (status === 401 || status === 403) return 'auth';
  if (status === 404) return 'not_found';
  if (status === 400 || status === 422) return 'validation';
  if (status === 402) return 'quota';
  if (status === 429) return 'rate_limit';
  if (status === 408) return 'timeout';
  if (status >= 500) return 'transient';
  return 'unknown';
};

const decoder = new TextDecoder();

/**
 * Wraps the raw transport response together with the pending request that produced it.
 *
 * Subclass it and register the subclass with `withResponseClass()` to add
 * API-specific accessors.
 */
export class Response {
  readonly status: number;
  readonly headers: HttpHeaders;
  private readonly rawBody: ArrayBuffer;
  private decodedBody?: string;

  constructor(
    private readonly pendingRequest: PendingRequest,
    raw: RawHttpResponse,
    private readonly mocked = false,
  ) {
    this.status = raw.status;
    this.headers = { ...raw.headers };
    this.rawBody = raw.body;
  }

  /**
   * Checks that a value is Response itself or a subclass of it.
   */
  static isResponseClass(value: unknown): value is ResponseClass {
    return typeof value === 'function' && (value === Response || value.prototype instanceof Response);
  }

  getPendingRequest(): PendingRequest {
    return this.pendingRequest;
  }

  /**
   * Case-insensitive header lookup.
   */
  header(name: string): string | undefined {
    const wanted = name.toLowerCase();
    for (const [key, value] of Object.entries(this.headers)) {
      if (key.toLowerCase() === wanted) return value;
    }
    return undefined;
  }

  body(): string {
    this.decodedBody ??= decoder.decode(this.rawBody);
    return this.decodedBody;
  }

  arrayBuffer(): ArrayBuffer {
    return this.rawBody;
  }

  /**
   * Parses the body as JSON. An empty body yields an empty object.
   */
  json<T = Record<string, unknown>>(): T {
    const text = this.body();
    if (!text.trim()) {
      return {} as T;
    }
    return JSON.parse(text) as T;
  }

  /**
   * The JSON body as a plain object. Non-object payloads (arrays, scalars) yield `{}`.
   */
  object(): Record<string, unknown> {
    const parsed: unknown = this.json<unknown>();
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      return {};
    }
    return Object.fromEntries(Object.entries(parsed));
  }

  isMocked(): boolean {
    return this.mocked;
  }

  ok(): boolean {
    return this.status >= 200 && this.status < 300;
  }

  successful(): boolean {
    return this.ok();
  }

  redirect(): boolean {
    return this.status >= 300 && this.status < 400;
  }

  clientError(): boolean {
    return this.status >= 400 && this.status < 500;
  }

  serverError(): boolean {
    return this.status >= 500;
  }

  failed(): boolean {
    return this.clientError() || this.serverError();
  }

  toException(): RequestException | undefined {
    if (!this.failed()) {
      return undefined;
    }
    const pendingRequest = this.pendingRequest;
    return new RequestException(
      `${pendingRequest.getMethod()} ${pendingRequest.getUrl()} failed with HTTP ${this.status}`,
      this,
      statusToCategory(this.status),
    );
  }

  /**
   * Throws a RequestException when the response failed, otherwise returns itself.
   */
  throw(): this {
    const exception = this.toException();
    if (exception) {
      throw exception;
    }
    return this;
  }
}
