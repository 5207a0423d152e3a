import type { HttpHeaders, RawHttpResponse } from '../types';

/**
 * A canned response handed out by a MockClient.
 *
 * Object and array bodies are JSON-encoded and get a JSON content type unless
 * the headers already name one; string bodies are sent as-is.
 */
export class MockResponse {
  readonly status: number;
  readonly headers: HttpHeaders;
  private readonly body: string;

  constructor(body: unknown = '', status = 200, headers: HttpHeaders = {}) {
    this.status = status;
    this.headers = { ...headers };

    if (typeof body === 'string') {
      this.body = body;
    } else {
      this.body = JSON.stringify(body);
      const hasContentType = Object.keys(this.headers).some((key) => key.toLowerCase() === 'content-type');
      if (!hasContentType) {
        this.headers['Content-Type'] = 'application/json';
      }
    }
  }

  static make(body: unknown = '', status = 200, headers: HttpHeaders = {}): MockResponse {
    return new MockResponse(body, status, headers);
  }

  getBody(): string {
    return this.body;
  }

  toRawResponse(): RawHttpResponse {
    const encoded = new TextEncoder().encode(this.body);
    const buffer = new ArrayBuffer(encoded.byteLength);
    new Uint8Array(buffer).set(encoded);
    return {
      status: this.status,
      headers: { ...this.headers },
      body: buffer,
    };
  }
}
