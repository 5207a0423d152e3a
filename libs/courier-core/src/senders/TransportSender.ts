import { TransportException } from '../errors';
import { appendQuery, buildQueryString } from '../helpers/url';
import type { PendingRequest } from '../PendingRequest';
import type { Response } from '../Response';
import { fetchTransport } from '../transport/fetchTransport';
import type { HttpHeaders, HttpTransport, Logger, TransportRequest } from '../types';
import type { Sender } from './Sender';

const DEFAULT_TIMEOUT_MS = 30_000;

export interface TransportSenderOptions {
  transport?: HttpTransport;
  /** Used when the pending request's config has no `timeout`. */
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Sender backed by an HttpTransport (fetch by default).
 *
 * Turns the pending request into a TransportRequest: the query bag is encoded
 * onto the URL, the body bag is serialized according to the `bodyFormat`
 * config, and the `timeout` config (milliseconds) aborts the transport call.
 */
export class TransportSender implements Sender {
  private readonly transport: HttpTransport;
  private readonly defaultTimeoutMs: number;
  private readonly logger?: Logger;

  constructor(options: TransportSenderOptions = {}) {
    this.transport = options.transport ?? fetchTransport;
    this.defaultTimeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger;
  }

  async send(pendingRequest: PendingRequest): Promise<Response> {
    const transportRequest = this.buildTransportRequest(pendingRequest);
    const timeoutMs = this.resolveTimeout(pendingRequest);
    const controller = new AbortController();
    let didTimeout = false;
    const timeoutHandle = setTimeout(() => {
      didTimeout = true;
      controller.abort();
    }, timeoutMs);

    const startedAt = Date.now();
    try {
      const raw = await this.transport(transportRequest, controller.signal);
      this.logger?.debug('courier.transport.completed', {
        method: transportRequest.method,
        url: transportRequest.url,
        status: raw.status,
        durationMs: Date.now() - startedAt,
      });
      return pendingRequest.createResponse(raw, false);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransportException(
        didTimeout
          ? `${transportRequest.method} ${transportRequest.url} timed out after ${timeoutMs}ms`
          : `${transportRequest.method} ${transportRequest.url} failed: ${reason}`,
        {
          method: transportRequest.method,
          url: transportRequest.url,
          cause: error,
          timedOut: didTimeout,
        },
      );
    } finally {
      clearTimeout(timeoutHandle);
    }
  }

  buildTransportRequest(pendingRequest: PendingRequest): TransportRequest {
    const headers: HttpHeaders = pendingRequest.headers().all();
    const url = appendQuery(pendingRequest.getUrl(), pendingRequest.query().all());
    const body = this.serializeBody(pendingRequest, headers);

    return {
      method: pendingRequest.getMethod(),
      url,
      headers,
      body,
    };
  }

  private serializeBody(pendingRequest: PendingRequest, headers: HttpHeaders): ArrayBuffer | undefined {
    const bag = pendingRequest.body();
    if (bag.isEmpty()) {
      return undefined;
    }

    let serialized: string;
    if (pendingRequest.getBodyFormat() === 'form') {
      const fields: Record<string, string> = {};
      for (const [key, value] of bag.entries()) {
        fields[key] = typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value);
      }
      serialized = buildQueryString(fields);
      this.ensureContentType(headers, 'application/x-www-form-urlencoded');
    } else {
      serialized = JSON.stringify(bag.all());
      this.ensureContentType(headers, 'application/json');
    }

    const encoded = new TextEncoder().encode(serialized);
    const buffer = new ArrayBuffer(encoded.byteLength);
    new Uint8Array(buffer).set(encoded);
    return buffer;
  }

  private ensureContentType(headers: HttpHeaders, contentType: string): void {
    const hasContentType = Object.keys(headers).some((key) => key.toLowerCase() === 'content-type');
    if (!hasContentType) {
      headers['Content-Type'] = contentType;
    }
  }

  private resolveTimeout(pendingRequest: PendingRequest): number {
    const configured = pendingRequest.config().get('timeout');
    return typeof configured === 'number' && configured > 0 ? configured : this.defaultTimeoutMs;
  }
}
