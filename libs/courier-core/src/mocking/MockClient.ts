import assert from 'node:assert/strict';
import { Connector } from '../Connector';
import { NoMockResponseFoundException } from '../errors';
import type { PendingRequest } from '../PendingRequest';
import { Request } from '../Request';
import type { Response } from '../Response';
import { MockResponse } from './MockResponse';

export type MockResponseFactory = (pendingRequest: PendingRequest) => MockResponse;

export type MockEntry = MockResponse | MockResponseFactory;

export type RequestClass = abstract new (...args: never[]) => Request;

export type ConnectorClass = abstract new (...args: never[]) => Connector;

/**
 * Request classes, connector classes or URL patterns (`*` matches anything).
 */
export type MockKey = RequestClass | ConnectorClass | string;

export type MockResponses = MockEntry[] | Map<MockKey, MockEntry>;

export type SentMatcher = MockKey | ((pendingRequest: PendingRequest, response: Response) => boolean);

export interface RecordedExchange {
  pendingRequest: PendingRequest;
  response?: Response;
}

const toPattern = (pattern: string): RegExp => {
  const escaped = pattern.replace(/[.+?^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '.*');
  return new RegExp(`^${escaped}$`);
};

const urlMatches = (pattern: string, url: string): boolean => {
  const regex = toPattern(pattern);
  return regex.test(url) || regex.test(url.replace(/^https?:\/\//, ''));
};

/**
 * Stands in for the sender while testing.
 *
 * Given a list, responses are handed out in order, one per dispatch. Given a
 * map, the request's class is tried first, then the connector's class, then
 * URL patterns in insertion order. Every dispatched pending request is
 * recorded for the assertion helpers; the log is append-only and belongs to
 * this instance.
 *
 * @example
 * ```typescript
 * const mockClient = new MockClient(new Map<MockKey, MockEntry>([
 *   [GetUserRequest, MockResponse.make({ name: 'Ada' })],
 *   ['api.example.com/teams/*', MockResponse.make([], 200)],
 * ]));
 *
 * await connector.send(new GetUserRequest(), mockClient);
 * mockClient.assertSent(GetUserRequest);
 * ```
 */
export class MockClient {
  private readonly sequence: MockEntry[] = [];
  private readonly keyed = new Map<MockKey, MockEntry>();
  private readonly recorded: RecordedExchange[] = [];

  constructor(responses: MockResponses = []) {
    if (Array.isArray(responses)) {
      this.sequence.push(...responses);
    } else {
      for (const [key, entry] of responses) {
        this.keyed.set(key, entry);
      }
    }
  }

  addResponse(entry: MockEntry, key?: MockKey): this {
    if (key === undefined) {
      this.sequence.push(entry);
    } else {
      this.keyed.set(key, entry);
    }
    return this;
  }

  /**
   * Finds the response for a pending request without recording anything.
   * Sequence responses are consumed by the lookup.
   */
  match(pendingRequest: PendingRequest): MockResponse | undefined {
    const entry = this.sequence.length > 0 ? this.sequence.shift() : this.findKeyedEntry(pendingRequest);
    if (entry === undefined) {
      return undefined;
    }
    return entry instanceof MockResponse ? entry : entry(pendingRequest);
  }

  record(pendingRequest: PendingRequest, response?: Response): void {
    this.recorded.push({ pendingRequest, response });
  }

  /**
   * Matches, records and builds the Response through the pending request's response class.
   */
  dispatch(pendingRequest: PendingRequest): Response {
    const mockResponse = this.match(pendingRequest);
    if (!mockResponse) {
      this.record(pendingRequest);
      throw new NoMockResponseFoundException(pendingRequest.getUrl());
    }
    const response = pendingRequest.createResponse(mockResponse.toRawResponse(), true);
    this.record(pendingRequest, response);
    return response;
  }

  getRecordedRequests(): PendingRequest[] {
    return this.recorded.map((exchange) => exchange.pendingRequest);
  }

  getRecordedExchanges(): RecordedExchange[] {
    return [...this.recorded];
  }

  getLastPendingRequest(): PendingRequest | undefined {
    return this.recorded.at(-1)?.pendingRequest;
  }

  getLastResponse(): Response | undefined {
    return this.recorded.at(-1)?.response;
  }

  assertSent(matcher: SentMatcher): void {
    assert.ok(this.findSent(matcher).length > 0, `Expected a request matching ${describeMatcher(matcher)} to be sent.`);
  }

  assertNotSent(matcher: SentMatcher): void {
    assert.ok(this.findSent(matcher).length === 0, `Expected no request matching ${describeMatcher(matcher)} to be sent.`);
  }

  assertSentCount(count: number): void {
    assert.equal(this.recorded.length, count, `Expected ${count} requests to be sent, ${this.recorded.length} were.`);
  }

  assertNothingSent(): void {
    this.assertSentCount(0);
  }

  private findKeyedEntry(pendingRequest: PendingRequest): MockEntry | undefined {
    const request = pendingRequest.getRequest();
    const connector = pendingRequest.getConnector();

    for (const [key, entry] of this.keyed) {
      if (typeof key !== 'string' && request instanceof key) return entry;
    }
    for (const [key, entry] of this.keyed) {
      if (typeof key !== 'string' && connector instanceof key) return entry;
    }
    for (const [key, entry] of this.keyed) {
      if (typeof key === 'string' && urlMatches(key, pendingRequest.getUrl())) return entry;
    }
    return undefined;
  }

  private findSent(matcher: SentMatcher): RecordedExchange[] {
    return this.recorded.filter(({ pendingRequest, response }) => {
      if (typeof matcher === 'string') {
        return urlMatches(matcher, pendingRequest.getUrl());
      }
      if (isClassKey(matcher)) {
        return pendingRequest.getRequest() instanceof matcher || pendingRequest.getConnector() instanceof matcher;
      }
      return response !== undefined && matcher(pendingRequest, response);
    });
  }
}

function isClassKey(value: SentMatcher): value is RequestClass | ConnectorClass {
  if (typeof value !== 'function') return false;
  return (
    value === Request ||
    value === Connector ||
    value.prototype instanceof Request ||
    value.prototype instanceof Connector
  );
}

function describeMatcher(matcher: SentMatcher): string {
  if (typeof matcher === 'string') return `"${matcher}"`;
  if (isClassKey(matcher)) return matcher.name;
  return 'the given callback';
}
