import { describe, expect, it } from 'vitest';
import { NoMockResponseFoundException } from '../errors';
import { MockClient } from '../mocking/MockClient';
import type { MockEntry, MockKey } from '../mocking/MockClient';
import { MockResponse } from '../mocking/MockResponse';
import type { PendingRequest } from '../PendingRequest';
import type { Response } from '../Response';
import { CreateUserRequest, GetUserRequest, OtherConnector, TestConnector } from './fixtures';

describe('MockClient', () => {
  it('should hand out sequence responses in order', async () => {
    const mockClient = new MockClient([MockResponse.make({ n: 1 }), MockResponse.make({ n: 2 }, 201)]);
    const connector = new TestConnector().withMockClient(mockClient);

    const first = await connector.send(new GetUserRequest());
    const second = await connector.send(new GetUserRequest());

    expect(first.json()).toEqual({ n: 1 });
    expect(second.status).toBe(201);
    await expect(connector.send(new GetUserRequest())).rejects.toBeInstanceOf(NoMockResponseFoundException);
    mockClient.assertSentCount(3);
  });

  it('should match request classes before connector classes and URL patterns', async () => {
    const mockClient = new MockClient(
      new Map<MockKey, MockEntry>([
        ['api.example.com/v1/users/*', MockResponse.make({ source: 'url' })],
        [TestConnector, MockResponse.make({ source: 'connector' })],
        [CreateUserRequest, MockResponse.make({ source: 'request' }, 201)],
      ]),
    );
    const connector = new TestConnector().withMockClient(mockClient);

    const created = await connector.send(new CreateUserRequest());
    const fetched = await connector.send(new GetUserRequest());

    expect(created.json()).toEqual({ source: 'request' });
    expect(fetched.json()).toEqual({ source: 'connector' });
  });

  it('should match URL patterns with and without the scheme', async () => {
    const mockClient = new MockClient(
      new Map<MockKey, MockEntry>([
        ['https://api.example.com/v1/users/1', MockResponse.make({ id: 1 })],
        ['other.example.com/*', MockResponse.make({ other: true })],
      ]),
    );

    const user = await new TestConnector().send(new GetUserRequest(), mockClient);
    const other = await new OtherConnector().send(new GetUserRequest(5), mockClient);

    expect(user.json()).toEqual({ id: 1 });
    expect(other.json()).toEqual({ other: true });
  });

  it('should call response factories with the pending request', async () => {
    const mockClient = new MockClient([(pending) => MockResponse.make({ url: pending.getUrl() })]);

    const response = await new TestConnector().send(new GetUserRequest(4), mockClient);

    expect(response.json()).toEqual({ url: 'https://api.example.com/v1/users/4' });
  });

  it('should record unmatched requests before throwing', async () => {
    const mockClient = new MockClient();

    await expect(new TestConnector().send(new GetUserRequest(), mockClient)).rejects.toThrow(
      'unable to guess a mock response for your request [https://api.example.com/v1/users/1]',
    );
    expect(mockClient.getRecordedRequests()).toHaveLength(1);
    expect(mockClient.getLastResponse()).toBeUndefined();
  });

  it('should assert on what was sent', async () => {
    const mockClient = new MockClient()
      .addResponse(MockResponse.make({ id: 1 }), GetUserRequest)
      .addResponse(MockResponse.make({}, 500), 'api.example.com/v1/users');

    await new TestConnector().send(new GetUserRequest(), mockClient);

    mockClient.assertSent(GetUserRequest);
    mockClient.assertSent(TestConnector);
    mockClient.assertSent('*/users/1');
    mockClient.assertSent((_pending, response) => response.status === 200);
    mockClient.assertNotSent(CreateUserRequest);
    mockClient.assertSentCount(1);
    expect(() => mockClient.assertNothingSent()).toThrow('Expected 0 requests to be sent, 1 were.');
    expect(() => mockClient.assertSent(CreateUserRequest)).toThrow(
      'Expected a request matching CreateUserRequest to be sent.',
    );
  });

  it('should call function declarations as callbacks rather than class keys', async () => {
    const mockClient = new MockClient([MockResponse.make({ id: 1 })]);

    await new TestConnector().send(new GetUserRequest(), mockClient);

    mockClient.assertSent(function (pending: PendingRequest, response: Response): boolean {
      return pending.getMethod() === 'GET' && response.status === 200;
    });
    expect(() =>
      mockClient.assertSent(function (_pending: PendingRequest, response: Response): boolean {
        return response.status === 201;
      }),
    ).toThrow('Expected a request matching the given callback to be sent.');
  });

  it('should expose the last exchange', async () => {
    const mockClient = new MockClient([MockResponse.make({ id: 1 })]);

    const response = await new TestConnector().send(new GetUserRequest(), mockClient);

    expect(mockClient.getLastResponse()).toBe(response);
    expect(mockClient.getLastPendingRequest()).toBe(response.getPendingRequest());
    expect(mockClient.getRecordedExchanges()).toEqual([
      { pendingRequest: response.getPendingRequest(), response },
    ]);
  });

  it('should JSON-encode non-string mock bodies', () => {
    const mockResponse = MockResponse.make({ a: 1 }, 202, { 'x-id': '7' });
    const textResponse = MockResponse.make('plain');

    expect(mockResponse.getBody()).toBe('{"a":1}');
    expect(mockResponse.headers).toEqual({ 'x-id': '7', 'Content-Type': 'application/json' });
    expect(textResponse.headers).toEqual({});
  });
});
