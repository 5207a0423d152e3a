import { describe, expect, it, vi } from 'vitest';
import { TransportException } from '../errors';
import { hasFormBody } from '../plugins';
import { PropertyBag } from '../PropertyBag';
import type { Plugin } from '../plugins';
import { TransportSender } from '../senders/TransportSender';
import type { HttpTransport, RawHttpResponse, TransportRequest } from '../types';
import { CreateUserRequest, GetUserRequest, TestConnector } from './fixtures';

const decode = (body: ArrayBuffer | undefined): string | undefined =>
  body === undefined ? undefined : new TextDecoder().decode(body);

const rawResponse = (status: number, body: string): RawHttpResponse => {
  const encoded = new TextEncoder().encode(body);
  const buffer = new ArrayBuffer(encoded.byteLength);
  new Uint8Array(buffer).set(encoded);
  return { status, headers: { 'content-type': 'application/json' }, body: buffer };
};

const recordingTransport = (status = 200, body = '{}') => {
  const calls: TransportRequest[] = [];
  const transport: HttpTransport = async (req) => {
    calls.push(req);
    return rawResponse(status, body);
  };
  return { calls, transport };
};

class CreateUserFormRequest extends CreateUserRequest {
  plugins(): Plugin[] {
    return [hasFormBody()];
  }
}

describe('TransportSender', () => {
  it('should send the encoded query and a JSON body by default', async () => {
    const { calls, transport } = recordingTransport(201, '{"id":9}');
    const connector = new TestConnector().withSender(new TransportSender({ transport }));

    const response = await connector.send(new CreateUserRequest());

    expect(calls).toHaveLength(1);
    expect(calls[0]?.method).toBe('POST');
    expect(calls[0]?.url).toBe('https://api.example.com/v1/users?locale=en');
    expect(calls[0]?.headers).toEqual({
      Accept: 'application/json',
      'X-Client': 'connector',
      'Content-Type': 'application/json',
    });
    expect(decode(calls[0]?.body)).toBe('{"name":"Ada","role":"admin"}');
    expect(response.status).toBe(201);
    expect(response.json()).toEqual({ id: 9 });
  });

  it('should form-encode the body when the body format is form', async () => {
    const { calls, transport } = recordingTransport();
    const request = new CreateUserFormRequest();
    request.body().add('tags', ['a', 'b']);

    await new TestConnector().withSender(new TransportSender({ transport })).send(request);

    expect(calls[0]?.headers['Content-Type']).toBe('application/x-www-form-urlencoded');
    expect(decode(calls[0]?.body)).toBe('name=Ada&role=admin&tags=%5B%22a%22%2C%22b%22%5D');
  });

  it('should write nested bags as objects in a JSON body', async () => {
    const { calls, transport } = recordingTransport();
    const request = new CreateUserRequest();
    request.body().add('meta', PropertyBag.from({ team: 'core' }));

    await new TestConnector().withSender(new TransportSender({ transport })).send(request);

    expect(decode(calls[0]?.body)).toBe('{"name":"Ada","role":"admin","meta":{"team":"core"}}');
  });

  it('should write nested bags as JSON fields in a form body', async () => {
    const { calls, transport } = recordingTransport();
    const request = new CreateUserFormRequest();
    request.body().add('meta', PropertyBag.from({ team: 'core' }));

    await new TestConnector().withSender(new TransportSender({ transport })).send(request);

    expect(decode(calls[0]?.body)).toBe('name=Ada&role=admin&meta=%7B%22team%22%3A%22core%22%7D');
  });

  it('should omit the body when the body bag is empty', async () => {
    const { calls, transport } = recordingTransport();

    await new TestConnector().withSender(new TransportSender({ transport })).send(new GetUserRequest());

    expect(calls[0]?.body).toBeUndefined();
    expect(calls[0]?.headers['Content-Type']).toBeUndefined();
  });

  it('should resolve error statuses into a failed response', async () => {
    const { transport } = recordingTransport(404, '{"message":"missing"}');

    const response = await new TestConnector().withSender(new TransportSender({ transport })).send(new GetUserRequest());

    expect(response.status).toBe(404);
    expect(response.failed()).toBe(true);
  });

  it('should wrap transport failures', async () => {
    const failure = new Error('ECONNRESET');
    const transport: HttpTransport = vi.fn().mockRejectedValue(failure);
    const connector = new TestConnector().withSender(new TransportSender({ transport }));

    const error = await connector.send(new GetUserRequest()).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransportException);
    if (!(error instanceof TransportException)) return;
    expect(error.message).toBe('GET https://api.example.com/v1/users/1?locale=en failed: ECONNRESET');
    expect(error.timedOut).toBe(false);
    expect(error.cause).toBe(failure);
  });

  it('should abort the transport after the configured timeout', async () => {
    const transport: HttpTransport = (_req, signal) =>
      new Promise<RawHttpResponse>((_resolve, reject) => {
        signal.addEventListener('abort', () => reject(new Error('aborted')));
      });
    const request = new GetUserRequest();
    request.config().add('timeout', 5);

    const error = await new TestConnector()
      .withSender(new TransportSender({ transport }))
      .send(request)
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransportException);
    if (!(error instanceof TransportException)) return;
    expect(error.timedOut).toBe(true);
    expect(error.message).toBe('GET https://api.example.com/v1/users/1?locale=en timed out after 5ms');
  });

  it('should not share header objects with the pending request', () => {
    const sender = new TransportSender();
    const pending = new TestConnector().createPendingRequest(new CreateUserRequest());

    const transportRequest = sender.buildTransportRequest(pending);

    expect(transportRequest.headers['Content-Type']).toBe('application/json');
    expect(pending.headers().has('Content-Type')).toBe(false);
  });
});
