import { describe, expect, it } from 'vitest';
import type { Authenticator } from '../auth/Authenticator';
import { InvalidConnectorException, InvalidResponseClassException, SealedPropertyBagException } from '../errors';
import { MockClient } from '../mocking/MockClient';
import type { PendingRequest } from '../PendingRequest';
import type { Plugin } from '../plugins';
import { Response } from '../Response';
import type { ResponseClass } from '../Response';
import { CreateUserRequest, GetUserRequest, TestConnector, UserResponse } from './fixtures';

const recordingPlugin = (steps: string[], label: string): Plugin => ({
  name: label,
  boot: (pending) => {
    steps.push(`${label}:${pending.headers().get('Authorization') ?? 'none'}`);
  },
});

describe('PendingRequest', () => {
  it('should join the base URL and endpoint with a single slash', () => {
    const pending = new TestConnector().createPendingRequest(new GetUserRequest(7));

    expect(pending.getUrl()).toBe('https://api.example.com/v1/users/7');
    expect(pending.getMethod()).toBe('GET');
  });

  it('should merge connector properties first and let the request override them in place', () => {
    const pending = new TestConnector().createPendingRequest(new GetUserRequest());

    expect(pending.headers().entries()).toEqual([
      ['Accept', 'application/json'],
      ['X-Client', 'request'],
    ]);
    expect(pending.query().all()).toEqual({ locale: 'en' });
    expect(pending.body().isEmpty()).toBe(true);
  });

  it('should never write back into the connector or request bags', () => {
    const connector = new TestConnector();
    const request = new CreateUserRequest();

    const pending = connector.withTokenAuth('test-token').createPendingRequest(request);
    pending.headers().add('X-Extra', 'yes');
    pending.body().add('name', 'Grace');

    expect(connector.headers().all()).toEqual({ Accept: 'application/json', 'X-Client': 'connector' });
    expect(request.headers().all()).toEqual({});
    expect(request.body().all()).toEqual({ name: 'Ada', role: 'admin' });
  });

  it('should build independent pending requests from the same request', () => {
    const connector = new TestConnector();
    const request = new CreateUserRequest();

    const first = connector.createPendingRequest(request);
    first.body().add('role', 'viewer');
    const second = connector.createPendingRequest(request);

    expect(second.body().all()).toEqual({ name: 'Ada', role: 'admin' });
    expect(second.body()).not.toBe(first.body());
  });

  it('should deep copy nested body values so every build starts from the request', () => {
    const connector = new TestConnector();
    const request = new CreateUserRequest();
    request.body().add('meta', { tags: ['a'] });

    const first = connector.createPendingRequest(request);
    const meta = first.body().get('meta');
    if (typeof meta === 'object' && meta !== null && 'tags' in meta && Array.isArray(meta.tags)) {
      meta.tags.push('leak');
    }
    const second = connector.createPendingRequest(request);

    expect(first.body().get('meta')).toEqual({ tags: ['a', 'leak'] });
    expect(second.body().get('meta')).toEqual({ tags: ['a'] });
    expect(request.body().get('meta')).toEqual({ tags: ['a'] });
  });

  it('should seal every bag once the request pipeline has run', async () => {
    const pending = new TestConnector().createPendingRequest(new CreateUserRequest());
    pending.headers().add('X-Before', 'yes');

    await pending.executeRequestPipeline();

    expect(pending.isSealed()).toBe(true);
    expect(() => pending.headers().add('X-After', 'yes')).toThrow(SealedPropertyBagException);
    expect(() => pending.query().remove('locale')).toThrow(SealedPropertyBagException);
    expect(() => pending.body().set({})).toThrow(SealedPropertyBagException);
    expect(() => pending.config().add('timeout', 5)).toThrow(SealedPropertyBagException);
    expect(pending.headers().get('X-Before')).toBe('yes');
  });

  it('should authenticate, then boot the connector, the request and their plugins in order', () => {
    const steps: string[] = [];

    class OrderedConnector extends TestConnector {
      boot(pending: PendingRequest): void {
        steps.push(`connector-boot:${pending.headers().get('Authorization') ?? 'none'}`);
      }

      plugins(): Plugin[] {
        return [recordingPlugin(steps, 'connector-plugin-1'), recordingPlugin(steps, 'connector-plugin-2')];
      }
    }

    class OrderedRequest extends GetUserRequest {
      boot(): void {
        steps.push('request-boot');
      }

      plugins(): Plugin[] {
        return [recordingPlugin(steps, 'request-plugin')];
      }
    }

    const authenticator: Authenticator = {
      apply: (pending) => {
        steps.push(`auth:${pending.headers().get('X-Client') ?? 'none'}`);
        pending.headers().add('Authorization', 'Bearer test-token');
      },
    };

    new OrderedConnector().withAuth(authenticator).createPendingRequest(new OrderedRequest());

    expect(steps).toEqual([
      'auth:request',
      'connector-boot:Bearer test-token',
      'request-boot',
      'connector-plugin-1:Bearer test-token',
      'connector-plugin-2:Bearer test-token',
      'request-plugin:Bearer test-token',
    ]);
  });

  it('should resolve the mock client from the send, then the request, then the connector', () => {
    const connectorMock = new MockClient();
    const requestMock = new MockClient();
    const sendMock = new MockClient();
    const connector = new TestConnector().withMockClient(connectorMock);

    expect(connector.createPendingRequest(new GetUserRequest()).getMockClient()).toBe(connectorMock);
    expect(connector.createPendingRequest(new GetUserRequest().withMockClient(requestMock)).getMockClient()).toBe(
      requestMock,
    );
    expect(
      connector.createPendingRequest(new GetUserRequest().withMockClient(requestMock), sendMock).getMockClient(),
    ).toBe(sendMock);
    expect(new TestConnector().createPendingRequest(new GetUserRequest()).hasMockClient()).toBe(false);
  });

  it('should use the request response class before the connector one', () => {
    class ConnectorResponse extends Response {}
    const connector = new TestConnector().withResponseClass(ConnectorResponse);

    expect(connector.createPendingRequest(new GetUserRequest()).getResponseClass()).toBe(ConnectorResponse);
    expect(
      connector.createPendingRequest(new GetUserRequest().withResponseClass(UserResponse)).getResponseClass(),
    ).toBe(UserResponse);
    expect(new TestConnector().createPendingRequest(new GetUserRequest()).getResponseClass()).toBe(Response);
  });

  it('should reject a response class that does not extend Response', () => {
    class NotAResponse {}
    const connector = new TestConnector().withResponseClass(NotAResponse as unknown as ResponseClass);

    expect(() => connector.createPendingRequest(new GetUserRequest())).toThrow(InvalidResponseClassException);
  });

  it('should reject a request without a connector', async () => {
    const request = new GetUserRequest();

    expect(() => request.createPendingRequest()).toThrow(InvalidConnectorException);
    await expect(request.send()).rejects.toBeInstanceOf(InvalidConnectorException);
  });

  it('should build from the connector the request resolves itself', () => {
    const pending = new GetUserRequest().setConnector(new TestConnector()).createPendingRequest();

    expect(pending.getUrl()).toBe('https://api.example.com/v1/users/1');
    expect(pending.getConnector()).toBeInstanceOf(TestConnector);
  });

  it('should default to the json body format', () => {
    const request = new CreateUserRequest();
    expect(new TestConnector().createPendingRequest(request).getBodyFormat()).toBe('json');

    request.config().add('bodyFormat', 'form');
    expect(new TestConnector().createPendingRequest(request).getBodyFormat()).toBe('form');
  });
});
