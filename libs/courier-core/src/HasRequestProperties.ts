import { BasicAuthenticator } from './auth/BasicAuthenticator';
import { QueryAuthenticator } from './auth/QueryAuthenticator';
import { TokenAuthenticator } from './auth/TokenAuthenticator';
import type { Authenticator } from './auth/Authenticator';
import { MiddlewarePipeline } from './MiddlewarePipeline';
import type { MockClient } from './mocking/MockClient';
import type { PendingRequest } from './PendingRequest';
import type { Plugin } from './plugins';
import { PropertyBag } from './PropertyBag';
import type { ResponseClass } from './Response';
import type { BodyData, ConfigOptions, HttpHeaders, QueryParams, QueryValue } from './types';

/**
 * Properties shared by connectors and requests.
 *
 * Bags are created on first access from the `default*()` methods, so
 * subclasses describe their defaults declaratively and callers can still
 * mutate a specific instance (`request.query().add('page', 2)`). Building a
 * PendingRequest copies these bags; it never writes back into them.
 */
export abstract class HasRequestProperties {
  private headerBag?: PropertyBag<string>;
  private queryBag?: PropertyBag<QueryValue>;
  private bodyBag?: PropertyBag<unknown>;
  private configBag?: PropertyBag<unknown>;
  private pipeline?: MiddlewarePipeline;
  private authenticator?: Authenticator;
  private mockClient?: MockClient;
  private responseClass?: ResponseClass;

  protected defaultHeaders(): HttpHeaders {
    return {};
  }

  protected defaultQuery(): QueryParams {
    return {};
  }

  protected defaultBody(): BodyData {
    return {};
  }

  protected defaultConfig(): ConfigOptions {
    return {};
  }

  protected defaultAuth(): Authenticator | undefined {
    return undefined;
  }

  /**
   * Capability modules booted, in order, on every PendingRequest built from this object.
   */
  plugins(): Plugin[] {
    return [];
  }

  /**
   * Last chance to customize the pending request. Runs after authentication,
   * connector before request.
   */
  boot(_pendingRequest: PendingRequest): void {}

  headers(): PropertyBag<string> {
    this.headerBag ??= PropertyBag.from(this.defaultHeaders());
    return this.headerBag;
  }

  query(): PropertyBag<QueryValue> {
    this.queryBag ??= PropertyBag.from<QueryValue>(this.defaultQuery());
    return this.queryBag;
  }

  body(): PropertyBag<unknown> {
    this.bodyBag ??= PropertyBag.from<unknown>(this.defaultBody());
    return this.bodyBag;
  }

  config(): PropertyBag<unknown> {
    this.configBag ??= PropertyBag.from<unknown>(this.defaultConfig());
    return this.configBag;
  }

  middleware(): MiddlewarePipeline {
    this.pipeline ??= new MiddlewarePipeline();
    return this.pipeline;
  }

  withAuth(authenticator: Authenticator): this {
    this.authenticator = authenticator;
    return this;
  }

  withTokenAuth(token: string, prefix = 'Bearer'): this {
    return this.withAuth(new TokenAuthenticator(token, prefix));
  }

  withBasicAuth(username: string, password: string): this {
    return this.withAuth(new BasicAuthenticator(username, password));
  }

  withQueryAuth(parameter: string, value: string): this {
    return this.withAuth(new QueryAuthenticator(parameter, value));
  }

  getAuthenticator(): Authenticator | undefined {
    return this.authenticator ?? this.defaultAuth();
  }

  withMockClient(mockClient: MockClient): this {
    this.mockClient = mockClient;
    return this;
  }

  getMockClient(): MockClient | undefined {
    return this.mockClient;
  }

  hasMockClient(): boolean {
    return this.mockClient !== undefined;
  }

  withResponseClass(responseClass: ResponseClass): this {
    this.responseClass = responseClass;
    return this;
  }

  resolveResponseClass(): ResponseClass | undefined {
    return this.responseClass;
  }
}
