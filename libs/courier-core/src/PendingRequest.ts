import type { Authenticator } from './auth/Authenticator';
import type { Connector } from './Connector';
import { InvalidConnectorException, InvalidResponseClassException } from './errors';
import { joinUrl } from './helpers/url';
import { MiddlewarePipeline } from './MiddlewarePipeline';
import type { MockClient } from './mocking/MockClient';
import { PropertyBag } from './PropertyBag';
import type { Request } from './Request';
import { Response } from './Response';
import type { ResponseClass } from './Response';
import type { Sender } from './senders/Sender';
import type { BodyFormat, HttpMethod, Logger, QueryValue, RawHttpResponse } from './types';

/**
 * The fully merged, authenticated and booted description of one send.
 *
 * Built once per `Connector.send()` and owned by that call; sending the same
 * Request object again builds a fresh PendingRequest from the untouched
 * connector and request properties.
 *
 * Construction runs in a fixed order, each step seeing the results of the
 * previous ones:
 * 1. resolve the mock client (per-send override, request, then connector)
 * 2. merge headers, query, body, config and middleware (connector, then request)
 * 3. apply the authenticator (request, then connector)
 * 4. boot the connector, then the request
 * 5. boot the connector's plugins, then the request's
 */
export class PendingRequest {
  private readonly request: Request;
  private readonly connector: Connector;
  private readonly method: HttpMethod;
  private readonly url: string;
  private readonly responseClass: ResponseClass;
  private readonly mockClient?: MockClient;
  private readonly authenticator?: Authenticator;
  private readonly headerBag: PropertyBag<string>;
  private readonly queryBag: PropertyBag<QueryValue>;
  private readonly bodyBag: PropertyBag<unknown>;
  private readonly configBag: PropertyBag<unknown>;
  private readonly pipeline: MiddlewarePipeline;

  constructor(request: Request, connector?: Connector, mockClient?: MockClient) {
    const resolvedConnector = connector ?? request.resolveConnector();
    if (!resolvedConnector) {
      throw new InvalidConnectorException(
        `${request.constructor.name} has no connector. Send it through a connector or override resolveConnector().`,
      );
    }

    const responseClass = request.resolveResponseClass() ?? resolvedConnector.resolveResponseClass() ?? Response;
    if (!Response.isResponseClass(responseClass)) {
      throw new InvalidResponseClassException();
    }

    this.request = request;
    this.connector = resolvedConnector;
    this.method = request.method;
    this.url = joinUrl(resolvedConnector.resolveBaseUrl(), request.resolveEndpoint());
    this.responseClass = responseClass;
    this.mockClient = mockClient ?? request.getMockClient() ?? resolvedConnector.getMockClient();

    this.headerBag = resolvedConnector.headers().merge(request.headers());
    this.queryBag = resolvedConnector.query().merge(request.query());
    this.bodyBag = resolvedConnector.body().merge(request.body());
    this.configBag = resolvedConnector.config().merge(request.config());
    this.pipeline = resolvedConnector.middleware().merge(request.middleware());

    this.authenticator = request.getAuthenticator() ?? resolvedConnector.getAuthenticator();
    this.authenticator?.apply(this);

    resolvedConnector.boot(this);
    request.boot(this);

    for (const plugin of resolvedConnector.plugins()) {
      plugin.boot(this, resolvedConnector);
    }
    for (const plugin of request.plugins()) {
      plugin.boot(this, request);
    }
  }

  /**
   * Runs the global middleware, then the connector and request middleware,
   * and seals the pending request once they have all finished.
   */
  async executeRequestPipeline(globalMiddleware?: MiddlewarePipeline, logger?: Logger): Promise<void> {
    const pipeline = globalMiddleware ? globalMiddleware.merge(this.pipeline) : this.pipeline;
    await pipeline.executeRequestPipeline(this, logger);
    this.seal();
  }

  /**
   * Freezes headers, query, body and config. Writes to them throw
   * `SealedPropertyBagException` afterwards.
   */
  seal(): this {
    this.headerBag.seal();
    this.queryBag.seal();
    this.bodyBag.seal();
    this.configBag.seal();
    return this;
  }

  isSealed(): boolean {
    return this.headerBag.isSealed();
  }

  /**
   * Runs the connector and request interceptors, then the global ones.
   */
  async executeResponsePipeline(
    response: Response,
    globalMiddleware?: MiddlewarePipeline,
    logger?: Logger,
  ): Promise<void> {
    const pipeline = globalMiddleware ? this.pipeline.merge(globalMiddleware) : this.pipeline;
    await pipeline.executeResponsePipeline(response, logger);
  }

  createResponse(raw: RawHttpResponse, mocked = false): Response {
    return new this.responseClass(this, raw, mocked);
  }

  getRequest(): Request {
    return this.request;
  }

  getConnector(): Connector {
    return this.connector;
  }

  getMethod(): HttpMethod {
    return this.method;
  }

  /**
   * Base URL joined with the endpoint, without the query string.
   */
  getUrl(): string {
    return this.url;
  }

  getResponseClass(): ResponseClass {
    return this.responseClass;
  }

  getMockClient(): MockClient | undefined {
    return this.mockClient;
  }

  hasMockClient(): boolean {
    return this.mockClient !== undefined;
  }

  getAuthenticator(): Authenticator | undefined {
    return this.authenticator;
  }

  getSender(): Sender {
    return this.connector.sender();
  }

  getBodyFormat(): BodyFormat {
    return this.configBag.get('bodyFormat') === 'form' ? 'form' : 'json';
  }

  headers(): PropertyBag<string> {
    return this.headerBag;
  }

  query(): PropertyBag<QueryValue> {
    return this.queryBag;
  }

  body(): PropertyBag<unknown> {
    return this.bodyBag;
  }

  config(): PropertyBag<unknown> {
    return this.configBag;
  }

  middleware(): MiddlewarePipeline {
    return this.pipeline;
  }
}
