import type { Connector } from './Connector';
import { InvalidConnectorException } from './errors';
import { HasRequestProperties } from './HasRequestProperties';
import type { MockClient } from './mocking/MockClient';
import { PendingRequest } from './PendingRequest';
import type { Response } from './Response';
import type { HttpMethod } from './types';

/**
 * One endpoint of an API.
 *
 * Requests are usually sent through a connector (`connector.send(request)`).
 * A request that knows its connector, by `setConnector()` or by overriding
 * `resolveConnector()`, can also send itself.
 *
 * @example
 * ```typescript
 * class GetServerRequest extends Request {
 *   readonly method = 'GET';
 *
 *   constructor(private readonly serverId: string) {
 *     super();
 *   }
 *
 *   resolveEndpoint() {
 *     return `/servers/${this.serverId}`;
 *   }
 * }
 * ```
 */
export abstract class Request extends HasRequestProperties {
  abstract readonly method: HttpMethod;

  private connector?: Connector;

  abstract resolveEndpoint(): string;

  /**
   * Connector this request sends through when none is given explicitly.
   */
  resolveConnector(): Connector | undefined {
    return this.connector;
  }

  setConnector(connector: Connector): this {
    this.connector = connector;
    return this;
  }

  getConnector(): Connector {
    const connector = this.resolveConnector();
    if (!connector) {
      throw new InvalidConnectorException(
        `${this.constructor.name} has no connector. Send it through a connector or override resolveConnector().`,
      );
    }
    return connector;
  }

  createPendingRequest(mockClient?: MockClient): PendingRequest {
    return new PendingRequest(this, undefined, mockClient);
  }

  async send(mockClient?: MockClient): Promise<Response> {
    return this.getConnector().send(this, mockClient);
  }
}
