import { Config } from './Config';
import type { GlobalConfig } from './Config';
import { HasRequestProperties } from './HasRequestProperties';
import type { MockClient } from './mocking/MockClient';
import { PendingRequest } from './PendingRequest';
import type { Request } from './Request';
import type { Response } from './Response';
import type { Sender } from './senders/Sender';

/**
 * Base definition of one API: where it lives and what every request to it shares.
 *
 * @example
 * ```typescript
 * class ForgeConnector extends Connector {
 *   resolveBaseUrl() {
 *     return 'https://forge.example.com/api/v1';
 *   }
 *
 *   protected defaultHeaders() {
 *     return { Accept: 'application/json' };
 *   }
 * }
 *
 * const response = await new ForgeConnector().send(new GetServersRequest());
 * ```
 */
export abstract class Connector extends HasRequestProperties {
  private senderInstance?: Sender;
  private configOverride?: GlobalConfig;

  abstract resolveBaseUrl(): string;

  /**
   * Sender used when no mock client is attached. Defaults to the global default sender.
   */
  protected defaultSender(): Sender {
    return this.globalConfig().createDefaultSender();
  }

  sender(): Sender {
    this.senderInstance ??= this.defaultSender();
    return this.senderInstance;
  }

  withSender(sender: Sender): this {
    this.senderInstance = sender;
    return this;
  }

  globalConfig(): GlobalConfig {
    return this.configOverride ?? Config;
  }

  /**
   * Use a config object other than the process-wide one, e.g. in tests.
   */
  withGlobalConfig(config: GlobalConfig): this {
    this.configOverride = config;
    return this;
  }

  createPendingRequest(request: Request, mockClient?: MockClient): PendingRequest {
    return new PendingRequest(request, this, mockClient);
  }

  /**
   * Builds the pending request, runs middleware and dispatches it to the
   * mock client when one is attached, otherwise to the sender.
   *
   * @param mockClient - used for this send only, ahead of the request's and connector's mock clients
   */
  async send(request: Request, mockClient?: MockClient): Promise<Response> {
    const config = this.globalConfig();
    const logger = config.getLogger();
    const pendingRequest = this.createPendingRequest(request, mockClient);
    const logMeta = {
      connector: this.constructor.name,
      request: request.constructor.name,
      method: pendingRequest.getMethod(),
      url: pendingRequest.getUrl(),
    };

    await pendingRequest.executeRequestPipeline(config.middleware(), logger);

    const activeMockClient = pendingRequest.getMockClient();
    let response: Response;
    try {
      if (activeMockClient) {
        logger.debug('courier.request.mocked', logMeta);
        response = activeMockClient.dispatch(pendingRequest);
      } else {
        logger.debug('courier.request.sending', logMeta);
        response = await pendingRequest.getSender().send(pendingRequest);
      }
    } catch (error) {
      logger.error('courier.request.failed', {
        ...logMeta,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }

    logger.info('courier.response.received', { ...logMeta, status: response.status, mocked: response.isMocked() });

    await pendingRequest.executeResponsePipeline(response, config.middleware(), logger);
    return response;
  }
}
