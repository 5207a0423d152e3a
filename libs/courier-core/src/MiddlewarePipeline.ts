import type { PendingRequest } from './PendingRequest';
import type { Response } from './Response';
import type { Logger } from './types';

export type RequestMiddleware = (pendingRequest: PendingRequest) => void | Promise<void>;

export type ResponseInterceptor = (response: Response) => void | Promise<void>;

/**
 * Outbound-request middleware and response interceptors.
 *
 * **Execution Order:**
 * - Request middleware runs in registration order, before dispatch, and may
 *   mutate the pending request's headers, query, body and config.
 * - Response interceptors run in registration order once the response exists.
 * - A hook that throws stops the pipeline; the error reaches the caller of `send`.
 *
 * Pipelines are merged rather than shared: the pending request receives a new
 * pipeline holding the global, connector and request hooks in that order.
 */
export class MiddlewarePipeline {
  private readonly requestPipes: RequestMiddleware[] = [];
  private readonly responsePipes: ResponseInterceptor[] = [];

  onRequest(middleware: RequestMiddleware): this {
    this.requestPipes.push(middleware);
    return this;
  }

  onResponse(interceptor: ResponseInterceptor): this {
    this.responsePipes.push(interceptor);
    return this;
  }

  merge(...pipelines: MiddlewarePipeline[]): MiddlewarePipeline {
    const merged = new MiddlewarePipeline();
    for (const pipeline of [this, ...pipelines]) {
      pipeline.requestPipes.forEach((pipe) => merged.onRequest(pipe));
      pipeline.responsePipes.forEach((pipe) => merged.onResponse(pipe));
    }
    return merged;
  }

  async executeRequestPipeline(pendingRequest: PendingRequest, logger?: Logger): Promise<void> {
    for (const pipe of this.requestPipes) {
      try {
        await pipe(pendingRequest);
      } catch (error) {
        logger?.warn('courier.middleware.request.failed', {
          url: pendingRequest.getUrl(),
          error: error instanceof Error ? error.message : String(error),
        });
        throw error;
      }
    }
  }

  async executeResponsePipeline(response: Response, logger?: Logger): Promise<void> {
    for (const pipe of this.responsePipes) {
      try {
        await pipe(response);
      } catch (error) {
        logger?.warn('courier.middleware.response.failed', {
          url: response.getPendingRequest().getUrl(),
          status: response.status,
          error: error instanceof Error ? error.message : String(error),
        });
        throw error;
      }
    }
  }

  getRequestPipes(): RequestMiddleware[] {
    return [...this.requestPipes];
  }

  getResponsePipes(): ResponseInterceptor[] {
    return [...this.responsePipes];
  }

  isEmpty(): boolean {
    return this.requestPipes.length === 0 && this.responsePipes.length === 0;
  }
}
