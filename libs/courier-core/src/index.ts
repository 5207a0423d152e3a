export * from './types';
export * from './errors';
export * from './auth';

export { PropertyBag } from './PropertyBag';
export type { PropertySource } from './PropertyBag';
export { MiddlewarePipeline } from './MiddlewarePipeline';
export type { RequestMiddleware, ResponseInterceptor } from './MiddlewarePipeline';
export { HasRequestProperties } from './HasRequestProperties';
export { Connector } from './Connector';
export { Request } from './Request';
export { PendingRequest } from './PendingRequest';
export { Response } from './Response';
export type { ResponseClass } from './Response';
export { Config, GlobalConfig, loadEnv } from './Config';
export type { CourierEnv, SenderFactory } from './Config';

export { acceptsJson, alwaysThrowOnErrors, hasFormBody, hasJsonBody, hasTimeout } from './plugins';
export type { Plugin } from './plugins';

export type { Sender } from './senders/Sender';
export { TransportSender } from './senders/TransportSender';
export type { TransportSenderOptions } from './senders/TransportSender';
export { fetchTransport } from './transport/fetchTransport';
export { createAxiosTransport } from './transport/axiosTransport';
export type { AxiosInstanceLike } from './transport/axiosTransport';

export { MockClient } from './mocking/MockClient';
export type {
  ConnectorClass,
  MockEntry,
  MockKey,
  MockResponseFactory,
  MockResponses,
  RecordedExchange,
  RequestClass,
  SentMatcher,
} from './mocking/MockClient';
export { MockResponse } from './mocking/MockResponse';

export { ConsoleLogger, silentLogger } from './logger';
export { appendQuery, buildQueryString, isAbsoluteUrl, joinUrl } from './helpers/url';
