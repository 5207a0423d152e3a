import type { ErrorCategory, HttpHeaders } from './types';
import type { Response } from './Response';

export class CourierException extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CourierException';
  }
}

/**
 * Thrown while building a PendingRequest when the request cannot be tied to a connector.
 */
export class InvalidConnectorException extends CourierException {
  constructor(message = 'The request does not have a connector to send it through.') {
    super(message);
    this.name = 'InvalidConnectorException';
  }
}

/**
 * Thrown while building a PendingRequest when the configured response class
 * is not the Response class or one of its subclasses.
 */
export class InvalidResponseClassException extends CourierException {
  constructor(message = 'The provided response class must be Response or extend it.') {
    super(message);
    this.name = 'InvalidResponseClassException';
  }
}

export class InvalidStateException extends CourierException {
  constructor(message = 'Invalid state.') {
    super(message);
    this.name = 'InvalidStateException';
  }
}

export class InvalidArgumentException extends CourierException {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentException';
  }
}

/**
 * Thrown when a sealed PropertyBag is written to.
 */
export class SealedPropertyBagException extends CourierException {
  constructor(key?: string) {
    super(key === undefined ? 'The property bag is sealed.' : `The property bag is sealed; cannot write "${key}".`);
    this.name = 'SealedPropertyBagException';
  }
}

/**
 * Wraps whatever the transport threw (DNS failure, connection reset, abort on timeout).
 */
export class TransportException extends CourierException {
  readonly method: string;
  readonly url: string;
  readonly timedOut: boolean;

  constructor(
    message: string,
    options: { method: string; url: string; cause?: unknown; timedOut?: boolean },
  ) {
    super(message, { cause: options.cause });
    this.name = 'TransportException';
    this.method = options.method;
    this.url = options.url;
    this.timedOut = options.timedOut ?? false;
  }
}

/**
 * Raised by `Response.throw()` for 4xx and 5xx responses.
 */
export class RequestException extends CourierException {
  readonly status: number;
  readonly category: ErrorCategory;
  readonly headers: HttpHeaders;
  readonly body: string;
  readonly response: Response;

  constructor(message: string, response: Response, category: ErrorCategory) {
    super(message);
    this.name = 'RequestException';
    this.status = response.status;
    this.category = category;
    this.headers = response.headers;
    this.body = response.body();
    this.response = response;
  }
}

export class NoMockResponseFoundException extends CourierException {
  constructor(url: string) {
    super(`Courier was unable to guess a mock response for your request [${url}], consider using a wildcard url mock or a connector mock.`);
    this.name = 'NoMockResponseFoundException';
  }
}

export class OAuthConfigValidationException extends CourierException {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid OAuth2 configuration: ${issues.join('; ')}`);
    this.name = 'OAuthConfigValidationException';
    this.issues = issues;
  }
}

export class InvalidTokenResponseException extends CourierException {
  readonly response: Response;

  constructor(message: string, response: Response) {
    super(message);
    this.name = 'InvalidTokenResponseException';
    this.response = response;
  }
}
