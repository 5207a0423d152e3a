import { acceptsJson, Request } from '@courier-http/core';
import type { HttpMethod, Plugin } from '@courier-http/core';
import type { OAuthConfig } from '../OAuthConfig';

/**
 * Fetches the resource owner. The caller attaches the access token authenticator.
 */
export class GetUserRequest extends Request {
  readonly method: HttpMethod = 'GET';

  constructor(protected readonly oauthConfig: OAuthConfig) {
    super();
  }

  resolveEndpoint(): string {
    return this.oauthConfig.getUserEndpoint();
  }

  plugins(): Plugin[] {
    return [acceptsJson()];
  }
}
