import { acceptsJson, hasFormBody, Request } from '@courier-http/core';
import type { BodyData, HttpMethod, Plugin } from '@courier-http/core';
import type { OAuthConfig } from '../OAuthConfig';

/**
 * Exchanges an authorization code for tokens.
 */
export class GetAccessTokenRequest extends Request {
  readonly method: HttpMethod = 'POST';

  constructor(
    protected readonly code: string,
    protected readonly oauthConfig: OAuthConfig,
  ) {
    super();
  }

  resolveEndpoint(): string {
    return this.oauthConfig.getTokenEndpoint();
  }

  protected defaultBody(): BodyData {
    return {
      grant_type: 'authorization_code',
      code: this.code,
      client_id: this.oauthConfig.getClientId(),
      client_secret: this.oauthConfig.getClientSecret(),
      redirect_uri: this.oauthConfig.getRedirectUri(),
    };
  }

  plugins(): Plugin[] {
    return [acceptsJson(), hasFormBody()];
  }
}
