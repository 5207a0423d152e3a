import { acceptsJson, hasFormBody, Request } from '@courier-http/core';
import type { BodyData, HttpMethod, Plugin } from '@courier-http/core';
import type { OAuthConfig } from '../OAuthConfig';

export class GetRefreshTokenRequest extends Request {
  readonly method: HttpMethod = 'POST';

  constructor(
    protected readonly oauthConfig: OAuthConfig,
    protected readonly refreshToken: string,
  ) {
    super();
  }

  resolveEndpoint(): string {
    return this.oauthConfig.getTokenEndpoint();
  }

  protected defaultBody(): BodyData {
    return {
      grant_type: 'refresh_token',
      refresh_token: this.refreshToken,
      client_id: this.oauthConfig.getClientId(),
      client_secret: this.oauthConfig.getClientSecret(),
    };
  }

  plugins(): Plugin[] {
    return [acceptsJson(), hasFormBody()];
  }
}
