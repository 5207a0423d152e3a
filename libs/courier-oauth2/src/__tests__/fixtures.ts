import { AccessTokenAuthenticator } from '@courier-http/core';
import type { OAuthAuthenticator } from '@courier-http/core';
import { AuthorizationCodeConnector } from '../AuthorizationCodeConnector';
import { OAuthConfig } from '../OAuthConfig';

export class OAuth2Connector extends AuthorizationCodeConnector {
  resolveBaseUrl(): string {
    return 'https://oauth.example.com';
  }

  protected defaultOauthConfig(): OAuthConfig {
    return OAuthConfig.make()
      .setClientId('client-id')
      .setClientSecret('test-secret')
      .setRedirectUri('https://my-app.example.com/auth/callback');
  }
}

export class GreetingAuthenticator extends AccessTokenAuthenticator {
  constructor(
    readonly greeting: string,
    accessToken: string,
    refreshToken: string | null,
    expiresAt: Date | null,
  ) {
    super(accessToken, refreshToken, expiresAt);
  }

  getGreeting(): string {
    return this.greeting;
  }
}

export class GreetingOAuth2Connector extends OAuth2Connector {
  constructor(private readonly greeting: string) {
    super();
  }

  protected createOAuthAuthenticator(
    accessToken: string,
    refreshToken: string | null,
    expiresAt: Date | null,
  ): OAuthAuthenticator {
    return new GreetingAuthenticator(this.greeting, accessToken, refreshToken, expiresAt);
  }
}
