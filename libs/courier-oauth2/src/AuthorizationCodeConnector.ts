import { randomBytes, timingSafeEqual } from 'node:crypto';
import { z } from 'zod';
import {
  AccessTokenAuthenticator,
  appendQuery,
  Connector,
  InvalidArgumentException,
  InvalidStateException,
  InvalidTokenResponseException,
  joinUrl,
} from '@courier-http/core';
import type { OAuthAuthenticator, QueryParams, Request, Response } from '@courier-http/core';
import type { OAuthConfig, RequestModifier } from './OAuthConfig';
import { GetAccessTokenRequest } from './requests/GetAccessTokenRequest';
import { GetRefreshTokenRequest } from './requests/GetRefreshTokenRequest';
import { GetUserRequest } from './requests/GetUserRequest';

export interface AccessTokenOptions {
  /** State returned to the redirect URI. */
  state?: string;
  /** State issued with the authorization URL; checked against `state` when given. */
  expectedState?: string;
  requestModifier?: RequestModifier;
}

export interface RefreshTokenOptions {
  requestModifier?: RequestModifier;
}

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().nullish(),
  expires_in: z
    .union([z.number(), z.string().regex(/^\d+$/).transform(Number)])
    .pipe(z.number().finite().nonnegative())
    .nullish(),
});

const STATE_BYTES = 16;

const statesMatch = (actual: string | undefined, expected: string): boolean => {
  if (actual === undefined) return false;
  const actualBuffer = Buffer.from(actual);
  const expectedBuffer = Buffer.from(expected);
  if (actualBuffer.length !== expectedBuffer.length) return false;
  return timingSafeEqual(actualBuffer, expectedBuffer);
};

/**
 * Connector for APIs using the OAuth2 authorization-code grant.
 *
 * The state issued by `getAuthorizationUrl()` is kept in a single slot: a
 * second call on the same instance replaces it, so concurrent flows need
 * separate connector instances.
 *
 * @example
 * ```typescript
 * class AccountsConnector extends AuthorizationCodeConnector {
 *   resolveBaseUrl() {
 *     return 'https://accounts.example.com';
 *   }
 *
 *   protected defaultOauthConfig() {
 *     return OAuthConfig.make()
 *       .setClientId('client-id')
 *       .setClientSecret('test-secret')
 *       .setRedirectUri('https://my-app.example.com/auth/callback');
 *   }
 * }
 *
 * const connector = new AccountsConnector();
 * const url = connector.getAuthorizationUrl(['user-read-email']);
 * // later, on the callback
 * const authenticator = await connector.getAccessToken(code, {
 *   state: callbackState,
 *   expectedState: storedState,
 * });
 * ```
 */
export abstract class AuthorizationCodeConnector extends Connector {
  private oauthConfigInstance?: OAuthConfig;
  private state?: string;

  protected abstract defaultOauthConfig(): OAuthConfig;

  oauthConfig(): OAuthConfig {
    this.oauthConfigInstance ??= this.defaultOauthConfig();
    return this.oauthConfigInstance;
  }

  /**
   * Builds the URL the resource owner is redirected to and remembers the
   * state. A random 32 character hex state is generated when none is given.
   */
  getAuthorizationUrl(
    scopes: string[] = [],
    state?: string,
    scopeSeparator = ' ',
    additionalQuery: QueryParams = {},
  ): string {
    const config = this.oauthConfig();
    config.validate();

    this.state = state ?? randomBytes(STATE_BYTES).toString('hex');

    const query: QueryParams = {
      response_type: 'code',
      scope: [...config.getDefaultScopes(), ...scopes].join(scopeSeparator),
      client_id: config.getClientId(),
      redirect_uri: config.getRedirectUri(),
      state: this.state,
      ...additionalQuery,
    };

    return appendQuery(joinUrl(this.resolveBaseUrl(), config.getAuthorizeEndpoint()), query);
  }

  getState(): string | null {
    return this.state ?? null;
  }

  getAccessToken(code: string, options: AccessTokenOptions & { returnResponse: true }): Promise<Response>;
  getAccessToken(code: string, options?: AccessTokenOptions & { returnResponse?: false }): Promise<OAuthAuthenticator>;
  async getAccessToken(
    code: string,
    options: AccessTokenOptions & { returnResponse?: boolean } = {},
  ): Promise<OAuthAuthenticator | Response> {
    const config = this.oauthConfig();
    config.validate();

    if (options.expectedState !== undefined && !statesMatch(options.state, options.expectedState)) {
      throw new InvalidStateException('Invalid state.');
    }

    const request = this.resolveAccessTokenRequest(code, config);
    this.applyModifiers(request, options.requestModifier);

    const response = await this.send(request);
    if (options.returnResponse) {
      return response;
    }

    return this.createAuthenticatorFromResponse(response);
  }

  /**
   * Exchanges a refresh token for a new access token. When the token endpoint
   * does not rotate refresh tokens, the new authenticator keeps the old one.
   *
   * @throws InvalidArgumentException before any request when there is no refresh token
   */
  refreshAccessToken(
    authenticatorOrRefreshToken: OAuthAuthenticator | string,
    options: RefreshTokenOptions & { returnResponse: true },
  ): Promise<Response>;
  refreshAccessToken(
    authenticatorOrRefreshToken: OAuthAuthenticator | string,
    options?: RefreshTokenOptions & { returnResponse?: false },
  ): Promise<OAuthAuthenticator>;
  async refreshAccessToken(
    authenticatorOrRefreshToken: OAuthAuthenticator | string,
    options: RefreshTokenOptions & { returnResponse?: boolean } = {},
  ): Promise<OAuthAuthenticator | Response> {
    const config = this.oauthConfig();
    config.validate();

    const refreshToken =
      typeof authenticatorOrRefreshToken === 'string'
        ? authenticatorOrRefreshToken
        : authenticatorOrRefreshToken.getRefreshToken();

    if (!refreshToken) {
      throw new InvalidArgumentException('The provided OAuthAuthenticator does not contain a refresh token.');
    }

    const request = this.resolveRefreshTokenRequest(config, refreshToken);
    this.applyModifiers(request, options.requestModifier);

    const response = await this.send(request);
    if (options.returnResponse) {
      return response;
    }

    return this.createAuthenticatorFromResponse(response, refreshToken);
  }

  async getUser(authenticator: OAuthAuthenticator, requestModifier?: RequestModifier): Promise<Response> {
    const request = this.resolveUserRequest(this.oauthConfig()).withAuth(authenticator);
    this.applyModifiers(request, requestModifier);
    return this.send(request);
  }

  protected resolveAccessTokenRequest(code: string, config: OAuthConfig): Request {
    return new GetAccessTokenRequest(code, config);
  }

  protected resolveRefreshTokenRequest(config: OAuthConfig, refreshToken: string): Request {
    return new GetRefreshTokenRequest(config, refreshToken);
  }

  protected resolveUserRequest(config: OAuthConfig): Request {
    return new GetUserRequest(config);
  }

  protected createOAuthAuthenticator(
    accessToken: string,
    refreshToken: string | null,
    expiresAt: Date | null,
  ): OAuthAuthenticator {
    return new AccessTokenAuthenticator(accessToken, refreshToken, expiresAt);
  }

  protected createAuthenticatorFromResponse(response: Response, fallbackRefreshToken?: string): OAuthAuthenticator {
    response.throw();

    let payload: unknown;
    try {
      payload = response.json<unknown>();
    } catch (error) {
      throw new InvalidTokenResponseException(
        `The token response is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        response,
      );
    }

    const parsed = tokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new InvalidTokenResponseException(
        `The token response is malformed: ${parsed.error.issues
          .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
          .join('; ')}`,
        response,
      );
    }

    const { access_token: accessToken, refresh_token: refreshToken, expires_in: expiresIn } = parsed.data;
    const expiresAt = expiresIn === null || expiresIn === undefined ? null : new Date(Date.now() + expiresIn * 1000);
    if (expiresAt && Number.isNaN(expiresAt.getTime())) {
      throw new InvalidTokenResponseException('The token response is malformed: expires_in is out of range', response);
    }

    return this.createOAuthAuthenticator(accessToken, refreshToken ?? fallbackRefreshToken ?? null, expiresAt);
  }

  private applyModifiers(request: Request, requestModifier?: RequestModifier): void {
    this.oauthConfig().getRequestModifier()?.(request);
    requestModifier?.(request);
  }
}
