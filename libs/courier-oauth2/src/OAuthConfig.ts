import { z } from 'zod';
import { OAuthConfigValidationException } from '@courier-http/core';
import type { Request } from '@courier-http/core';

/**
 * Hook applied to every request the OAuth2 flow sends (token exchange,
 * refresh and user lookup) before the per-call modifier.
 */
export type RequestModifier = (request: Request) => void;

const oauthConfigSchema = z.object({
  clientId: z.string().min(1, 'clientId is required'),
  clientSecret: z.string().min(1, 'clientSecret is required'),
  redirectUri: z.string().min(1, 'redirectUri is required'),
  authorizeEndpoint: z.string().min(1, 'authorizeEndpoint is required'),
  tokenEndpoint: z.string().min(1, 'tokenEndpoint is required'),
  userEndpoint: z.string().min(1, 'userEndpoint is required'),
  defaultScopes: z.array(z.string()),
});

/**
 * Client credentials and endpoints for the authorization-code grant.
 *
 * Endpoints are resolved against the connector's base URL unless absolute.
 */
export class OAuthConfig {
  private clientId = '';
  private clientSecret = '';
  private redirectUri = '';
  private authorizeEndpoint = 'authorize';
  private tokenEndpoint = 'token';
  private userEndpoint = 'user';
  private defaultScopes: string[] = [];
  private requestModifier?: RequestModifier;

  static make(): OAuthConfig {
    return new OAuthConfig();
  }

  setClientId(clientId: string): this {
    this.clientId = clientId;
    return this;
  }

  getClientId(): string {
    return this.clientId;
  }

  setClientSecret(clientSecret: string): this {
    this.clientSecret = clientSecret;
    return this;
  }

  getClientSecret(): string {
    return this.clientSecret;
  }

  setRedirectUri(redirectUri: string): this {
    this.redirectUri = redirectUri;
    return this;
  }

  getRedirectUri(): string {
    return this.redirectUri;
  }

  setAuthorizeEndpoint(endpoint: string): this {
    this.authorizeEndpoint = endpoint;
    return this;
  }

  getAuthorizeEndpoint(): string {
    return this.authorizeEndpoint;
  }

  setTokenEndpoint(endpoint: string): this {
    this.tokenEndpoint = endpoint;
    return this;
  }

  getTokenEndpoint(): string {
    return this.tokenEndpoint;
  }

  setUserEndpoint(endpoint: string): this {
    this.userEndpoint = endpoint;
    return this;
  }

  getUserEndpoint(): string {
    return this.userEndpoint;
  }

  setDefaultScopes(scopes: string[]): this {
    this.defaultScopes = [...scopes];
    return this;
  }

  getDefaultScopes(): string[] {
    return [...this.defaultScopes];
  }

  setRequestModifier(modifier: RequestModifier): this {
    this.requestModifier = modifier;
    return this;
  }

  getRequestModifier(): RequestModifier | undefined {
    return this.requestModifier;
  }

  /**
   * @throws OAuthConfigValidationException listing every missing field
   */
  validate(): true {
    const result = oauthConfigSchema.safeParse({
      clientId: this.clientId,
      clientSecret: this.clientSecret,
      redirectUri: this.redirectUri,
      authorizeEndpoint: this.authorizeEndpoint,
      tokenEndpoint: this.tokenEndpoint,
      userEndpoint: this.userEndpoint,
      defaultScopes: this.defaultScopes,
    });
    if (!result.success) {
      throw new OAuthConfigValidationException(result.error.issues.map((issue) => issue.message));
    }
    return true;
  }
}
