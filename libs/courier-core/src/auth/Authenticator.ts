import type { PendingRequest } from '../PendingRequest';

/**
 * Injects credentials into a pending request.
 *
 * `apply` runs exactly once per build, after the connector and request
 * properties are merged and before the boot hooks. Implementations overwrite
 * rather than append, so a second call leaves the request unchanged.
 */
export interface Authenticator {
  apply(pendingRequest: PendingRequest): void;
}

/**
 * Shape of the authenticators produced by the OAuth2 flow.
 */
export interface OAuthAuthenticator extends Authenticator {
  getAccessToken(): string;
  getRefreshToken(): string | null;
  getExpiresAt(): Date | null;
  isRefreshable(): boolean;
  hasExpired(now?: Date): boolean;
  hasNotExpired(now?: Date): boolean;
}
