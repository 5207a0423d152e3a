import { z } from 'zod';
import type { PendingRequest } from '../PendingRequest';
import { InvalidArgumentException } from '../errors';
import type { OAuthAuthenticator } from './Authenticator';

const serializedSchema = z.object({
  accessToken: z.string().min(1),
  refreshToken: z.string().nullable(),
  expiresAt: z.string().datetime().nullable(),
});

/**
 * Bearer authenticator carrying an OAuth2 access token.
 *
 * The expiry is stored as an absolute instant so a serialized authenticator
 * can be restored later without recomputing it from `expires_in`.
 */
export class AccessTokenAuthenticator implements OAuthAuthenticator {
  constructor(
    readonly accessToken: string,
    readonly refreshToken: string | null = null,
    readonly expiresAt: Date | null = null,
  ) {}

  apply(pendingRequest: PendingRequest): void {
    pendingRequest.headers().add('Authorization', `Bearer ${this.accessToken}`);
  }

  getAccessToken(): string {
    return this.accessToken;
  }

  getRefreshToken(): string | null {
    return this.refreshToken;
  }

  getExpiresAt(): Date | null {
    return this.expiresAt;
  }

  isRefreshable(): boolean {
    return this.refreshToken !== null;
  }

  isNotRefreshable(): boolean {
    return !this.isRefreshable();
  }

  /**
   * A token without an expiry never expires.
   */
  hasExpired(now: Date = new Date()): boolean {
    if (this.expiresAt === null) {
      return false;
    }
    return this.expiresAt.getTime() <= now.getTime();
  }

  hasNotExpired(now: Date = new Date()): boolean {
    return !this.hasExpired(now);
  }

  serialize(): string {
    return JSON.stringify({
      accessToken: this.accessToken,
      refreshToken: this.refreshToken,
      expiresAt: this.expiresAt?.toISOString() ?? null,
    });
  }

  static unserialize(serialized: string): AccessTokenAuthenticator {
    let raw: unknown;
    try {
      raw = JSON.parse(serialized);
    } catch {
      throw new InvalidArgumentException('The serialized authenticator is not valid JSON.');
    }

    const parsed = serializedSchema.safeParse(raw);
    if (!parsed.success) {
      throw new InvalidArgumentException(
        `The serialized authenticator is malformed: ${parsed.error.issues.map((issue) => issue.message).join(', ')}`,
      );
    }

    const { accessToken, refreshToken, expiresAt } = parsed.data;
    return new AccessTokenAuthenticator(accessToken, refreshToken, expiresAt ? new Date(expiresAt) : null);
  }
}
