import type { PendingRequest } from '../PendingRequest';
import type { Authenticator } from './Authenticator';

export class TokenAuthenticator implements Authenticator {
  constructor(
    readonly token: string,
    readonly prefix = 'Bearer',
  ) {}

  apply(pendingRequest: PendingRequest): void {
    pendingRequest.headers().add('Authorization', `${this.prefix} ${this.token}`.trim());
  }
}
