import type { PendingRequest } from '../PendingRequest';
import type { Authenticator } from './Authenticator';

export class BasicAuthenticator implements Authenticator {
  constructor(
    readonly username: string,
    readonly password: string,
  ) {}

  apply(pendingRequest: PendingRequest): void {
    const credentials = Buffer.from(`${this.username}:${this.password}`).toString('base64');
    pendingRequest.headers().add('Authorization', `Basic ${credentials}`);
  }
}
