import type { PendingRequest } from '../PendingRequest';
import type { Authenticator } from './Authenticator';

export class HeaderAuthenticator implements Authenticator {
  constructor(
    readonly value: string,
    readonly headerName = 'Authorization',
  ) {}

  apply(pendingRequest: PendingRequest): void {
    pendingRequest.headers().add(this.headerName, this.value);
  }
}
