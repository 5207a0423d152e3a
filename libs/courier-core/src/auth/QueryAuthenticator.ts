import type { PendingRequest } from '../PendingRequest';
import type { Authenticator } from './Authenticator';

/**
 * Sends the credential as a query parameter, e.g. `?api_key=...`.
 */
export class QueryAuthenticator implements Authenticator {
  constructor(
    readonly parameter: string,
    readonly value: string,
  ) {}

  apply(pendingRequest: PendingRequest): void {
    pendingRequest.query().add(this.parameter, this.value);
  }
}
