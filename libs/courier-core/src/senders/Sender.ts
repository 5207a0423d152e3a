import type { PendingRequest } from '../PendingRequest';
import type { Response } from '../Response';

/**
 * Performs the actual I/O for a pending request.
 *
 * Implementations reject with a TransportException when no response could be
 * obtained. Any HTTP status, including 4xx and 5xx, resolves to a Response.
 */
export interface Sender {
  send(pendingRequest: PendingRequest): Promise<Response>;
}
