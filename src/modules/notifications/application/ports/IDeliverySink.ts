import type { NotificationEvent } from '../types/NotificationEvent';

export type DeliveryOutcome =
  | { status: 'DELIVERED' }
  | { status: 'FAILED'; reason: string; retryable: boolean };

/**
 * Port for handing a message to the messaging transport.
 *
 * Implementations report failures through the outcome rather than throwing;
 * a thrown error is treated like a retryable failure by the caller.
 * `signal` aborts once the caller has given up on the attempt.
 */
/* eslint-disable @typescript-eslint/naming-convention */
export interface IDeliverySink {
  send(event: NotificationEvent, signal?: AbortSignal): Promise<DeliveryOutcome>;
}
