/**
 * PermanentDeliveryError
 *
 * A delivery attempt failed in a way that repeating it will not fix:
 * - 4xx client errors other than 429 (bot blocked by the user, chat not found)
 * - Malformed request or response bodies
 *
 * Like TransientDeliveryError it consumes the slot; it is logged at a
 * different level so operators can spot chats that will never receive messages.
 */
export class PermanentDeliveryError extends Error {
  public constructor(
    message: string,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'PermanentDeliveryError';

    // Maintains proper stack trace for where error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PermanentDeliveryError);
    }
  }
}
