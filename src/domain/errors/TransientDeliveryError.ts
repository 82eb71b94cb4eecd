/**
 * TransientDeliveryError
 *
 * A delivery attempt failed for a reason that could go away on its own:
 * - 429 Too Many Requests from the messaging API
 * - 5xx responses
 * - Network errors and timeouts
 *
 * The scheduler still marks the slot as consumed. The next occurrence of the
 * slot (next day, or never for one-off warnings) is the retry point.
 */
export class TransientDeliveryError extends Error {
  public constructor(
    message: string,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'TransientDeliveryError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * A send did not settle within the delivery timeout. Counted as a transient failure.
 */
export class DeliveryTimeoutError extends TransientDeliveryError {
  public constructor(timeoutMs: number) {
    super(`Delivery timed out after ${timeoutMs}ms`);
    this.name = 'DeliveryTimeoutError';
  }
}
