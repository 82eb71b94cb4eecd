/**
 * UserNotFoundError - Application-level error for missing users
 *
 * Thrown when a use case operates on a user id the account store does not know.
 *
 * **HTTP Status:** 404 Not Found
 */
export class UserNotFoundError extends Error {
  public constructor(userId: string) {
    super(`User not found: ${userId}`);
    this.name = 'UserNotFoundError';
    Error.captureStackTrace(this, this.constructor);
  }
}
