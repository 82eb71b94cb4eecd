/**
 * Thrown when registration is completed twice for the same chat
 *
 * **HTTP Status:** 409 Conflict
 */
export class UserAlreadyRegisteredError extends Error {
  public constructor(chatId: number) {
    super(`A user is already registered for chat ${chatId}`);
    this.name = 'UserAlreadyRegisteredError';
    Error.captureStackTrace(this, this.constructor);
  }
}
