/**
 * Base class for errors raised by domain rules (entities, value objects, domain services)
 */
export class DomainError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}
