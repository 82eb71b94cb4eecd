import { DomainError } from './DomainError';

/**
 * Thrown when input or configuration fails validation
 */
export class ValidationError extends DomainError {
  public readonly details?: unknown;

  public constructor(message: string, details?: unknown) {
    super(message);
    this.details = details;
  }
}
