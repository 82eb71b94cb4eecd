import { DomainError } from './DomainError';

/**
 * Thrown when a UTC offset outside -12..+14 whole hours is supplied explicitly
 * (settings input). Stored profiles never raise it: the scheduler defaults bad offsets to 0.
 */
export class InvalidUtcOffsetError extends DomainError {
  public constructor(offset: unknown) {
    super(`Invalid UTC offset: ${String(offset)}. Must be a whole number of hours between -12 and 14.`);
  }
}
