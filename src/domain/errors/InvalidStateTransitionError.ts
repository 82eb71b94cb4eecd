import { DomainError } from './DomainError';

/**
 * Thrown when an entitlement transition is not allowed by the state machine
 */
export class InvalidStateTransitionError extends DomainError {
  public readonly from: string;
  public readonly to: string;

  public constructor(from: string, to: string) {
    super(`Invalid entitlement transition from ${from} to ${to}`);
    this.from = from;
    this.to = to;
  }
}
