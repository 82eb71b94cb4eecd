/**
 * EntitlementWriteError
 *
 * Writing an entitlement change back to the account store failed (trial expiry
 * from the scheduler, or an admin upgrade/revoke).
 *
 * For trial expiry the in-memory decision of the current tick still applies
 * (the user is treated as ineligible) and the write is attempted again on the
 * next tick, because the stored state is still TRIAL_ACTIVE.
 */
export class EntitlementWriteError extends Error {
  public constructor(
    public readonly userId: string,
    public readonly targetState: string,
    cause?: unknown
  ) {
    super(
      `Failed to write entitlement ${targetState} for user ${userId}: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      { cause }
    );
    this.name = 'EntitlementWriteError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EntitlementWriteError);
    }
  }
}
