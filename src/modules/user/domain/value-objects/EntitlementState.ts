import { DateTime } from 'luxon';
import { InvalidStateTransitionError } from '../../../../domain/errors/InvalidStateTransitionError';

/**
 * EntitlementKind enum
 * What a user is currently allowed to receive
 */
export enum EntitlementKind {
  PREMIUM = 'PREMIUM',
  TRIAL_ACTIVE = 'TRIAL_ACTIVE',
  TRIAL_EXPIRED = 'TRIAL_EXPIRED',
  NO_TRIAL = 'NO_TRIAL',
}

/**
 * EntitlementState
 *
 * Tagged value over EntitlementKind. PREMIUM and TRIAL_EXPIRED remember the
 * trial end (if there ever was a trial) so revoking premium can fall back to
 * the state the trial alone would give.
 */
export type EntitlementState =
  | { readonly kind: EntitlementKind.PREMIUM; readonly trialEndsAt: DateTime | null }
  | { readonly kind: EntitlementKind.TRIAL_ACTIVE; readonly trialEndsAt: DateTime }
  | { readonly kind: EntitlementKind.TRIAL_EXPIRED; readonly trialEndsAt: DateTime }
  | { readonly kind: EntitlementKind.NO_TRIAL };

/**
 * Valid state transitions mapping
 * NO_TRIAL → TRIAL_ACTIVE → TRIAL_EXPIRED is driven by registration and the clock.
 * Every state can be upgraded to PREMIUM; PREMIUM falls back to a trial-derived state on revoke.
 */
const VALID_TRANSITIONS: Record<EntitlementKind, EntitlementKind[]> = {
  [EntitlementKind.NO_TRIAL]: [EntitlementKind.TRIAL_ACTIVE, EntitlementKind.PREMIUM],
  [EntitlementKind.TRIAL_ACTIVE]: [EntitlementKind.TRIAL_EXPIRED, EntitlementKind.PREMIUM],
  [EntitlementKind.TRIAL_EXPIRED]: [EntitlementKind.PREMIUM],
  [EntitlementKind.PREMIUM]: [
    EntitlementKind.TRIAL_ACTIVE,
    EntitlementKind.TRIAL_EXPIRED,
    EntitlementKind.NO_TRIAL,
  ],
};

/**
 * Validates if a transition is allowed by the state machine
 */
export function isValidTransition(from: EntitlementKind, to: EntitlementKind): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/**
 * Validates and enforces a transition
 * Throws InvalidStateTransitionError if the transition is invalid
 */
export function validateTransition(from: EntitlementKind, to: EntitlementKind): void {
  if (!isValidTransition(from, to)) {
    throw new InvalidStateTransitionError(from, to);
  }
}

export function noTrial(): EntitlementState {
  return { kind: EntitlementKind.NO_TRIAL };
}

/**
 * Trial end instant carried by the state, or null when there never was a trial
 */
export function trialEndOf(state: EntitlementState): DateTime | null {
  return state.kind === EntitlementKind.NO_TRIAL ? null : state.trialEndsAt;
}

/**
 * Starts the trial at registration completion
 * @throws InvalidStateTransitionError unless the user has no trial yet
 */
export function startTrial(
  state: EntitlementState,
  now: DateTime,
  durationDays: number
): EntitlementState {
  validateTransition(state.kind, EntitlementKind.TRIAL_ACTIVE);
  return { kind: EntitlementKind.TRIAL_ACTIVE, trialEndsAt: now.plus({ days: durationDays }) };
}

/**
 * Marks an active trial as expired. Expiring an already expired trial is a no-op.
 * @throws InvalidStateTransitionError for PREMIUM and NO_TRIAL
 */
export function expireTrial(state: EntitlementState): EntitlementState {
  if (state.kind === EntitlementKind.TRIAL_EXPIRED) {
    return state;
  }
  if (state.kind !== EntitlementKind.TRIAL_ACTIVE) {
    throw new InvalidStateTransitionError(state.kind, EntitlementKind.TRIAL_EXPIRED);
  }
  return { kind: EntitlementKind.TRIAL_EXPIRED, trialEndsAt: state.trialEndsAt };
}

/**
 * Administrative upgrade. Granting premium to a premium user is a no-op.
 */
export function grantPremium(state: EntitlementState): EntitlementState {
  if (state.kind === EntitlementKind.PREMIUM) {
    return state;
  }
  validateTransition(state.kind, EntitlementKind.PREMIUM);
  return { kind: EntitlementKind.PREMIUM, trialEndsAt: trialEndOf(state) };
}

/**
 * Administrative revoke: falls back to what the remembered trial alone gives at `now`
 * @throws InvalidStateTransitionError when the user is not premium
 */
export function revokePremium(state: EntitlementState, now: DateTime): EntitlementState {
  const trialEndsAt = trialEndOf(state);

  let target: EntitlementState;
  if (trialEndsAt === null) {
    target = noTrial();
  } else if (now < trialEndsAt) {
    target = { kind: EntitlementKind.TRIAL_ACTIVE, trialEndsAt };
  } else {
    target = { kind: EntitlementKind.TRIAL_EXPIRED, trialEndsAt };
  }

  validateTransition(state.kind, target.kind);
  return target;
}

/**
 * Whole days left until the trial ends (0 once reached), or null outside an active trial
 */
export function daysRemaining(state: EntitlementState, now: DateTime): number | null {
  if (state.kind !== EntitlementKind.TRIAL_ACTIVE) {
    return null;
  }
  const days = state.trialEndsAt.diff(now, 'days').days;
  return days <= 0 ? 0 : Math.floor(days);
}

/**
 * Checks if two states are equal (same kind and same trial end instant)
 */
export function entitlementEquals(a: EntitlementState, b: EntitlementState): boolean {
  if (a.kind !== b.kind) {
    return false;
  }
  const endA = trialEndOf(a);
  const endB = trialEndOf(b);
  if (endA === null || endB === null) {
    return endA === endB;
  }
  return endA.toMillis() === endB.toMillis();
}
