import { Duration, type DateTime } from 'luxon';
import type { IScheduleProfileSource } from '../../application/ports/IScheduleProfileSource';
import type { UserScheduleProfile } from '../../application/types/UserScheduleProfile';
import {
  EntitlementKind,
  EntitlementState,
  expireTrial,
} from '../../../user/domain/value-objects/EntitlementState';
import { DueTrialWarning, TrialWarning } from '../value-objects/TrialWarning';
import { EntitlementWriteError } from '../../../../domain/errors/EntitlementWriteError';
import { logger } from '../../../../shared/logger';
import { errorFields } from '../../../../shared/utils/errors';

export enum IneligibleReason {
  TRIAL_EXPIRED = 'TRIAL_EXPIRED',
  NO_TRIAL = 'NO_TRIAL',
}

export type EligibilityDecision =
  | { eligible: true }
  | { eligible: false; reason: IneligibleReason };

const THREE_DAYS = Duration.fromObject({ days: 3 });
const ONE_DAY = Duration.fromObject({ days: 1 });

/**
 * Every warning threshold the remaining trial time has crossed, least urgent first.
 * Empty outside an active, not yet ended trial.
 */
export function trialWarningsDue(entitlement: EntitlementState, now: DateTime): DueTrialWarning[] {
  if (entitlement.kind !== EntitlementKind.TRIAL_ACTIVE || now >= entitlement.trialEndsAt) {
    return [];
  }

  const remaining = entitlement.trialEndsAt.diff(now).toMillis();
  const due: DueTrialWarning[] = [];
  if (remaining <= THREE_DAYS.toMillis()) {
    due.push(TrialWarning.THREE_DAY);
  }
  if (remaining <= ONE_DAY.toMillis()) {
    due.push(TrialWarning.ONE_DAY);
  }
  return due;
}

/**
 * The most urgent crossed threshold, or NONE
 */
export function trialWarningDue(entitlement: EntitlementState, now: DateTime): TrialWarning {
  const due = trialWarningsDue(entitlement, now);
  return due[due.length - 1] ?? TrialWarning.NONE;
}

/**
 * EligibilityFilter - decides whether a user may receive notifications right now
 *
 * **Rules:**
 * 1. PREMIUM → eligible
 * 2. TRIAL_ACTIVE before the trial end → eligible
 * 3. TRIAL_ACTIVE at or after the trial end → TRIAL_EXPIRED is written back once, ineligible
 * 4. TRIAL_EXPIRED / NO_TRIAL → ineligible, nothing written
 *
 * **Write-back failures:**
 * A failed expiry write is logged as EntitlementWriteError and the decision
 * stays "ineligible". The stored state is still TRIAL_ACTIVE, so the next
 * tick attempts the write again.
 */
export class EligibilityFilter {
  public constructor(
    private readonly profileSource: Pick<IScheduleProfileSource, 'updateEntitlement'>
  ) {}

  public async isEligible(profile: UserScheduleProfile, now: DateTime): Promise<EligibilityDecision> {
    const { entitlement } = profile;

    switch (entitlement.kind) {
      case EntitlementKind.PREMIUM:
        return { eligible: true };
      case EntitlementKind.TRIAL_ACTIVE:
        if (now < entitlement.trialEndsAt) {
          return { eligible: true };
        }
        await this.writeTrialExpiry(profile.userId, entitlement);
        return { eligible: false, reason: IneligibleReason.TRIAL_EXPIRED };
      case EntitlementKind.TRIAL_EXPIRED:
        return { eligible: false, reason: IneligibleReason.TRIAL_EXPIRED };
      case EntitlementKind.NO_TRIAL:
        return { eligible: false, reason: IneligibleReason.NO_TRIAL };
    }
  }

  /**
   * Trial warnings the profile has crossed, least urgent first
   */
  public warningsDue(profile: UserScheduleProfile, now: DateTime): DueTrialWarning[] {
    return trialWarningsDue(profile.entitlement, now);
  }

  private async writeTrialExpiry(
    userId: string,
    entitlement: Extract<EntitlementState, { kind: EntitlementKind.TRIAL_ACTIVE }>
  ): Promise<void> {
    const expired = expireTrial(entitlement);

    try {
      await this.profileSource.updateEntitlement(userId, expired);
      logger.info({
        msg: 'Trial expired',
        userId,
        trialEndsAt: entitlement.trialEndsAt.toISO(),
      });
    } catch (error) {
      const writeError = new EntitlementWriteError(userId, expired.kind, error);
      logger.error({
        msg: 'Failed to write trial expiry, will retry next tick',
        userId,
        targetState: expired.kind,
        ...errorFields(writeError),
      });
    }
  }
}
