import type { EntitlementState } from '../../../user/domain/value-objects/EntitlementState';
import type { UserScheduleProfile } from '../types/UserScheduleProfile';

/**
 * Port to the account store, as seen by the scheduler.
 *
 * Settings changes made through the HTTP surface land in the same store and
 * are picked up on the next `listActiveScheduleProfiles` call.
 */
/* eslint-disable @typescript-eslint/naming-convention */
export interface IScheduleProfileSource {
  /**
   * Users that can still receive something: premium users and users in an active trial.
   */
  listActiveScheduleProfiles(): Promise<UserScheduleProfile[]>;

  /**
   * Overwrites a user's entitlement. Used for trial expiry and admin upgrades.
   *
   * @throws UserNotFoundError if the user does not exist
   */
  updateEntitlement(userId: string, newState: EntitlementState): Promise<void>;
}
