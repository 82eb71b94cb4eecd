import type { DateTime } from 'luxon';
import type { EntitlementState } from '../../../user/domain/value-objects/EntitlementState';

/**
 * The slice of a user record the scheduler reads on every tick.
 *
 * Offset and frequency are passed through as stored, whatever their type: an
 * unset, malformed or out-of-range offset is read as UTC+0 and an unrecognised
 * frequency as "disabled" by the domain services, never rejected.
 */
export interface UserScheduleProfile {
  userId: string;
  chatId: number;
  displayName: string;
  utcOffsetHours: unknown;
  notificationFrequency: unknown;
  entitlement: EntitlementState;
  lastActivityAt: DateTime | null;
}
