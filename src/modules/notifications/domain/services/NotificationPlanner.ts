import type { DateTime } from 'luxon';
import type { UserScheduleProfile } from '../../application/types/UserScheduleProfile';
import type { SchedulerConfig } from '../../config/scheduler-config';
import type { SlotTable } from './SlotTable';
import type { TimeOfDay } from '../../../../shared/value-objects/TimeOfDay';
import { localTime, LocalTime } from './LocalClock';
import { NotificationCategory } from '../value-objects/NotificationCategory';
import type { DueTrialWarning } from '../value-objects/TrialWarning';
import {
  DedupKey,
  reminderKey,
  trialWarningKey,
  weeklyMotivationKey,
  weeklyReflectionKey,
} from '../value-objects/DedupKey';
import { EntitlementKind } from '../../../user/domain/value-objects/EntitlementState';
import {
  frequencyOrDisabled,
  NOTIFICATIONS_DISABLED,
} from '../../../user/domain/value-objects/NotificationFrequency';
import { toIsoDate } from '../../../../shared/utils/time';

export type PlannedNotification =
  | { category: NotificationCategory.EMOTION_REMINDER; key: DedupKey; slot: TimeOfDay }
  | { category: NotificationCategory.WEEKLY_MOTIVATION; key: DedupKey; isoWeekNumber: number }
  | { category: NotificationCategory.WEEKLY_REFLECTION; key: DedupKey }
  | { category: NotificationCategory.TRIAL_WARNING; key: DedupKey; warning: DueTrialWarning };

export interface PlanInput {
  profile: UserScheduleProfile;
  now: DateTime;
  /** Eligibility decided once for this user and tick */
  eligible: boolean;
  /** Thresholds the eligibility filter reports as crossed, least urgent first */
  trialWarnings: readonly DueTrialWarning[];
  slotTable: SlotTable;
  config: Pick<
    SchedulerConfig,
    | 'slotMatchWindowMinutes'
    | 'weeklyMotivationWeekday'
    | 'weeklyMotivationTime'
    | 'weeklyReflectionWeekday'
    | 'weeklyReflectionTime'
    | 'quietPeriodMinutes'
  >;
}

export interface NotificationPlan {
  local: LocalTime;
  /** Reminders first, then the weekly messages, then trial warnings (least urgent first) */
  notifications: PlannedNotification[];
  /** true when due reminders were held back by a recent interaction */
  quietPeriodActive: boolean;
}

function isInQuietPeriod(profile: UserScheduleProfile, now: DateTime, quietMinutes: number): boolean {
  if (quietMinutes <= 0 || profile.lastActivityAt === null) {
    return false;
  }
  return now.diff(profile.lastActivityAt, 'minutes').minutes <= quietMinutes;
}

/**
 * Works out what is due for one user at `now`. Pure: ledger checks and
 * delivery are left to the caller.
 */
export function planNotifications(input: PlanInput): NotificationPlan {
  const { profile, now, eligible, trialWarnings, slotTable, config } = input;
  const local = localTime(now, profile.utcOffsetHours);

  if (!eligible) {
    return { local, notifications: [], quietPeriodActive: false };
  }

  const notifications: PlannedNotification[] = [];
  const frequency = frequencyOrDisabled(profile.notificationFrequency);

  const dueSlots = slotTable.matchingSlots(frequency, local.timeOfDay, config.slotMatchWindowMinutes);
  const quietPeriodActive =
    dueSlots.length > 0 && isInQuietPeriod(profile, now, config.quietPeriodMinutes);

  if (!quietPeriodActive) {
    for (const slot of dueSlots) {
      notifications.push({
        category: NotificationCategory.EMOTION_REMINDER,
        key: reminderKey(local.localDate, slot),
        slot,
      });
    }
  }

  const isWeeklyMoment = (weekday: number, time: TimeOfDay): boolean =>
    frequency !== NOTIFICATIONS_DISABLED &&
    local.weekday === weekday &&
    local.timeOfDay.isWithinWindow(time, config.slotMatchWindowMinutes);

  if (isWeeklyMoment(config.weeklyMotivationWeekday, config.weeklyMotivationTime)) {
    notifications.push({
      category: NotificationCategory.WEEKLY_MOTIVATION,
      key: weeklyMotivationKey(local.localDate, local.isoWeek),
      isoWeekNumber: local.isoWeek.weekNumber,
    });
  }

  if (isWeeklyMoment(config.weeklyReflectionWeekday, config.weeklyReflectionTime)) {
    notifications.push({
      category: NotificationCategory.WEEKLY_REFLECTION,
      key: weeklyReflectionKey(local.localDate, local.isoWeek),
    });
  }

  if (profile.entitlement.kind === EntitlementKind.TRIAL_ACTIVE) {
    // UTC, so a later offset change cannot move the key
    const trialEndDate = toIsoDate(profile.entitlement.trialEndsAt.toUTC());
    for (const warning of trialWarnings) {
      notifications.push({
        category: NotificationCategory.TRIAL_WARNING,
        key: trialWarningKey(trialEndDate, warning),
        warning,
      });
    }
  }

  return { local, notifications, quietPeriodActive };
}
