import type { TimeOfDay } from '../../../../shared/value-objects/TimeOfDay';
import type { DueTrialWarning } from './TrialWarning';

/**
 * Ledger key of one notification
 *
 * | Category          | scopeDate                         | slotKey                             |
 * |-------------------|-----------------------------------|-------------------------------------|
 * | emotion reminder  | user-local date                   | `reminder:HH:mm`                    |
 * | weekly motivation | user-local date of the weekly day | `weekly-motivation:<year>-W<ww>`    |
 * | weekly reflection | user-local date of the weekly day | `weekly-reflection:<year>-W<ww>`    |
 * | trial warning     | UTC date of the trial end         | `trial-warning:<THREE_DAY|ONE_DAY>` |
 *
 * Trial warnings are scoped by the trial end date, so each fires once per
 * trial while still living in a date-scoped ledger. The date is taken in UTC
 * because the user's offset may change during the trial.
 */
export interface DedupKey {
  scopeDate: string;
  slotKey: string;
}

export function reminderKey(localDate: string, slot: TimeOfDay): DedupKey {
  return { scopeDate: localDate, slotKey: `reminder:${slot.toString()}` };
}

interface IsoWeek {
  weekYear: number;
  weekNumber: number;
}

function isoWeekLabel(isoWeek: IsoWeek): string {
  return `${isoWeek.weekYear}-W${String(isoWeek.weekNumber).padStart(2, '0')}`;
}

export function weeklyMotivationKey(localDate: string, isoWeek: IsoWeek): DedupKey {
  return { scopeDate: localDate, slotKey: `weekly-motivation:${isoWeekLabel(isoWeek)}` };
}

export function weeklyReflectionKey(localDate: string, isoWeek: IsoWeek): DedupKey {
  return { scopeDate: localDate, slotKey: `weekly-reflection:${isoWeekLabel(isoWeek)}` };
}

export function trialWarningKey(trialEndUtcDate: string, warning: DueTrialWarning): DedupKey {
  return { scopeDate: trialEndUtcDate, slotKey: `trial-warning:${warning}` };
}
