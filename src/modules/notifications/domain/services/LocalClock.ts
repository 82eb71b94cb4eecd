import type { DateTime } from 'luxon';
import { TimeOfDay } from '../../../../shared/value-objects/TimeOfDay';
import { UtcOffset } from '../../../../shared/value-objects/UtcOffset';
import { toIsoDate } from '../../../../shared/utils/time';

/**
 * A reference instant as seen on a user's wall clock
 */
export interface LocalTime {
  /** yyyy-MM-dd */
  localDate: string;
  timeOfDay: TimeOfDay;
  /** ISO weekday, 1 = Monday ... 7 = Sunday */
  weekday: number;
  isoWeek: { weekYear: number; weekNumber: number };
  offset: UtcOffset;
}

/**
 * Timezone resolver
 *
 * Pure and total: an unset, fractional or out-of-range offset resolves as
 * UTC+0 rather than failing, so one bad profile cannot stop a tick.
 *
 * @param referenceInstant - The tick instant (any zone)
 * @param utcOffsetHours - Stored offset, possibly null or invalid
 */
export function localTime(referenceInstant: DateTime, utcOffsetHours: unknown): LocalTime {
  const offset = UtcOffset.orDefault(utcOffsetHours);
  const local = referenceInstant.setZone(offset.toZone());

  return {
    localDate: toIsoDate(local),
    timeOfDay: new TimeOfDay(local.hour, local.minute),
    weekday: local.weekday,
    isoWeek: { weekYear: local.weekYear, weekNumber: local.weekNumber },
    offset,
  };
}
