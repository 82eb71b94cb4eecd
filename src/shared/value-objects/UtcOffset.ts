import { DateTime, FixedOffsetZone } from 'luxon';
import { InvalidUtcOffsetError } from '../../domain/errors/InvalidUtcOffsetError';
import { TimeOfDay } from './TimeOfDay';

const MINUTES_PER_DAY = 24 * 60;
const HALF_DAY_MINUTES = 12 * 60;

/**
 * UtcOffset value object
 * A user's distance from UTC in whole hours, within the range real zones use (-12..+14)
 */
export class UtcOffset {
  public static readonly MIN_HOURS = -12;
  public static readonly MAX_HOURS = 14;
  public static readonly UTC = new UtcOffset(0);

  public readonly hours: number;

  public constructor(hours: number) {
    if (!UtcOffset.isValid(hours)) {
      throw new InvalidUtcOffsetError(hours);
    }
    this.hours = hours;
  }

  /**
   * Validates that a value is a whole number of hours within -12..+14
   */
  public static isValid(hours: unknown): hours is number {
    return (
      typeof hours === 'number' &&
      Number.isInteger(hours) &&
      hours >= UtcOffset.MIN_HOURS &&
      hours <= UtcOffset.MAX_HOURS
    );
  }

  /**
   * Lenient construction for stored profile data: anything unset, non-integer
   * or out of range becomes UTC+0 instead of raising
   */
  public static orDefault(hours: unknown): UtcOffset {
    return UtcOffset.isValid(hours) ? new UtcOffset(hours) : UtcOffset.UTC;
  }

  /**
   * Derives an offset from the wall-clock time a user reports for "now".
   *
   * The minute difference between the reported time and UTC is wrapped into
   * +/-12 hours (a user ahead by 20h is really 4h behind on the previous day),
   * rounded to whole hours and clamped to the valid range.
   *
   * @example
   * // 14:00 reported while it is 09:00 UTC
   * UtcOffset.fromReportedLocalTime(TimeOfDay.parse('14:00'), DateTime.fromISO('2026-10-19T09:00:00Z'))
   * // => UTC+5
   */
  public static fromReportedLocalTime(reported: TimeOfDay, nowUtc: DateTime): UtcOffset {
    const utc = nowUtc.toUTC();
    let diffMinutes = reported.minuteOfDay - (utc.hour * 60 + utc.minute);

    if (diffMinutes > HALF_DAY_MINUTES) {
      diffMinutes -= MINUTES_PER_DAY;
    } else if (diffMinutes < -HALF_DAY_MINUTES) {
      diffMinutes += MINUTES_PER_DAY;
    }

    const rounded = Math.round(diffMinutes / 60);
    const clamped = Math.max(UtcOffset.MIN_HOURS, Math.min(UtcOffset.MAX_HOURS, rounded));
    // Math.round yields -0 for small negative differences
    return new UtcOffset(clamped === 0 ? 0 : clamped);
  }

  /**
   * Luxon zone for converting instants into this offset's wall-clock time
   */
  public toZone(): FixedOffsetZone {
    return FixedOffsetZone.instance(this.hours * 60);
  }

  /**
   * Display label, e.g. "UTC+5", "UTC-3", "UTC+0"
   */
  public toString(): string {
    return this.hours >= 0 ? `UTC+${this.hours}` : `UTC${this.hours}`;
  }
}
