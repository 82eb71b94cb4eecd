import { ValidationError } from '../../domain/errors/ValidationError';

const TIME_PATTERN = /^(\d{1,2}):(\d{2})$/;

/**
 * TimeOfDay value object
 * A wall-clock time with minute resolution, independent of any date or zone
 */
export class TimeOfDay {
  public readonly hour: number;
  public readonly minute: number;

  public constructor(hour: number, minute: number) {
    if (!Number.isInteger(hour) || hour < 0 || hour > 23) {
      throw new ValidationError(`Hour must be an integer between 0 and 23, got ${hour}`);
    }
    if (!Number.isInteger(minute) || minute < 0 || minute > 59) {
      throw new ValidationError(`Minute must be an integer between 0 and 59, got ${minute}`);
    }
    this.hour = hour;
    this.minute = minute;
  }

  /**
   * Parses "H:MM" or "HH:MM"
   * @throws ValidationError if the value is not a valid wall-clock time
   */
  public static parse(value: string): TimeOfDay {
    const match = TIME_PATTERN.exec(value.trim());
    if (!match || match[1] === undefined || match[2] === undefined) {
      throw new ValidationError(`Time must be in HH:MM format, got "${value}"`);
    }
    return new TimeOfDay(parseInt(match[1], 10), parseInt(match[2], 10));
  }

  public static isValid(value: string): boolean {
    try {
      TimeOfDay.parse(value);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Minutes elapsed since midnight (0-1439)
   */
  public get minuteOfDay(): number {
    return this.hour * 60 + this.minute;
  }

  /**
   * True when this time lies in [start, start + windowMinutes) on the same day
   */
  public isWithinWindow(start: TimeOfDay, windowMinutes: number): boolean {
    const elapsed = this.minuteOfDay - start.minuteOfDay;
    return elapsed >= 0 && elapsed < windowMinutes;
  }

  /**
   * Zero-padded "HH:MM"
   */
  public toString(): string {
    return `${String(this.hour).padStart(2, '0')}:${String(this.minute).padStart(2, '0')}`;
  }
}
