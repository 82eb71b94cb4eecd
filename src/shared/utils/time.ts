import { DateTime } from 'luxon';

const STORAGE_FORMAT = "yyyy-MM-dd'T'HH:mm:ss.SSS'Z'";

/**
 * UTC timestamp string as stored in SQLite. Sorts lexicographically in time order.
 */
export function toStorageTimestamp(instant: DateTime): string {
  return instant.toUTC().toFormat(STORAGE_FORMAT);
}

/**
 * Parses a stored timestamp back into a UTC DateTime
 * @throws Error if the value is not an ISO-8601 timestamp
 */
export function fromStorageTimestamp(value: string): DateTime {
  const parsed = DateTime.fromISO(value, { zone: 'utc' });
  if (!parsed.isValid) {
    throw new Error(`Invalid stored timestamp: ${value}`);
  }
  return parsed;
}

export function fromNullableStorageTimestamp(value: string | null): DateTime | null {
  return value === null ? null : fromStorageTimestamp(value);
}

/**
 * Calendar date (yyyy-MM-dd) of an instant in its own zone
 */
export function toIsoDate(instant: DateTime): string {
  return instant.toFormat('yyyy-MM-dd');
}

/**
 * Source of "now". Injected so tests can pin the instant.
 */
export type Clock = () => DateTime;

export const systemClock: Clock = () => DateTime.utc();
