import type { DateTime } from 'luxon';
import { TimeOfDay } from '../../../../shared/value-objects/TimeOfDay';
import { UtcOffset } from '../../../../shared/value-objects/UtcOffset';

/**
 * Offset from a settings payload: an explicit offset wins, a reported local
 * time is converted against `now`, and neither leaves it undefined.
 */
export function resolveUtcOffset(
  settings: { utcOffset?: number; reportedLocalTime?: string },
  now: DateTime
): UtcOffset | undefined {
  if (settings.utcOffset !== undefined) {
    return new UtcOffset(settings.utcOffset);
  }
  if (settings.reportedLocalTime !== undefined) {
    return UtcOffset.fromReportedLocalTime(TimeOfDay.parse(settings.reportedLocalTime), now);
  }
  return undefined;
}
