import { TimeOfDay } from '../../../../shared/value-objects/TimeOfDay';
import {
  ACTIVE_FREQUENCIES,
  DEFAULT_NOTIFICATION_SLOTS,
  SlotTableConfig,
} from '../../config/notification-slots';

/**
 * Slot table
 *
 * Maps a reminder frequency to its ordered local time-of-day slots. Only the
 * frequencies 1, 2, 4 and 6 have slots; anything else (0 included) maps to none.
 */
export class SlotTable {
  private readonly slotsByFrequency: ReadonlyMap<number, readonly TimeOfDay[]>;

  /**
   * @param config - Slot strings per frequency (defaults to DEFAULT_NOTIFICATION_SLOTS)
   * @throws ValidationError if a slot is not a valid HH:MM time
   */
  public constructor(config: SlotTableConfig = DEFAULT_NOTIFICATION_SLOTS) {
    const entries = ACTIVE_FREQUENCIES.map((frequency): [number, readonly TimeOfDay[]] => [
      frequency,
      config[frequency]
        .map((slot) => TimeOfDay.parse(slot))
        .sort((a, b) => a.minuteOfDay - b.minuteOfDay),
    ]);
    this.slotsByFrequency = new Map(entries);
  }

  public slotsFor(frequency: number): readonly TimeOfDay[] {
    return this.slotsByFrequency.get(frequency) ?? [];
  }

  /**
   * Slots of `frequency` whose window [slot, slot + windowMinutes) contains `time`
   */
  public matchingSlots(frequency: number, time: TimeOfDay, windowMinutes: number): TimeOfDay[] {
    return this.slotsFor(frequency).filter((slot) => time.isWithinWindow(slot, windowMinutes));
  }
}
