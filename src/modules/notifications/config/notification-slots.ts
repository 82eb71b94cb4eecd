import fs from 'fs';
import { z } from 'zod';
import { logger } from '../../../shared/logger';
import { errorFields } from '../../../shared/utils/errors';
import { TimeOfDay } from '../../../shared/value-objects/TimeOfDay';

/**
 * Notification Slot Configuration
 *
 * Local wall-clock times at which emotion-diary reminders go out, per chosen
 * frequency. Code constants by default; a deployment can replace them with a
 * JSON file (NOTIFICATION_SLOTS_FILE) of the same shape:
 *
 * ```json
 * { "1": ["16:00"], "2": ["12:00", "17:00"], "4": [...], "6": [...] }
 * ```
 */

export const ACTIVE_FREQUENCIES = [1, 2, 4, 6] as const;

export type ActiveFrequency = (typeof ACTIVE_FREQUENCIES)[number];

export type SlotTableConfig = Readonly<Record<ActiveFrequency, readonly string[]>>;

/**
 * Default slots
 *
 * Single reminders land mid-afternoon; more frequent ones spread between
 * late morning and evening, never at night.
 */
export const DEFAULT_NOTIFICATION_SLOTS: SlotTableConfig = {
  1: ['16:00'],
  2: ['12:00', '17:00'],
  4: ['12:00', '15:00', '17:00', '20:00'],
  6: ['11:00', '13:00', '15:00', '17:00', '19:00', '21:00'],
};

/**
 * "9:00" and "09:00" are the same slot
 */
function normalizeSlot(slot: string): string {
  return TimeOfDay.isValid(slot) ? TimeOfDay.parse(slot).toString() : slot;
}

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
const SlotListSchema = z
  .array(z.string().refine((slot) => TimeOfDay.isValid(slot), 'Slot must be in HH:MM format'))
  .refine((slots) => new Set(slots.map(normalizeSlot)).size === slots.length, 'Slots must be distinct');

/**
 * Shape of a slot table file: exactly the four recognised frequencies,
 * each with as many distinct slots as the frequency says
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const SlotTableFileSchema = z
  .object({
    '1': SlotListSchema,
    '2': SlotListSchema,
    '4': SlotListSchema,
    '6': SlotListSchema,
  })
  .strict()
  .superRefine((table, ctx) => {
    for (const frequency of ACTIVE_FREQUENCIES) {
      const slots = table[`${frequency}` as const];
      // Missing keys are already reported by the object schema
      if (Array.isArray(slots) && slots.length !== frequency) {
        ctx.addIssue({
          code: 'custom',
          path: [`${frequency}`],
          message: `Frequency ${frequency} needs exactly ${frequency} slots, got ${slots.length}`,
        });
      }
    }
  });

/**
 * Validates a parsed slot table document
 * @throws ZodError describing every problem
 */
export function parseSlotTableConfig(document: unknown): SlotTableConfig {
  const table = SlotTableFileSchema.parse(document);
  return { 1: table['1'], 2: table['2'], 4: table['4'], 6: table['6'] };
}

/**
 * Loads the slot table
 *
 * **Fallback Behavior:**
 * - No file configured → defaults
 * - Unreadable file, invalid JSON or invalid table → warning logged, defaults
 * This keeps a typo in the file from stopping the scheduler.
 *
 * @param filePath - Optional JSON file path (NOTIFICATION_SLOTS_FILE)
 */
export function loadSlotTableConfig(filePath?: string): SlotTableConfig {
  if (!filePath) {
    return DEFAULT_NOTIFICATION_SLOTS;
  }

  try {
    const document: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    const table = parseSlotTableConfig(document);
    logger.info({ msg: 'Loaded notification slot table', filePath });
    return table;
  } catch (error) {
    logger.warn({
      msg: 'Invalid notification slot table, using defaults',
      filePath,
      ...errorFields(error),
    });
    return DEFAULT_NOTIFICATION_SLOTS;
  }
}
