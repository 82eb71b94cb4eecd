/**
 * Reminders per day a user can choose; 0 disables reminders
 */
export const NOTIFICATION_FREQUENCIES = [0, 1, 2, 4, 6] as const;

export type NotificationFrequency = (typeof NOTIFICATION_FREQUENCIES)[number];

export const NOTIFICATIONS_DISABLED: NotificationFrequency = 0;

export function isNotificationFrequency(value: unknown): value is NotificationFrequency {
  return NOTIFICATION_FREQUENCIES.some((frequency) => frequency === value);
}

/**
 * Stored values outside the recognised set are treated as disabled
 */
export function frequencyOrDisabled(value: unknown): NotificationFrequency {
  return isNotificationFrequency(value) ? value : NOTIFICATIONS_DISABLED;
}
