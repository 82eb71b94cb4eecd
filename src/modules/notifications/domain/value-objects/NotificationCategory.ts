export enum NotificationCategory {
  EMOTION_REMINDER = 'EMOTION_REMINDER',
  WEEKLY_MOTIVATION = 'WEEKLY_MOTIVATION',
  WEEKLY_REFLECTION = 'WEEKLY_REFLECTION',
  TRIAL_WARNING = 'TRIAL_WARNING',
}
