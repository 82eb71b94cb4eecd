/**
 * Message Templates
 *
 * Static texts of every notification. `{name}` is replaced with the user's
 * display name by MessageComposer.
 */

/**
 * Greeting per local-time band; `fromHour` inclusive, `toHour` exclusive.
 * Hours outside every band use FALLBACK_GREETING.
 */
export const GREETING_BANDS = [
  { fromHour: 6, toHour: 12, greeting: 'Good morning', prompt: 'How has your day started?' },
  { fromHour: 12, toHour: 17, greeting: 'Good afternoon', prompt: 'How is the middle of your day going?' },
  { fromHour: 17, toHour: 22, greeting: 'Good evening', prompt: 'How was your day?' },
] as const;

export const FALLBACK_GREETING = { greeting: 'Hi', prompt: 'How are you feeling?' } as const;

export const REMINDER_TEMPLATE =
  '{greeting}, {name}! 🌟\n\n' +
  'Time for your emotion diary. {prompt}\n\n' +
  "Tap 'Emotion diary' in the main menu to note how you feel.\n\n" +
  '💡 Tracking your emotions helps you understand yourself better.';

/**
 * Rotated by ISO week number
 */
export const WEEKLY_MOTIVATION_TEMPLATES = [
  'Hi, {name}! 🌈\n\nAnother week of keeping your emotion diary. Every step towards understanding yourself counts! 💪',
  '{name}, you are doing important work! 🌟\n\nNoticing your emotions is a skill that helps you understand and steer how you feel.',
  'Hi, {name}! 🦋\n\nChange happens gradually. Every diary entry is an investment in your wellbeing.',
  "{name}, there are no 'right' or 'wrong' emotions! 💝\n\nEvery feeling matters. Keep observing yourself with kindness.",
  'Hi, {name}! 🌱\n\nYou grow a little every day, and your diary lets you see it. Keep going!',
] as const;

export const WEEKLY_REFLECTION_TEMPLATE =
  'Hi, {name}! 🌟\n\n' +
  'Sunday evening is a good time for a weekly reflection!\n\n' +
  'Look back at the good moments of this week and at what brought you joy and gratitude.';

export const TRIAL_WARNING_TEMPLATES = {
  THREE_DAY:
    'Trial reminder\n\n' +
    '{name}, your free trial ends in 3 days.\n\n' +
    'After that, access to the diary features will be limited. ' +
    'Consider subscribing to keep using everything without interruption.',
  ONE_DAY:
    'Last day of your trial\n\n' +
    '{name}, your free trial ends tomorrow.\n\n' +
    "Don't lose your progress: subscribe today to keep your diary going.",
} as const;
