import type { UserScheduleProfile } from '../../application/types/UserScheduleProfile';
import type { NotificationEvent } from '../../application/types/NotificationEvent';
import type { PlannedNotification } from './NotificationPlanner';
import type { LocalTime } from './LocalClock';
import { NotificationCategory } from '../value-objects/NotificationCategory';
import {
  FALLBACK_GREETING,
  GREETING_BANDS,
  REMINDER_TEMPLATE,
  TRIAL_WARNING_TEMPLATES,
  WEEKLY_MOTIVATION_TEMPLATES,
  WEEKLY_REFLECTION_TEMPLATE,
} from '../../config/message-templates';

export interface MessageTemplates {
  greetingBands: ReadonlyArray<{ fromHour: number; toHour: number; greeting: string; prompt: string }>;
  fallbackGreeting: { greeting: string; prompt: string };
  reminder: string;
  weeklyMotivations: readonly string[];
  weeklyReflection: string;
  trialWarnings: { THREE_DAY: string; ONE_DAY: string };
}

export const DEFAULT_MESSAGE_TEMPLATES: MessageTemplates = {
  greetingBands: GREETING_BANDS,
  fallbackGreeting: FALLBACK_GREETING,
  reminder: REMINDER_TEMPLATE,
  weeklyMotivations: WEEKLY_MOTIVATION_TEMPLATES,
  weeklyReflection: WEEKLY_REFLECTION_TEMPLATE,
  trialWarnings: TRIAL_WARNING_TEMPLATES,
};

function fill(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder, key: string) => values[key] ?? placeholder);
}

/**
 * Turns a planned notification into the message a user receives
 */
export class MessageComposer {
  public constructor(private readonly templates: MessageTemplates = DEFAULT_MESSAGE_TEMPLATES) {}

  public compose(
    planned: PlannedNotification,
    profile: UserScheduleProfile,
    local: LocalTime
  ): NotificationEvent {
    return {
      userId: profile.userId,
      chatId: profile.chatId,
      category: planned.category,
      body: this.body(planned, profile.displayName, local),
    };
  }

  /**
   * Greeting and prompt for the band containing `hour`
   */
  public greetingFor(hour: number): { greeting: string; prompt: string } {
    const band = this.templates.greetingBands.find(
      (candidate) => hour >= candidate.fromHour && hour < candidate.toHour
    );
    return band ?? this.templates.fallbackGreeting;
  }

  /**
   * Weekly message for an ISO week number; the list rotates week by week
   */
  public weeklyMotivationFor(weekNumber: number): string {
    const list = this.templates.weeklyMotivations;
    return list[weekNumber % list.length] ?? '';
  }

  private body(planned: PlannedNotification, name: string, local: LocalTime): string {
    switch (planned.category) {
      case NotificationCategory.EMOTION_REMINDER: {
        const { greeting, prompt } = this.greetingFor(local.timeOfDay.hour);
        return fill(this.templates.reminder, { greeting, prompt, name });
      }
      case NotificationCategory.WEEKLY_MOTIVATION:
        return fill(this.weeklyMotivationFor(planned.isoWeekNumber), { name });
      case NotificationCategory.WEEKLY_REFLECTION:
        return fill(this.templates.weeklyReflection, { name });
      case NotificationCategory.TRIAL_WARNING:
        return fill(this.templates.trialWarnings[planned.warning], { name });
    }
  }
}
