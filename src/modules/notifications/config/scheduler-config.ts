import type { AppConfig } from '../../../shared/config/env';
import { TimeOfDay } from '../../../shared/value-objects/TimeOfDay';

/**
 * Tunables of the notification scheduler
 */
export interface SchedulerConfig {
  /** Minimum spacing between ticks; ticks are aligned to this boundary */
  tickIntervalMs: number;
  /** Pause after each delivery attempt, to stay under transport rate limits */
  sendDelayMs: number;
  /** Upper bound for a single delivery attempt */
  deliveryTimeoutMs: number;
  /** A slot matches when local time lies in [slot, slot + window) */
  slotMatchWindowMinutes: number;
  /** ISO weekday (1 = Monday ... 7 = Sunday) of the weekly motivation */
  weeklyMotivationWeekday: number;
  weeklyMotivationTime: TimeOfDay;
  /** ISO weekday of the weekly reflection prompt */
  weeklyReflectionWeekday: number;
  weeklyReflectionTime: TimeOfDay;
  /** Reminders are held back this long after a user interaction; 0 disables */
  quietPeriodMinutes: number;
}

export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  tickIntervalMs: 60000,
  sendDelayMs: 500,
  deliveryTimeoutMs: 10000,
  slotMatchWindowMinutes: 1,
  weeklyMotivationWeekday: 7,
  weeklyMotivationTime: new TimeOfDay(10, 0),
  weeklyReflectionWeekday: 7,
  weeklyReflectionTime: new TimeOfDay(17, 0),
  quietPeriodMinutes: 15,
};

export function schedulerConfigFrom(config: AppConfig): SchedulerConfig {
  return {
    tickIntervalMs: config.scheduler.tickIntervalMs,
    sendDelayMs: config.scheduler.sendDelayMs,
    deliveryTimeoutMs: config.delivery.timeoutMs,
    slotMatchWindowMinutes: config.scheduler.slotMatchWindowMinutes,
    weeklyMotivationWeekday: config.scheduler.weeklyMotivationWeekday,
    weeklyMotivationTime: TimeOfDay.parse(config.scheduler.weeklyMotivationTime),
    weeklyReflectionWeekday: config.scheduler.weeklyReflectionWeekday,
    weeklyReflectionTime: TimeOfDay.parse(config.scheduler.weeklyReflectionTime),
    quietPeriodMinutes: config.scheduler.quietPeriodMinutes,
  };
}
