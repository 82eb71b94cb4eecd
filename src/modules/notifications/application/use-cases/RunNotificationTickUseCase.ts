import type { DateTime } from 'luxon';
import type { IScheduleProfileSource } from '../ports/IScheduleProfileSource';
import type { IDedupLedger } from '../ports/IDedupLedger';
import type { DeliveryOutcome, IDeliverySink } from '../ports/IDeliverySink';
import type { NotificationEvent } from '../types/NotificationEvent';
import type { TickResult } from '../types/TickResult';
import type { UserScheduleProfile } from '../types/UserScheduleProfile';
import type { SchedulerConfig } from '../../config/scheduler-config';
import type { EligibilityFilter } from '../../domain/services/EligibilityFilter';
import type { SlotTable } from '../../domain/services/SlotTable';
import type { MessageComposer } from '../../domain/services/MessageComposer';
import { planNotifications } from '../../domain/services/NotificationPlanner';
import { NotificationCategory } from '../../domain/value-objects/NotificationCategory';
import { DeliveryTimeoutError } from '../../../../domain/errors/TransientDeliveryError';
import { sleep, withTimeout } from '../../../../shared/utils/async';
import { errorFields } from '../../../../shared/utils/errors';
import { systemClock, type Clock } from '../../../../shared/utils/time';
import { logger } from '../../../../shared/logger';

type TickCounters = Omit<TickResult, 'aborted' | 'durationMs'>;

/**
 * RunNotificationTickUseCase
 *
 * **Purpose:**
 * One pass of the scheduler over every active user: works out what is due,
 * skips what the ledger already holds, delivers the rest.
 *
 * **Workflow per user:**
 * 1. Decide eligibility once (may write TRIAL_EXPIRED back)
 * 2. Plan reminders, weekly messages and trial warnings for the local time
 * 3. For each planned notification not yet in the ledger: compose, deliver,
 *    record, pause `sendDelayMs`
 *
 * **Delivery semantics:**
 * At most once. The ledger entry is written after every attempt, whatever the
 * outcome, so a failed slot is not retried until its next occurrence.
 *
 * **Error Handling:**
 *
 * | Failure | Effect |
 * |---------|--------|
 * | Loading profiles | Rethrown; the whole tick is skipped |
 * | Anything inside one user | Logged, counted in usersFailed, next user continues |
 * | Sink throws or times out | Treated as a retryable FAILED outcome; a timed-out send is aborted |
 *
 * **Cancellation:**
 * The abort signal is checked between users. A user already being processed
 * is finished; only the send delay is cut short.
 */
export class RunNotificationTickUseCase {
  public constructor(
    private readonly profileSource: IScheduleProfileSource,
    private readonly ledger: IDedupLedger,
    private readonly deliverySink: IDeliverySink,
    private readonly eligibilityFilter: EligibilityFilter,
    private readonly slotTable: SlotTable,
    private readonly composer: MessageComposer,
    private readonly config: SchedulerConfig,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * @throws InfrastructureError if the active users cannot be loaded
   */
  public async execute(signal?: AbortSignal): Promise<TickResult> {
    const startTime = Date.now();
    const now = this.clock();
    const counters: TickCounters = {
      usersProcessed: 0,
      usersFailed: 0,
      remindersSent: 0,
      motivationsSent: 0,
      reflectionsSent: 0,
      warningsSent: 0,
      deliveriesFailed: 0,
      duplicatesSkipped: 0,
    };

    const profiles = await this.profileSource.listActiveScheduleProfiles();

    let aborted = false;
    for (const profile of profiles) {
      if (signal?.aborted) {
        aborted = true;
        break;
      }

      try {
        await this.processUser(profile, now, counters, signal);
        counters.usersProcessed++;
      } catch (error) {
        counters.usersFailed++;
        logger.error({
          msg: 'Failed to process user during tick',
          userId: profile.userId,
          ...errorFields(error),
        });
      }
    }

    const result: TickResult = { ...counters, aborted, durationMs: Date.now() - startTime };

    logger.info({
      msg: 'Notification tick completed',
      tickAt: now.toISO(),
      activeUsers: profiles.length,
      ...result,
    });

    return result;
  }

  private async processUser(
    profile: UserScheduleProfile,
    now: DateTime,
    counters: TickCounters,
    signal?: AbortSignal
  ): Promise<void> {
    const decision = await this.eligibilityFilter.isEligible(profile, now);

    const plan = planNotifications({
      profile,
      now,
      eligible: decision.eligible,
      trialWarnings: decision.eligible ? this.eligibilityFilter.warningsDue(profile, now) : [],
      slotTable: this.slotTable,
      config: this.config,
    });

    if (plan.quietPeriodActive) {
      logger.debug({
        msg: 'Reminders held back, user recently active',
        userId: profile.userId,
        localTime: plan.local.timeOfDay.toString(),
      });
    }

    for (const planned of plan.notifications) {
      const { scopeDate, slotKey } = planned.key;

      if (await this.ledger.alreadySent(profile.userId, scopeDate, slotKey)) {
        counters.duplicatesSkipped++;
        continue;
      }

      const event = this.composer.compose(planned, profile, plan.local);
      const outcome = await this.deliver(event);
      await this.ledger.recordSent(profile.userId, scopeDate, slotKey);

      if (outcome.status === 'DELIVERED') {
        this.countDelivered(event.category, counters);
      } else {
        counters.deliveriesFailed++;
        logger.warn({
          msg: 'Notification delivery failed, slot consumed',
          userId: profile.userId,
          category: event.category,
          slotKey,
          reason: outcome.reason,
          retryable: outcome.retryable,
        });
      }

      await sleep(this.config.sendDelayMs, signal);
    }
  }

  private async deliver(event: NotificationEvent): Promise<DeliveryOutcome> {
    const timeoutMs = this.config.deliveryTimeoutMs;
    const attempt = new AbortController();

    try {
      return await withTimeout(
        this.deliverySink.send(event, attempt.signal),
        timeoutMs,
        () => new DeliveryTimeoutError(timeoutMs)
      );
    } catch (error) {
      attempt.abort();
      return {
        status: 'FAILED',
        reason: error instanceof Error ? error.message : String(error),
        retryable: true,
      };
    }
  }

  private countDelivered(category: NotificationCategory, counters: TickCounters): void {
    switch (category) {
      case NotificationCategory.EMOTION_REMINDER:
        counters.remindersSent++;
        break;
      case NotificationCategory.WEEKLY_MOTIVATION:
        counters.motivationsSent++;
        break;
      case NotificationCategory.WEEKLY_REFLECTION:
        counters.reflectionsSent++;
        break;
      case NotificationCategory.TRIAL_WARNING:
        counters.warningsSent++;
        break;
    }
  }
}
