import { DateTime } from 'luxon';
import { RunNotificationTickUseCase } from './RunNotificationTickUseCase';
import type { IScheduleProfileSource } from '../ports/IScheduleProfileSource';
import type { DeliveryOutcome, IDeliverySink } from '../ports/IDeliverySink';
import type { IDedupLedger } from '../ports/IDedupLedger';
import type { UserScheduleProfile } from '../types/UserScheduleProfile';
import { EligibilityFilter } from '../../domain/services/EligibilityFilter';
import { SlotTable } from '../../domain/services/SlotTable';
import { MessageComposer } from '../../domain/services/MessageComposer';
import { NotificationCategory } from '../../domain/value-objects/NotificationCategory';
import { DEFAULT_SCHEDULER_CONFIG, SchedulerConfig } from '../../config/scheduler-config';
import { InMemoryDedupLedger } from '../../adapters/persistence/InMemoryDedupLedger';
import { SqliteDedupLedger } from '../../adapters/persistence/SqliteDedupLedger';
import { EntitlementKind } from '../../../user/domain/value-objects/EntitlementState';
import { openDatabase } from '../../../../shared/database/connection';
import { InfrastructureError } from '../../../../domain/errors/InfrastructureError';
import { SqliteUserRepository } from '../../../user/adapters/persistence/SqliteUserRepository';
import { User } from '../../../user/domain/entities/User';
import { UtcOffset } from '../../../../shared/value-objects/UtcOffset';

jest.mock('../../../../shared/logger', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

describe('RunNotificationTickUseCase', () => {
  const utc = (iso: string): DateTime => DateTime.fromISO(iso, { zone: 'utc' });
  const delivered: DeliveryOutcome = { status: 'DELIVERED' };

  const slotTable = new SlotTable({
    1: ['14:00'],
    2: ['09:00', '14:00'],
    4: ['09:00', '12:00', '14:00', '18:00'],
    6: ['09:00', '11:00', '13:00', '14:00', '18:00', '20:00'],
  });

  const config: SchedulerConfig = { ...DEFAULT_SCHEDULER_CONFIG, sendDelayMs: 0 };

  const profile = (overrides: Partial<UserScheduleProfile> = {}): UserScheduleProfile => ({
    userId: 'user-a',
    chatId: 1001,
    displayName: 'Alex',
    utcOffsetHours: 5,
    notificationFrequency: 1,
    entitlement: { kind: EntitlementKind.PREMIUM, trialEndsAt: null },
    lastActivityAt: null,
    ...overrides,
  });

  // Both fire a reminder at 2026-03-10T09:00Z: A at local 14:00, B at local 09:00
  const userA = profile();
  const userB = profile({
    userId: 'user-b',
    chatId: 1002,
    displayName: 'Blake',
    utcOffsetHours: 0,
    notificationFrequency: 2,
  });

  let now: DateTime;
  let profileSource: jest.Mocked<IScheduleProfileSource>;
  let sink: jest.Mocked<IDeliverySink>;
  let ledger: InMemoryDedupLedger;

  const buildUseCase = (
    overrides: { ledger?: IDedupLedger; config?: SchedulerConfig } = {}
  ): RunNotificationTickUseCase =>
    new RunNotificationTickUseCase(
      profileSource,
      overrides.ledger ?? ledger,
      sink,
      new EligibilityFilter(profileSource),
      slotTable,
      new MessageComposer(),
      overrides.config ?? config,
      () => now
    );

  beforeEach(() => {
    jest.clearAllMocks();
    now = utc('2026-03-10T09:00:00Z');
    profileSource = {
      listActiveScheduleProfiles: jest.fn().mockResolvedValue([userA, userB]),
      updateEntitlement: jest.fn().mockResolvedValue(undefined),
    };
    sink = { send: jest.fn().mockResolvedValue(delivered) };
    ledger = new InMemoryDedupLedger();
  });

  describe('emotion reminders', () => {
    it('should deliver each user the slot matching their local time', async () => {
      // Act
      const result = await buildUseCase().execute();

      // Assert
      expect(sink.send).toHaveBeenCalledTimes(2);
      expect(sink.send).toHaveBeenNthCalledWith(
        1,
        expect.objectContaining({
          userId: 'user-a',
          chatId: 1001,
          category: NotificationCategory.EMOTION_REMINDER,
        }),
        expect.any(AbortSignal)
      );
      expect(sink.send).toHaveBeenNthCalledWith(
        2,
        expect.objectContaining({ userId: 'user-b' }),
        expect.any(AbortSignal)
      );
      expect(result).toMatchObject({
        usersProcessed: 2,
        usersFailed: 0,
        remindersSent: 2,
        deliveriesFailed: 0,
        duplicatesSkipped: 0,
        aborted: false,
      });
    });

    it('should fire the 14:00 slot and not the 09:00 slot for UTC+5 at 09:00 UTC', async () => {
      // Arrange
      profileSource.listActiveScheduleProfiles.mockResolvedValue([
        profile({ notificationFrequency: 2 }),
      ]);

      // Act
      await buildUseCase().execute();

      // Assert
      expect(await ledger.alreadySent('user-a', '2026-03-10', 'reminder:14:00')).toBe(true);
      expect(await ledger.alreadySent('user-a', '2026-03-10', 'reminder:09:00')).toBe(false);
    });

    it('should send nothing to a user with notifications disabled', async () => {
      // Arrange
      profileSource.listActiveScheduleProfiles.mockResolvedValue([
        profile({ notificationFrequency: 0 }),
      ]);

      // Act
      const result = await buildUseCase().execute();

      // Assert
      expect(sink.send).not.toHaveBeenCalled();
      expect(result.usersProcessed).toBe(1);
    });

    it('should not send a slot twice when the same minute is ticked again', async () => {
      // Arrange
      const useCase = buildUseCase();
      await useCase.execute();

      // Act
      const second = await useCase.execute();

      // Assert
      expect(sink.send).toHaveBeenCalledTimes(2);
      expect(second.remindersSent).toBe(0);
      expect(second.duplicatesSkipped).toBe(2);
    });
  });

  describe('delivery failures', () => {
    it('should keep going after a failed delivery and consume the slot', async () => {
      // Arrange
      sink.send.mockResolvedValueOnce({ status: 'FAILED', reason: 'Forbidden', retryable: false });
      const useCase = buildUseCase();

      // Act
      const result = await useCase.execute();
      const retry = await useCase.execute();

      // Assert
      expect(result).toMatchObject({ usersProcessed: 2, remindersSent: 1, deliveriesFailed: 1 });
      expect(await ledger.alreadySent('user-a', '2026-03-10', 'reminder:14:00')).toBe(true);
      expect(retry.duplicatesSkipped).toBe(2);
      expect(sink.send).toHaveBeenCalledTimes(2);
    });

    it('should treat a throwing sink as a failed delivery', async () => {
      // Arrange
      sink.send.mockRejectedValueOnce(new Error('socket hang up'));

      // Act
      const result = await buildUseCase().execute();

      // Assert
      expect(result).toMatchObject({
        usersProcessed: 2,
        usersFailed: 0,
        remindersSent: 1,
        deliveriesFailed: 1,
      });
      expect(await ledger.alreadySent('user-a', '2026-03-10', 'reminder:14:00')).toBe(true);
    });

    it('should bound a hanging delivery by the delivery timeout', async () => {
      // Arrange
      sink.send.mockImplementationOnce(() => new Promise<DeliveryOutcome>(() => undefined));

      // Act
      const result = await buildUseCase({ config: { ...config, deliveryTimeoutMs: 20 } }).execute();

      // Assert
      expect(result).toMatchObject({ remindersSent: 1, deliveriesFailed: 1 });
      expect(await ledger.alreadySent('user-a', '2026-03-10', 'reminder:14:00')).toBe(true);
    });

    it('should abort the send it gave up on', async () => {
      // Arrange
      let attemptSignal: AbortSignal | undefined;
      sink.send.mockImplementationOnce((_event, signal) => {
        attemptSignal = signal;
        return new Promise<DeliveryOutcome>(() => undefined);
      });

      // Act
      await buildUseCase({ config: { ...config, deliveryTimeoutMs: 20 } }).execute();

      // Assert
      expect(attemptSignal?.aborted).toBe(true);
      expect(sink.send.mock.calls[1]?.[1]?.aborted).toBe(false);
    });

    it('should isolate an unexpected error to the user it happened for', async () => {
      // Arrange
      jest.spyOn(ledger, 'alreadySent').mockRejectedValueOnce(new Error('ledger unavailable'));

      // Act
      const result = await buildUseCase().execute();

      // Assert
      expect(result).toMatchObject({ usersProcessed: 1, usersFailed: 1, remindersSent: 1 });
      expect(sink.send).toHaveBeenCalledWith(
        expect.objectContaining({ userId: 'user-b' }),
        expect.any(AbortSignal)
      );
    });

    it('should propagate a failure to load profiles', async () => {
      // Arrange
      profileSource.listActiveScheduleProfiles.mockRejectedValue(
        new InfrastructureError('Failed to list schedule profiles')
      );

      // Act & Assert
      await expect(buildUseCase().execute()).rejects.toThrow(InfrastructureError);
      expect(sink.send).not.toHaveBeenCalled();
    });
  });

  describe('trial expiry', () => {
    it('should expire a trial ending at the tick instant and send it nothing', async () => {
      // Arrange
      profileSource.listActiveScheduleProfiles.mockResolvedValue([
        profile({ entitlement: { kind: EntitlementKind.TRIAL_ACTIVE, trialEndsAt: now } }),
      ]);

      // Act
      const result = await buildUseCase().execute();

      // Assert
      expect(profileSource.updateEntitlement).toHaveBeenCalledWith('user-a', {
        kind: EntitlementKind.TRIAL_EXPIRED,
        trialEndsAt: now,
      });
      expect(sink.send).not.toHaveBeenCalled();
      expect(result.usersProcessed).toBe(1);
    });

    it('should still deliver to a trial ending one minute after the tick', async () => {
      // Arrange
      profileSource.listActiveScheduleProfiles.mockResolvedValue([
        profile({
          notificationFrequency: 1,
          entitlement: { kind: EntitlementKind.TRIAL_ACTIVE, trialEndsAt: now.plus({ minutes: 1 }) },
        }),
      ]);

      // Act
      const result = await buildUseCase().execute();

      // Assert
      expect(profileSource.updateEntitlement).not.toHaveBeenCalled();
      expect(result.remindersSent).toBe(1);
      expect(result.warningsSent).toBe(2);
    });
  });

  describe('trial warnings', () => {
    const trialUser = profile({
      utcOffsetHours: 0,
      notificationFrequency: 0,
      entitlement: { kind: EntitlementKind.TRIAL_ACTIVE, trialEndsAt: utc('2026-03-11T08:00:00Z') },
    });

    beforeEach(() => {
      profileSource.listActiveScheduleProfiles.mockResolvedValue([trialUser]);
    });

    it('should send both warnings on one tick when both thresholds were crossed together', async () => {
      // Act
      const result = await buildUseCase().execute();

      // Assert
      expect(result.warningsSent).toBe(2);
      expect(await ledger.alreadySent('user-a', '2026-03-11', 'trial-warning:THREE_DAY')).toBe(true);
      expect(await ledger.alreadySent('user-a', '2026-03-11', 'trial-warning:ONE_DAY')).toBe(true);
    });

    it('should send each warning once as the trial runs out', async () => {
      // Arrange
      const useCase = buildUseCase();

      // Act
      now = utc('2026-03-09T09:00:00Z');
      const twoDaysLeft = await useCase.execute();
      now = utc('2026-03-09T10:00:00Z');
      const hourLater = await useCase.execute();
      now = utc('2026-03-10T09:00:00Z');
      const oneDayLeft = await useCase.execute();

      // Assert
      expect(twoDaysLeft.warningsSent).toBe(1);
      expect(hourLater).toMatchObject({ warningsSent: 0, duplicatesSkipped: 1 });
      expect(oneDayLeft).toMatchObject({ warningsSent: 1, duplicatesSkipped: 1 });
      expect(sink.send).toHaveBeenCalledTimes(2);
    });

    it('should not resend a warning after the user changes their offset', async () => {
      // Arrange
      const endsLateUtc = {
        kind: EntitlementKind.TRIAL_ACTIVE,
        trialEndsAt: utc('2026-03-12T23:30:00Z'),
      } as const;
      profileSource.listActiveScheduleProfiles
        .mockResolvedValueOnce([profile({ ...trialUser, entitlement: endsLateUtc })])
        .mockResolvedValueOnce([
          profile({ ...trialUser, utcOffsetHours: 3, entitlement: endsLateUtc }),
        ]);
      const useCase = buildUseCase();

      // Act
      now = utc('2026-03-10T12:00:00Z');
      const beforeChange = await useCase.execute();
      now = utc('2026-03-10T12:01:00Z');
      const afterChange = await useCase.execute();

      // Assert
      expect(beforeChange.warningsSent).toBe(1);
      expect(afterChange).toMatchObject({ warningsSent: 0, duplicatesSkipped: 1 });
      expect(sink.send).toHaveBeenCalledTimes(1);
      expect(await ledger.alreadySent('user-a', '2026-03-12', 'trial-warning:THREE_DAY')).toBe(
        true
      );
    });
  });

  describe('unreadable user rows', () => {
    it('should serve the remaining users when one row cannot be read', async () => {
      // Arrange
      const db = openDatabase(':memory:');
      const repository = new SqliteUserRepository(db);
      const registeredAt = utc('2026-03-01T08:00:00Z');
      const premiumUser = (id: string, chatId: number, offset: number, frequency: 1 | 2): User =>
        new User({
          id,
          chatId,
          fullName: 'Sam',
          utcOffset: new UtcOffset(offset),
          notificationFrequency: frequency,
          entitlement: { kind: EntitlementKind.PREMIUM, trialEndsAt: null },
          trialStartedAt: null,
          lastActivityAt: null,
          createdAt: registeredAt,
          updatedAt: registeredAt,
        });

      try {
        await repository.create(premiumUser('user-healthy', 2001, 5, 1));
        await repository.create(premiumUser('user-bad-offset', 2002, 3, 2));
        await repository.create(premiumUser('user-broken', 2003, 0, 2));
        db.prepare("UPDATE users SET utc_offset = 'abc' WHERE id = 'user-bad-offset'").run();
        db.prepare("UPDATE users SET last_activity_at = 'never' WHERE id = 'user-broken'").run();
        const useCase = new RunNotificationTickUseCase(
          repository,
          ledger,
          sink,
          new EligibilityFilter(repository),
          slotTable,
          new MessageComposer(),
          config,
          () => now
        );

        // Act
        const result = await useCase.execute();

        // Assert
        expect(result).toMatchObject({ usersProcessed: 2, usersFailed: 0, remindersSent: 2 });
        expect(await ledger.alreadySent('user-healthy', '2026-03-10', 'reminder:14:00')).toBe(true);
        expect(await ledger.alreadySent('user-bad-offset', '2026-03-10', 'reminder:09:00')).toBe(
          true
        );
      } finally {
        db.close();
      }
    });
  });

  describe('weekly reflection', () => {
    it('should be sent on Sunday evening local time and counted', async () => {
      // Arrange
      now = utc('2026-03-15T12:00:00Z');
      profileSource.listActiveScheduleProfiles.mockResolvedValue([userA]);
      const useCase = buildUseCase();

      // Act
      const first = await useCase.execute();
      const again = await useCase.execute();

      // Assert
      expect(first).toMatchObject({ reflectionsSent: 1, remindersSent: 0, motivationsSent: 0 });
      expect(again).toMatchObject({ reflectionsSent: 0, duplicatesSkipped: 1 });
      expect(sink.send).toHaveBeenCalledTimes(1);
      expect(sink.send).toHaveBeenCalledWith(
        expect.objectContaining({ category: NotificationCategory.WEEKLY_REFLECTION }),
        expect.any(AbortSignal)
      );
      expect(await ledger.alreadySent('user-a', '2026-03-15', 'weekly-reflection:2026-W11')).toBe(
        true
      );
    });
  });

  describe('weekly motivation', () => {
    it('should be sent once per ISO week, also across a restart', async () => {
      // Arrange
      const db = openDatabase(':memory:');
      now = utc('2026-03-15T10:00:00Z');
      profileSource.listActiveScheduleProfiles.mockResolvedValue([profile({ utcOffsetHours: 0 })]);

      try {
        // Act
        const first = await buildUseCase({ ledger: new SqliteDedupLedger(db) }).execute();
        const afterRestart = await buildUseCase({ ledger: new SqliteDedupLedger(db) }).execute();

        // Assert
        expect(first.motivationsSent).toBe(1);
        expect(afterRestart).toMatchObject({ motivationsSent: 0, duplicatesSkipped: 1 });
        expect(sink.send).toHaveBeenCalledTimes(1);
        expect(sink.send).toHaveBeenCalledWith(
          expect.objectContaining({ category: NotificationCategory.WEEKLY_MOTIVATION }),
          expect.any(AbortSignal)
        );
      } finally {
        db.close();
      }
    });
  });

  describe('cancellation', () => {
    it('should process nobody once already aborted', async () => {
      // Arrange
      const controller = new AbortController();
      controller.abort();

      // Act
      const result = await buildUseCase().execute(controller.signal);

      // Assert
      expect(result).toMatchObject({ usersProcessed: 0, aborted: true });
      expect(sink.send).not.toHaveBeenCalled();
    });

    it('should finish the current user and stop before the next', async () => {
      // Arrange
      const controller = new AbortController();
      sink.send.mockImplementationOnce(async () => {
        controller.abort();
        return delivered;
      });

      // Act
      const result = await buildUseCase({ config: { ...config, sendDelayMs: 60000 } }).execute(
        controller.signal
      );

      // Assert
      expect(result).toMatchObject({ usersProcessed: 1, remindersSent: 1, aborted: true });
      expect(sink.send).toHaveBeenCalledTimes(1);
    });
  });
});
