import { DateTime } from 'luxon';
import { SqliteUserRepository } from './SqliteUserRepository';
import { openDatabase, SqliteDatabase } from '../../../../shared/database/connection';
import { User, UserProps } from '../../domain/entities/User';
import { EntitlementKind, noTrial } from '../../domain/value-objects/EntitlementState';
import { UtcOffset } from '../../../../shared/value-objects/UtcOffset';
import { UserAlreadyRegisteredError } from '../../../../domain/errors/UserAlreadyRegisteredError';
import { UserNotFoundError } from '../../../../domain/errors/UserNotFoundError';
import { InfrastructureError } from '../../../../domain/errors/InfrastructureError';
import { logger } from '../../../../shared/logger';

jest.mock('../../../../shared/logger', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

describe('SqliteUserRepository', () => {
  let db: SqliteDatabase;
  let repository: SqliteUserRepository;

  const createdAt = DateTime.fromISO('2026-03-01T08:00:00Z', { zone: 'utc' });
  const now = DateTime.fromISO('2026-03-10T12:00:00Z', { zone: 'utc' });

  const buildUser = (overrides: Partial<UserProps> = {}): User =>
    new User({
      id: '550e8400-e29b-41d4-a716-446655440000',
      chatId: 1001,
      fullName: 'Alex Doe',
      utcOffset: new UtcOffset(3),
      notificationFrequency: 2,
      entitlement: noTrial(),
      trialStartedAt: null,
      lastActivityAt: null,
      createdAt,
      updatedAt: createdAt,
      ...overrides,
    });

  beforeEach(() => {
    db = openDatabase(':memory:');
    repository = new SqliteUserRepository(db);
  });

  afterEach(() => {
    db.close();
  });

  describe('create / findById', () => {
    it('should round-trip every field', async () => {
      // Arrange
      const user = buildUser().startTrial(now, 14).recordActivity(now.plus({ minutes: 5 }));

      // Act
      await repository.create(user);
      const found = await repository.findById(user.id);

      // Assert
      expect(found).not.toBeNull();
      expect(found?.chatId).toBe(1001);
      expect(found?.fullName).toBe('Alex Doe');
      expect(found?.utcOffset?.hours).toBe(3);
      expect(found?.notificationFrequency).toBe(2);
      expect(found?.entitlement.kind).toBe(EntitlementKind.TRIAL_ACTIVE);
      expect(found?.trialStartedAt?.toMillis()).toBe(now.toMillis());
      expect(found?.lastActivityAt?.toMillis()).toBe(now.plus({ minutes: 5 }).toMillis());
      expect(found?.createdAt.toMillis()).toBe(createdAt.toMillis());
    });

    it('should store an unset offset as null', async () => {
      // Arrange
      const user = buildUser({ utcOffset: null });

      // Act
      await repository.create(user);

      // Assert
      expect((await repository.findById(user.id))?.utcOffset).toBeNull();
    });

    it('should return null for an unknown id', async () => {
      expect(await repository.findById('00000000-0000-0000-0000-000000000000')).toBeNull();
    });

    it('should reject a second user for the same chat', async () => {
      // Arrange
      await repository.create(buildUser());

      // Act & Assert
      await expect(
        repository.create(buildUser({ id: '6fa459ea-ee8a-3ca4-894e-db77e160355e' }))
      ).rejects.toThrow(UserAlreadyRegisteredError);
    });
  });

  describe('findByChatId', () => {
    it('should find the user registered for a chat', async () => {
      // Arrange
      await repository.create(buildUser());

      // Act
      const found = await repository.findByChatId(1001);

      // Assert
      expect(found?.id).toBe('550e8400-e29b-41d4-a716-446655440000');
      expect(await repository.findByChatId(999)).toBeNull();
    });
  });

  describe('update', () => {
    it('should persist settings changes', async () => {
      // Arrange
      const user = await repository.create(buildUser());

      // Act
      await repository.update(
        user.updateNotificationSettings({ notificationFrequency: 6, utcOffset: new UtcOffset(-4) }, now)
      );

      // Assert
      const found = await repository.findById(user.id);
      expect(found?.notificationFrequency).toBe(6);
      expect(found?.utcOffset?.hours).toBe(-4);
      expect(found?.updatedAt.toMillis()).toBe(now.toMillis());
    });

    it('should throw UserNotFoundError for a missing user', async () => {
      await expect(repository.update(buildUser())).rejects.toThrow(UserNotFoundError);
    });
  });

  describe('listActiveScheduleProfiles', () => {
    it('should return premium and active-trial users only', async () => {
      // Arrange
      await repository.create(buildUser().startTrial(now, 14));
      await repository.create(
        buildUser({
          id: '6fa459ea-ee8a-3ca4-894e-db77e160355e',
          chatId: 1002,
          createdAt: createdAt.plus({ hours: 1 }),
          entitlement: { kind: EntitlementKind.PREMIUM, trialEndsAt: null },
        })
      );
      await repository.create(
        buildUser({
          id: '7c9e6679-7425-40de-944b-e07fc1f90ae7',
          chatId: 1003,
          entitlement: { kind: EntitlementKind.TRIAL_EXPIRED, trialEndsAt: now },
        })
      );
      await repository.create(
        buildUser({ id: '16fd2706-8baf-433b-82eb-8c7fada847da', chatId: 1004 })
      );

      // Act
      const profiles = await repository.listActiveScheduleProfiles();

      // Assert
      expect(profiles.map((p) => p.chatId)).toEqual([1001, 1002]);
      expect(profiles[0]).toEqual(
        expect.objectContaining({
          userId: '550e8400-e29b-41d4-a716-446655440000',
          displayName: 'Alex Doe',
          utcOffsetHours: 3,
          notificationFrequency: 2,
          lastActivityAt: null,
        })
      );
    });

    it('should pass stored offset and frequency through unchanged', async () => {
      // Arrange
      await repository.create(buildUser({ entitlement: { kind: EntitlementKind.PREMIUM, trialEndsAt: null } }));
      db.prepare('UPDATE users SET utc_offset = 99, notification_frequency = 3').run();

      // Act
      const [profile] = await repository.listActiveScheduleProfiles();

      // Assert
      expect(profile?.utcOffsetHours).toBe(99);
      expect(profile?.notificationFrequency).toBe(3);
    });

    it('should read a non-numeric offset and frequency without failing', async () => {
      // Arrange
      await repository.create(buildUser({ entitlement: { kind: EntitlementKind.PREMIUM, trialEndsAt: null } }));
      db.prepare("UPDATE users SET utc_offset = 'abc', notification_frequency = 'often'").run();

      // Act
      const profiles = await repository.listActiveScheduleProfiles();

      // Assert
      expect(profiles).toHaveLength(1);
      expect(profiles[0]?.utcOffsetHours).toBe('abc');
      expect(profiles[0]?.notificationFrequency).toBe('often');
    });

    it('should skip an unreadable row and still return the others', async () => {
      // Arrange
      const premium = { kind: EntitlementKind.PREMIUM, trialEndsAt: null } as const;
      await repository.create(buildUser({ entitlement: premium }));
      await repository.create(
        buildUser({
          id: '6fa459ea-ee8a-3ca4-894e-db77e160355e',
          chatId: 1002,
          createdAt: createdAt.plus({ hours: 1 }),
          entitlement: premium,
        })
      );
      db.prepare("UPDATE users SET last_activity_at = 'yesterday' WHERE chat_id = 1001").run();

      // Act
      const profiles = await repository.listActiveScheduleProfiles();

      // Assert
      expect(profiles.map((p) => p.chatId)).toEqual([1002]);
      expect(logger.warn).toHaveBeenCalledWith(
        expect.objectContaining({
          msg: 'Skipping unreadable users row',
          userId: '550e8400-e29b-41d4-a716-446655440000',
        })
      );
    });
  });

  describe('updateEntitlement', () => {
    it('should write the new state and its trial end', async () => {
      // Arrange
      const user = await repository.create(buildUser().startTrial(now, 14));
      const trialEndsAt = now.plus({ days: 14 });

      // Act
      await repository.updateEntitlement(user.id, {
        kind: EntitlementKind.TRIAL_EXPIRED,
        trialEndsAt,
      });

      // Assert
      const found = await repository.findById(user.id);
      expect(found?.entitlement.kind).toBe(EntitlementKind.TRIAL_EXPIRED);
      expect(found?.entitlement).toEqual(
        expect.objectContaining({ kind: EntitlementKind.TRIAL_EXPIRED })
      );
    });

    it('should throw UserNotFoundError for an unknown user', async () => {
      await expect(repository.updateEntitlement('missing', noTrial())).rejects.toThrow(
        UserNotFoundError
      );
    });

    it('should surface storage failures as InfrastructureError', async () => {
      // Arrange
      db.close();

      // Act & Assert
      await expect(repository.updateEntitlement('any', noTrial())).rejects.toThrow(
        InfrastructureError
      );
      db = openDatabase(':memory:');
    });
  });
});
