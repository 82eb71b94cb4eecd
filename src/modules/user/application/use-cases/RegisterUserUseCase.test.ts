/* eslint-disable @typescript-eslint/unbound-method */
// Disabled unbound-method rule for Jest expect calls - this is a known false positive with Jest
import { DateTime } from 'luxon';
import { ZodError } from 'zod';
import { RegisterUserUseCase } from './RegisterUserUseCase';
import type { IUserRepository } from '../ports/IUserRepository';
import { User } from '../../domain/entities/User';
import { EntitlementKind, noTrial } from '../../domain/value-objects/EntitlementState';
import { UserAlreadyRegisteredError } from '../../../../domain/errors/UserAlreadyRegisteredError';

jest.mock('../../../../shared/logger', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

describe('RegisterUserUseCase', () => {
  const now = DateTime.fromISO('2026-03-10T09:00:00Z', { zone: 'utc' });

  let useCase: RegisterUserUseCase;
  let mockUserRepository: jest.Mocked<IUserRepository>;

  const createdUser = (): User => {
    const call = mockUserRepository.create.mock.calls[0];
    if (!call) {
      throw new Error('create was not called');
    }
    return call[0];
  };

  beforeEach(() => {
    mockUserRepository = {
      create: jest.fn().mockImplementation((user: User) => Promise.resolve(user)),
      findById: jest.fn(),
      findByChatId: jest.fn().mockResolvedValue(null),
      update: jest.fn(),
    };

    useCase = new RegisterUserUseCase(mockUserRepository, { trialDurationDays: 14 }, () => now);
  });

  describe('execute', () => {
    it('should register with a started trial and one reminder a day', async () => {
      // Act
      const result = await useCase.execute({ chatId: 1001, fullName: 'Alex Doe' });

      // Assert
      expect(mockUserRepository.create).toHaveBeenCalledTimes(1);
      expect(result).toBe(createdUser());
      expect(result.chatId).toBe(1001);
      expect(result.fullName).toBe('Alex Doe');
      expect(result.notificationFrequency).toBe(1);
      expect(result.utcOffset).toBeNull();
      expect(result.entitlement.kind).toBe(EntitlementKind.TRIAL_ACTIVE);
      expect(result.trialStartedAt?.toMillis()).toBe(now.toMillis());
      if (result.entitlement.kind === EntitlementKind.TRIAL_ACTIVE) {
        expect(result.entitlement.trialEndsAt.toISO()).toBe('2026-03-24T09:00:00.000Z');
      }
    });

    it('should keep an explicit offset and frequency', async () => {
      // Act
      const result = await useCase.execute({
        chatId: 1001,
        fullName: 'Alex Doe',
        utcOffset: -3,
        notificationFrequency: 4,
      });

      // Assert
      expect(result.utcOffset?.hours).toBe(-3);
      expect(result.notificationFrequency).toBe(4);
    });

    it('should derive the offset from a reported local time', async () => {
      // Act
      const result = await useCase.execute({
        chatId: 1001,
        fullName: 'Alex Doe',
        reportedLocalTime: '14:00',
      });

      // Assert
      expect(result.utcOffset?.toString()).toBe('UTC+5');
    });

    it('should trim the full name', async () => {
      // Act
      const result = await useCase.execute({ chatId: 1001, fullName: '  Alex Doe  ' });

      // Assert
      expect(result.fullName).toBe('Alex Doe');
    });

    it('should reject a chat id that is already registered', async () => {
      // Arrange
      mockUserRepository.findByChatId.mockResolvedValue(
        new User({
          id: '550e8400-e29b-41d4-a716-446655440000',
          chatId: 1001,
          fullName: 'Alex Doe',
          utcOffset: null,
          notificationFrequency: 1,
          entitlement: noTrial(),
          trialStartedAt: null,
          lastActivityAt: null,
          createdAt: now,
          updatedAt: now,
        })
      );

      // Act & Assert
      await expect(useCase.execute({ chatId: 1001, fullName: 'Alex Doe' })).rejects.toThrow(
        UserAlreadyRegisteredError
      );
      expect(mockUserRepository.create).not.toHaveBeenCalled();
    });

    it('should reject an offset given together with a reported local time', async () => {
      // Act & Assert
      await expect(
        useCase.execute({
          chatId: 1001,
          fullName: 'Alex Doe',
          utcOffset: 5,
          reportedLocalTime: '14:00',
        })
      ).rejects.toThrow(ZodError);
      expect(mockUserRepository.findByChatId).not.toHaveBeenCalled();
    });
  });
});
