import { DateTime } from 'luxon';
import { GetUserUseCase } from './GetUserUseCase';
import type { IUserRepository } from '../ports/IUserRepository';
import { User } from '../../domain/entities/User';
import { noTrial } from '../../domain/value-objects/EntitlementState';
import { UserNotFoundError } from '../../../../domain/errors/UserNotFoundError';

describe('GetUserUseCase', () => {
  let useCase: GetUserUseCase;
  let mockUserRepository: jest.Mocked<IUserRepository>;

  beforeEach(() => {
    mockUserRepository = {
      create: jest.fn(),
      findById: jest.fn(),
      findByChatId: jest.fn(),
      update: jest.fn(),
    };

    useCase = new GetUserUseCase(mockUserRepository);
  });

  describe('execute', () => {
    it('should return user when found', async () => {
      // Arrange
      const userId = '550e8400-e29b-41d4-a716-446655440000';
      const user = new User({
        id: userId,
        chatId: 1001,
        fullName: 'Alex Doe',
        utcOffset: null,
        notificationFrequency: 1,
        entitlement: noTrial(),
        trialStartedAt: null,
        lastActivityAt: null,
        createdAt: DateTime.now(),
        updatedAt: DateTime.now(),
      });

      mockUserRepository.findById.mockResolvedValue(user);

      // Act
      const result = await useCase.execute(userId);

      // Assert
      expect(result).toBe(user);
      expect(mockUserRepository.findById).toHaveBeenCalledWith(userId);
    });

    it('should throw UserNotFoundError when user not found', async () => {
      // Arrange
      mockUserRepository.findById.mockResolvedValue(null);

      // Act & Assert
      await expect(useCase.execute('550e8400-e29b-41d4-a716-446655440000')).rejects.toThrow(
        UserNotFoundError
      );
    });
  });
});
