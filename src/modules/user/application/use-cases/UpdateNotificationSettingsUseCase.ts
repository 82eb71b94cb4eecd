import {
  UpdateNotificationSettingsDTO,
  UpdateNotificationSettingsSchema,
} from '../../../../shared/validation/schemas';
import type { IUserRepository } from '../ports/IUserRepository';
import type { User } from '../../domain/entities/User';
import { UserNotFoundError } from '../../../../domain/errors/UserNotFoundError';
import { systemClock, type Clock } from '../../../../shared/utils/time';
import { logger } from '../../../../shared/logger';
import { resolveUtcOffset } from './resolveUtcOffset';

/**
 * UpdateNotificationSettingsUseCase - write side of the settings command
 *
 * Changes land in the account store directly; the scheduler sees them on its
 * next tick. Fields left out keep their current value.
 */
export class UpdateNotificationSettingsUseCase {
  public constructor(
    private readonly userRepository: IUserRepository,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * @throws ZodError if input validation fails
   * @throws UserNotFoundError if the user does not exist
   */
  public async execute(userId: string, dto: UpdateNotificationSettingsDTO): Promise<User> {
    const validatedDto = UpdateNotificationSettingsSchema.parse(dto);

    const existingUser = await this.userRepository.findById(userId);
    if (!existingUser) {
      throw new UserNotFoundError(userId);
    }

    const now = this.clock();
    const updatedUser = existingUser.updateNotificationSettings(
      {
        notificationFrequency: validatedDto.notificationFrequency,
        utcOffset: resolveUtcOffset(validatedDto, now),
      },
      now
    );

    const savedUser = await this.userRepository.update(updatedUser);

    logger.info({
      msg: 'Notification settings updated',
      userId,
      notificationFrequency: savedUser.notificationFrequency,
      utcOffset: savedUser.effectiveUtcOffset.toString(),
    });

    return savedUser;
  }
}
