import type { IUserRepository } from '../ports/IUserRepository';
import { UserNotFoundError } from '../../../../domain/errors/UserNotFoundError';
import { systemClock, type Clock } from '../../../../shared/utils/time';

/**
 * Stamps the user's latest interaction; reminders hold back for a while after it
 */
export class RecordUserActivityUseCase {
  public constructor(
    private readonly userRepository: IUserRepository,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * @throws UserNotFoundError if the user does not exist
   */
  public async execute(userId: string): Promise<void> {
    const user = await this.userRepository.findById(userId);
    if (!user) {
      throw new UserNotFoundError(userId);
    }

    await this.userRepository.update(user.recordActivity(this.clock()));
  }
}
