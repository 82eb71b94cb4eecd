import type { IUserRepository } from '../ports/IUserRepository';
import type { User } from '../../domain/entities/User';
import { UserNotFoundError } from '../../../../domain/errors/UserNotFoundError';

/**
 * GetUserUseCase - Application layer use case for retrieving users
 */
export class GetUserUseCase {
  public constructor(private readonly userRepository: IUserRepository) {}

  /**
   * @throws UserNotFoundError if the user does not exist
   */
  public async execute(userId: string): Promise<User> {
    const user = await this.userRepository.findById(userId);

    if (!user) {
      throw new UserNotFoundError(userId);
    }

    return user;
  }
}
