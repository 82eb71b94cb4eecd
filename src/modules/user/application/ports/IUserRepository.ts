import type { User } from '../../domain/entities/User';

/**
 * Repository interface for User persistence operations.
 *
 * Keeps the application layer independent of the storage engine; every
 * method speaks in domain entities, never in rows.
 *
 * Note: The 'I' prefix for port interfaces follows the hexagonal architecture
 * naming used across the project.
 */
/* eslint-disable @typescript-eslint/naming-convention */
export interface IUserRepository {
  /**
   * Persists a newly registered user.
   *
   * @throws UserAlreadyRegisteredError if the chat id is taken
   */
  create(user: User): Promise<User>;

  /**
   * @returns The user, or null when the id is unknown
   */
  findById(userId: string): Promise<User | null>;

  /**
   * Looks a user up by the messaging chat that registered them.
   */
  findByChatId(chatId: number): Promise<User | null>;

  /**
   * Writes every mutable field of an existing user.
   *
   * @throws UserNotFoundError if the user no longer exists
   */
  update(user: User): Promise<User>;
}
