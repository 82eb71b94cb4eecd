import { randomUUID } from 'crypto';
import { RegisterUserDTO, RegisterUserSchema } from '../../../../shared/validation/schemas';
import type { IUserRepository } from '../ports/IUserRepository';
import { User } from '../../domain/entities/User';
import { noTrial } from '../../domain/value-objects/EntitlementState';
import type { NotificationFrequency } from '../../domain/value-objects/NotificationFrequency';
import { UserAlreadyRegisteredError } from '../../../../domain/errors/UserAlreadyRegisteredError';
import { systemClock, type Clock } from '../../../../shared/utils/time';
import { logger } from '../../../../shared/logger';
import { resolveUtcOffset } from './resolveUtcOffset';

/**
 * One reminder a day until the user picks something else
 */
export const DEFAULT_NOTIFICATION_FREQUENCY: NotificationFrequency = 1;

export interface RegisterUserOptions {
  trialDurationDays: number;
}

/**
 * RegisterUserUseCase - completes registration and starts the free trial
 *
 * **Responsibilities:**
 * - Validate input using Zod schema
 * - Reject a chat id that already belongs to a user
 * - Resolve the UTC offset (explicit, derived from a reported local time, or left unset)
 * - Start the trial and persist the user
 *
 * A user registered without an offset is scheduled as UTC+0 until they set one.
 */
export class RegisterUserUseCase {
  public constructor(
    private readonly userRepository: IUserRepository,
    private readonly options: RegisterUserOptions,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * @throws ZodError if input validation fails
   * @throws UserAlreadyRegisteredError if the chat id is already registered
   */
  public async execute(dto: RegisterUserDTO): Promise<User> {
    const validatedDto = RegisterUserSchema.parse(dto);
    const now = this.clock();

    const existing = await this.userRepository.findByChatId(validatedDto.chatId);
    if (existing) {
      throw new UserAlreadyRegisteredError(validatedDto.chatId);
    }

    const user = new User({
      id: randomUUID(),
      chatId: validatedDto.chatId,
      fullName: validatedDto.fullName,
      utcOffset: resolveUtcOffset(validatedDto, now) ?? null,
      notificationFrequency: validatedDto.notificationFrequency ?? DEFAULT_NOTIFICATION_FREQUENCY,
      entitlement: noTrial(),
      trialStartedAt: null,
      lastActivityAt: now,
      createdAt: now,
      updatedAt: now,
    }).startTrial(now, this.options.trialDurationDays);

    const savedUser = await this.userRepository.create(user);

    logger.info({
      msg: 'User registered',
      userId: savedUser.id,
      utcOffset: savedUser.effectiveUtcOffset.toString(),
      notificationFrequency: savedUser.notificationFrequency,
      trialDurationDays: this.options.trialDurationDays,
    });

    return savedUser;
  }
}
