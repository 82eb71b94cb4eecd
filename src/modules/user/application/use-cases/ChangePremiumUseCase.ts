import type { DateTime } from 'luxon';
import type { IUserRepository } from '../ports/IUserRepository';
import type { IScheduleProfileSource } from '../../../notifications/application/ports/IScheduleProfileSource';
import type { User } from '../../domain/entities/User';
import {
  EntitlementState,
  entitlementEquals,
  grantPremium,
  revokePremium,
} from '../../domain/value-objects/EntitlementState';
import { EntitlementWriteError } from '../../../../domain/errors/EntitlementWriteError';
import { InfrastructureError } from '../../../../domain/errors/InfrastructureError';
import { UserNotFoundError } from '../../../../domain/errors/UserNotFoundError';
import { systemClock, type Clock } from '../../../../shared/utils/time';
import { logger } from '../../../../shared/logger';

type EntitlementStore = Pick<IScheduleProfileSource, 'updateEntitlement'>;

/**
 * Administrative entitlement change, written through `updateEntitlement`
 * without going through trial arithmetic.
 *
 * Subclasses decide the target state; an unchanged state is not written.
 */
abstract class ChangePremiumUseCase {
  public constructor(
    private readonly userRepository: IUserRepository,
    private readonly entitlementStore: EntitlementStore,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * @throws UserNotFoundError if the user does not exist
   * @throws InvalidStateTransitionError if the change is not allowed from the current state
   * @throws EntitlementWriteError if the account store rejects the write
   */
  public async execute(userId: string): Promise<User> {
    const user = await this.userRepository.findById(userId);
    if (!user) {
      throw new UserNotFoundError(userId);
    }

    const target = this.targetState(user, this.clock());
    if (entitlementEquals(user.entitlement, target)) {
      return user;
    }

    try {
      await this.entitlementStore.updateEntitlement(userId, target);
    } catch (error) {
      if (error instanceof InfrastructureError) {
        throw new EntitlementWriteError(userId, target.kind, error);
      }
      throw error;
    }

    logger.info({
      msg: 'Entitlement changed by administrator',
      userId,
      from: user.entitlement.kind,
      to: target.kind,
    });

    const updated = await this.userRepository.findById(userId);
    if (!updated) {
      throw new UserNotFoundError(userId);
    }
    return updated;
  }

  protected abstract targetState(user: User, now: DateTime): EntitlementState;
}

/**
 * Upgrades any user to PREMIUM, keeping the trial end for a later revoke
 */
export class GrantPremiumUseCase extends ChangePremiumUseCase {
  protected targetState(user: User): EntitlementState {
    return grantPremium(user.entitlement);
  }
}

/**
 * Takes PREMIUM away; the user falls back to what their trial alone gives today
 */
export class RevokePremiumUseCase extends ChangePremiumUseCase {
  protected targetState(user: User, now: DateTime): EntitlementState {
    return revokePremium(user.entitlement, now);
  }
}
