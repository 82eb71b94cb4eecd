import type { IUserRepository } from '../ports/IUserRepository';
import type { NotificationSettings } from '../types/NotificationSettings';
import type { SlotTable } from '../../../notifications/domain/services/SlotTable';
import { trialWarningDue } from '../../../notifications/domain/services/EligibilityFilter';
import { TrialWarning } from '../../../notifications/domain/value-objects/TrialWarning';
import { daysRemaining } from '../../domain/value-objects/EntitlementState';
import { NOTIFICATIONS_DISABLED } from '../../domain/value-objects/NotificationFrequency';
import { UserNotFoundError } from '../../../../domain/errors/UserNotFoundError';
import { systemClock, type Clock } from '../../../../shared/utils/time';

/**
 * GetNotificationSettingsUseCase - read side of the settings command
 */
export class GetNotificationSettingsUseCase {
  public constructor(
    private readonly userRepository: IUserRepository,
    private readonly slotTable: SlotTable,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * @throws UserNotFoundError if the user does not exist
   */
  public async execute(userId: string): Promise<NotificationSettings> {
    const user = await this.userRepository.findById(userId);
    if (!user) {
      throw new UserNotFoundError(userId);
    }

    const now = this.clock();
    const warning = trialWarningDue(user.entitlement, now);

    return {
      userId: user.id,
      notificationFrequency: user.notificationFrequency,
      enabled: user.notificationFrequency !== NOTIFICATIONS_DISABLED,
      utcOffset: user.effectiveUtcOffset,
      slots: this.slotTable.slotsFor(user.notificationFrequency).map((slot) => slot.toString()),
      entitlement: user.entitlement.kind,
      trialDaysRemaining: daysRemaining(user.entitlement, now),
      pendingTrialWarning: warning === TrialWarning.NONE ? null : warning,
    };
  }
}
