import type { UtcOffset } from '../../../../shared/value-objects/UtcOffset';
import type { EntitlementKind } from '../../domain/value-objects/EntitlementState';
import type { NotificationFrequency } from '../../domain/value-objects/NotificationFrequency';
import type { DueTrialWarning } from '../../../notifications/domain/value-objects/TrialWarning';

/**
 * What the settings command shows a user
 */
export interface NotificationSettings {
  userId: string;
  notificationFrequency: NotificationFrequency;
  enabled: boolean;
  /** Effective offset; UTC+0 when the user never set one */
  utcOffset: UtcOffset;
  /** Local HH:MM reminder times for the chosen frequency */
  slots: string[];
  entitlement: EntitlementKind;
  trialDaysRemaining: number | null;
  /** Most urgent trial warning currently due, if any */
  pendingTrialWarning: DueTrialWarning | null;
}
