import { DateTime } from 'luxon';
import { ValidationError } from '../../../../domain/errors/ValidationError';
import { UtcOffset } from '../../../../shared/value-objects/UtcOffset';
import {
  EntitlementState,
  expireTrial,
  grantPremium,
  revokePremium,
  startTrial,
} from '../value-objects/EntitlementState';
import { NotificationFrequency, isNotificationFrequency } from '../value-objects/NotificationFrequency';

export interface UserProps {
  id: string;
  chatId: number;
  fullName: string;
  /** null until the user tells us their time; read as UTC+0 */
  utcOffset: UtcOffset | null;
  notificationFrequency: NotificationFrequency;
  entitlement: EntitlementState;
  trialStartedAt: DateTime | null;
  lastActivityAt: DateTime | null;
  createdAt: DateTime;
  updatedAt: DateTime;
}

/**
 * User entity
 * A registered diary user: who to message, when, and what they are entitled to
 * Immutable - all update methods return new instances
 */
export class User {
  public readonly id: string;
  public readonly chatId: number;
  public readonly fullName: string;
  public readonly utcOffset: UtcOffset | null;
  public readonly notificationFrequency: NotificationFrequency;
  public readonly entitlement: EntitlementState;
  public readonly trialStartedAt: DateTime | null;
  public readonly lastActivityAt: DateTime | null;
  public readonly createdAt: DateTime;
  public readonly updatedAt: DateTime;

  public constructor(props: UserProps) {
    if (!props.fullName || props.fullName.trim().length === 0) {
      throw new ValidationError('Full name cannot be empty');
    }
    if (props.fullName.length > 100) {
      throw new ValidationError('Full name cannot exceed 100 characters');
    }
    if (!Number.isSafeInteger(props.chatId)) {
      throw new ValidationError(`Chat id must be an integer, got ${props.chatId}`);
    }
    if (!isNotificationFrequency(props.notificationFrequency)) {
      throw new ValidationError(
        `Notification frequency must be one of 0, 1, 2, 4, 6, got ${String(props.notificationFrequency)}`
      );
    }

    this.id = props.id;
    this.chatId = props.chatId;
    this.fullName = props.fullName;
    this.utcOffset = props.utcOffset;
    this.notificationFrequency = props.notificationFrequency;
    this.entitlement = props.entitlement;
    this.trialStartedAt = props.trialStartedAt;
    this.lastActivityAt = props.lastActivityAt;
    this.createdAt = props.createdAt;
    this.updatedAt = props.updatedAt;
  }

  /**
   * Offset used for scheduling: the stored one, or UTC+0 when unset
   */
  public get effectiveUtcOffset(): UtcOffset {
    return this.utcOffset ?? UtcOffset.UTC;
  }

  /**
   * Completes registration by starting the trial (immutable - returns new instance)
   * @throws InvalidStateTransitionError if a trial was already started
   */
  public startTrial(now: DateTime, durationDays: number): User {
    return new User({
      ...this,
      entitlement: startTrial(this.entitlement, now, durationDays),
      trialStartedAt: now,
      updatedAt: now,
    });
  }

  public expireTrial(now: DateTime = DateTime.utc()): User {
    return new User({ ...this, entitlement: expireTrial(this.entitlement), updatedAt: now });
  }

  public grantPremium(now: DateTime = DateTime.utc()): User {
    return new User({ ...this, entitlement: grantPremium(this.entitlement), updatedAt: now });
  }

  public revokePremium(now: DateTime = DateTime.utc()): User {
    return new User({ ...this, entitlement: revokePremium(this.entitlement, now), updatedAt: now });
  }

  /**
   * Updates reminder frequency and/or offset (immutable - returns new instance)
   */
  public updateNotificationSettings(
    settings: { notificationFrequency?: NotificationFrequency; utcOffset?: UtcOffset },
    now: DateTime = DateTime.utc()
  ): User {
    return new User({
      ...this,
      notificationFrequency: settings.notificationFrequency ?? this.notificationFrequency,
      utcOffset: settings.utcOffset ?? this.utcOffset,
      updatedAt: now,
    });
  }

  public recordActivity(at: DateTime = DateTime.utc()): User {
    return new User({ ...this, lastActivityAt: at, updatedAt: at });
  }
}
