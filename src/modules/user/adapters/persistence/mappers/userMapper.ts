import { z } from 'zod';
import { User } from '../../../domain/entities/User';
import {
  EntitlementKind,
  EntitlementState,
  trialEndOf,
} from '../../../domain/value-objects/EntitlementState';
import { frequencyOrDisabled } from '../../../domain/value-objects/NotificationFrequency';
import { UtcOffset } from '../../../../../shared/value-objects/UtcOffset';
import {
  fromNullableStorageTimestamp,
  fromStorageTimestamp,
  toStorageTimestamp,
} from '../../../../../shared/utils/time';
import type { UserScheduleProfile } from '../../../../notifications/application/types/UserScheduleProfile';

/**
 * Shape of a `users` row as better-sqlite3 returns it.
 * Offset and frequency are read leniently, SQLite keeps whatever was written.
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const UserRowSchema = z.object({
  id: z.string(),
  chat_id: z.number().int(),
  full_name: z.string(),
  utc_offset: z.unknown(),
  notification_frequency: z.unknown(),
  entitlement: z.nativeEnum(EntitlementKind),
  trial_started_at: z.string().nullable(),
  trial_ends_at: z.string().nullable(),
  last_activity_at: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});

export type UserRow = z.infer<typeof UserRowSchema>;

/**
 * Rebuilds the tagged entitlement from its two columns
 * @throws Error when a trial state has no trial end (the schema CHECK forbids it)
 */
export function entitlementFromColumns(
  kind: EntitlementKind,
  trialEndsAt: string | null
): EntitlementState {
  const end = fromNullableStorageTimestamp(trialEndsAt);

  switch (kind) {
    case EntitlementKind.PREMIUM:
      return { kind, trialEndsAt: end };
    case EntitlementKind.NO_TRIAL:
      return { kind };
    case EntitlementKind.TRIAL_ACTIVE:
    case EntitlementKind.TRIAL_EXPIRED:
      if (end === null) {
        throw new Error(`Entitlement ${kind} stored without a trial end`);
      }
      return { kind, trialEndsAt: end };
  }
}

export function entitlementToColumns(state: EntitlementState): {
  entitlement: EntitlementKind;
  trial_ends_at: string | null;
} {
  const end = trialEndOf(state);
  return {
    entitlement: state.kind,
    trial_ends_at: end === null ? null : toStorageTimestamp(end),
  };
}

/**
 * Converts a validated row to a domain User entity.
 * Out-of-range offsets become "unset" and unknown frequencies become "disabled".
 */
export function userToDomain(row: UserRow): User {
  return new User({
    id: row.id,
    chatId: row.chat_id,
    fullName: row.full_name,
    utcOffset: UtcOffset.isValid(row.utc_offset) ? new UtcOffset(row.utc_offset) : null,
    notificationFrequency: frequencyOrDisabled(row.notification_frequency),
    entitlement: entitlementFromColumns(row.entitlement, row.trial_ends_at),
    trialStartedAt: fromNullableStorageTimestamp(row.trial_started_at),
    lastActivityAt: fromNullableStorageTimestamp(row.last_activity_at),
    createdAt: fromStorageTimestamp(row.created_at),
    updatedAt: fromStorageTimestamp(row.updated_at),
  });
}

/**
 * Converts a domain User entity to row values
 */
export function userToRow(user: User): UserRow {
  const { entitlement, trial_ends_at } = entitlementToColumns(user.entitlement);

  return {
    id: user.id,
    chat_id: user.chatId,
    full_name: user.fullName,
    utc_offset: user.utcOffset === null ? null : user.utcOffset.hours,
    notification_frequency: user.notificationFrequency,
    entitlement,
    trial_started_at: user.trialStartedAt === null ? null : toStorageTimestamp(user.trialStartedAt),
    trial_ends_at,
    last_activity_at: user.lastActivityAt === null ? null : toStorageTimestamp(user.lastActivityAt),
    created_at: toStorageTimestamp(user.createdAt),
    updated_at: toStorageTimestamp(user.updatedAt),
  };
}

/**
 * Converts a row to the scheduler's view. Offset and frequency stay as stored.
 * @throws Error on an unreadable timestamp or an inconsistent entitlement
 */
export function rowToScheduleProfile(row: UserRow): UserScheduleProfile {
  return {
    userId: row.id,
    chatId: row.chat_id,
    displayName: row.full_name,
    utcOffsetHours: row.utc_offset,
    notificationFrequency: row.notification_frequency,
    entitlement: entitlementFromColumns(row.entitlement, row.trial_ends_at),
    lastActivityAt: fromNullableStorageTimestamp(row.last_activity_at),
  };
}
