import type { SqliteDatabase } from '../../../../shared/database/connection';
import type { IUserRepository } from '../../application/ports/IUserRepository';
import type { IScheduleProfileSource } from '../../../notifications/application/ports/IScheduleProfileSource';
import type { UserScheduleProfile } from '../../../notifications/application/types/UserScheduleProfile';
import type { User } from '../../domain/entities/User';
import { EntitlementKind, EntitlementState } from '../../domain/value-objects/EntitlementState';
import { InfrastructureError } from '../../../../domain/errors/InfrastructureError';
import { UserAlreadyRegisteredError } from '../../../../domain/errors/UserAlreadyRegisteredError';
import { UserNotFoundError } from '../../../../domain/errors/UserNotFoundError';
import { toStorageTimestamp } from '../../../../shared/utils/time';
import { errorFields } from '../../../../shared/utils/errors';
import { logger } from '../../../../shared/logger';
import { DateTime } from 'luxon';
import {
  UserRow,
  UserRowSchema,
  entitlementToColumns,
  rowToScheduleProfile,
  userToDomain,
  userToRow,
} from './mappers/userMapper';

const USER_COLUMNS = `id, chat_id, full_name, utc_offset, notification_frequency, entitlement,
  trial_started_at, trial_ends_at, last_activity_at, created_at, updated_at`;

function rowId(row: unknown): string | undefined {
  return typeof row === 'object' && row !== null && 'id' in row && typeof row.id === 'string'
    ? row.id
    : undefined;
}

function isUniqueViolation(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'SQLITE_CONSTRAINT_UNIQUE' || error.code === 'SQLITE_CONSTRAINT_PRIMARYKEY')
  );
}

/**
 * SQLite implementation of IUserRepository and of the scheduler's IScheduleProfileSource.
 *
 * Rows are validated with zod on the way out of the database, so a column
 * that drifted from the schema surfaces as an InfrastructureError instead of
 * a half-built entity. The scheduler listing is the exception: an unreadable
 * row is logged and left out so the remaining users are still served.
 */
export class SqliteUserRepository implements IUserRepository, IScheduleProfileSource {
  public constructor(private readonly db: SqliteDatabase) {}

  /**
   * Inserts a newly registered user
   */
  public async create(user: User): Promise<User> {
    const row = userToRow(user);

    try {
      this.db
        .prepare(
          `INSERT INTO users (${USER_COLUMNS})
           VALUES (@id, @chat_id, @full_name, @utc_offset, @notification_frequency, @entitlement,
                   @trial_started_at, @trial_ends_at, @last_activity_at, @created_at, @updated_at)`
        )
        .run(row);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new UserAlreadyRegisteredError(user.chatId);
      }
      throw new InfrastructureError(`Failed to create user ${user.id}`, error);
    }

    return this.requireById(user.id);
  }

  public async findById(userId: string): Promise<User | null> {
    const row = this.selectOne(`SELECT ${USER_COLUMNS} FROM users WHERE id = ?`, userId);
    return row === undefined ? null : userToDomain(row);
  }

  public async findByChatId(chatId: number): Promise<User | null> {
    const row = this.selectOne(`SELECT ${USER_COLUMNS} FROM users WHERE chat_id = ?`, chatId);
    return row === undefined ? null : userToDomain(row);
  }

  /**
   * Writes every mutable column; id, chat_id and created_at never change
   */
  public async update(user: User): Promise<User> {
    const row = userToRow(user);

    let changes: number;
    try {
      changes = this.db
        .prepare(
          `UPDATE users SET
             full_name = @full_name,
             utc_offset = @utc_offset,
             notification_frequency = @notification_frequency,
             entitlement = @entitlement,
             trial_started_at = @trial_started_at,
             trial_ends_at = @trial_ends_at,
             last_activity_at = @last_activity_at,
             updated_at = @updated_at
           WHERE id = @id`
        )
        .run(row).changes;
    } catch (error) {
      throw new InfrastructureError(`Failed to update user ${user.id}`, error);
    }

    if (changes === 0) {
      throw new UserNotFoundError(user.id);
    }

    return this.requireById(user.id);
  }

  /**
   * Premium users and users in an active trial, oldest registration first.
   * Rows that cannot be read are skipped with a warning.
   */
  public async listActiveScheduleProfiles(): Promise<UserScheduleProfile[]> {
    let rows: unknown[];
    try {
      rows = this.db
        .prepare(
          `SELECT ${USER_COLUMNS} FROM users
           WHERE entitlement IN (?, ?)
           ORDER BY created_at, id`
        )
        .all(EntitlementKind.PREMIUM, EntitlementKind.TRIAL_ACTIVE);
    } catch (error) {
      throw new InfrastructureError('Failed to list schedule profiles', error);
    }

    const profiles: UserScheduleProfile[] = [];
    for (const row of rows) {
      try {
        profiles.push(rowToScheduleProfile(this.parseRow(row)));
      } catch (error) {
        logger.warn({
          msg: 'Skipping unreadable users row',
          userId: rowId(row),
          ...errorFields(error),
        });
      }
    }
    return profiles;
  }

  public async updateEntitlement(userId: string, newState: EntitlementState): Promise<void> {
    const columns = entitlementToColumns(newState);

    let changes: number;
    try {
      changes = this.db
        .prepare(
          `UPDATE users
           SET entitlement = @entitlement, trial_ends_at = @trial_ends_at, updated_at = @updated_at
           WHERE id = @id`
        )
        .run({ ...columns, updated_at: toStorageTimestamp(DateTime.utc()), id: userId }).changes;
    } catch (error) {
      throw new InfrastructureError(`Failed to update entitlement of user ${userId}`, error);
    }

    if (changes === 0) {
      throw new UserNotFoundError(userId);
    }
  }

  private async requireById(userId: string): Promise<User> {
    const user = await this.findById(userId);
    if (!user) {
      throw new UserNotFoundError(userId);
    }
    return user;
  }

  private selectOne(sql: string, param: string | number): UserRow | undefined {
    let row: unknown;
    try {
      row = this.db.prepare(sql).get(param);
    } catch (error) {
      throw new InfrastructureError('Failed to read user', error);
    }
    return row === undefined ? undefined : this.parseRow(row);
  }

  private parseRow(row: unknown): UserRow {
    const result = UserRowSchema.safeParse(row);
    if (!result.success) {
      throw new InfrastructureError('Unexpected users row shape', result.error);
    }
    return result.data;
  }
}
