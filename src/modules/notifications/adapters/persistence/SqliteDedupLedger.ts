import { DateTime } from 'luxon';
import type { SqliteDatabase } from '../../../../shared/database/connection';
import type { IDedupLedger } from '../../application/ports/IDedupLedger';
import { InfrastructureError } from '../../../../domain/errors/InfrastructureError';
import { toStorageTimestamp } from '../../../../shared/utils/time';

/**
 * Dedup ledger in the sent_notifications table; survives restarts
 */
export class SqliteDedupLedger implements IDedupLedger {
  public constructor(private readonly db: SqliteDatabase) {}

  public async alreadySent(userId: string, scopeDate: string, slotKey: string): Promise<boolean> {
    try {
      const row = this.db
        .prepare(
          `SELECT 1 FROM sent_notifications
           WHERE user_id = ? AND scope_date = ? AND slot_key = ?`
        )
        .get(userId, scopeDate, slotKey);
      return row !== undefined;
    } catch (error) {
      throw new InfrastructureError(`Failed to read dedup ledger for user ${userId}`, error);
    }
  }

  /**
   * The composite primary key turns a repeated record into a no-op
   */
  public async recordSent(userId: string, scopeDate: string, slotKey: string): Promise<void> {
    try {
      this.db
        .prepare(
          `INSERT OR IGNORE INTO sent_notifications (user_id, scope_date, slot_key, sent_at)
           VALUES (?, ?, ?, ?)`
        )
        .run(userId, scopeDate, slotKey, toStorageTimestamp(DateTime.utc()));
    } catch (error) {
      throw new InfrastructureError(`Failed to write dedup ledger for user ${userId}`, error);
    }
  }

  public async pruneBefore(cutoffDate: string): Promise<number> {
    try {
      return this.db.prepare('DELETE FROM sent_notifications WHERE scope_date < ?').run(cutoffDate)
        .changes;
    } catch (error) {
      throw new InfrastructureError('Failed to prune dedup ledger', error);
    }
  }
}
