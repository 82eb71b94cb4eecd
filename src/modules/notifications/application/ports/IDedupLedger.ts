/**
 * Port for the record of notifications already sent.
 *
 * An entry is the triple (userId, scopeDate, slotKey); scopeDate is a
 * `yyyy-MM-dd` calendar date in the user's local time.
 */
/* eslint-disable @typescript-eslint/naming-convention */
export interface IDedupLedger {
  alreadySent(userId: string, scopeDate: string, slotKey: string): Promise<boolean>;

  /**
   * Records a send. Recording the same triple twice is a no-op.
   */
  recordSent(userId: string, scopeDate: string, slotKey: string): Promise<void>;

  /**
   * Removes entries whose scope date is strictly before `cutoffDate`.
   *
   * @returns Number of removed entries
   */
  pruneBefore(cutoffDate: string): Promise<number>;
}
