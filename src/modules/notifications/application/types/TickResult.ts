/**
 * Counters reported by one scheduler tick
 */
export interface TickResult {
  usersProcessed: number;
  usersFailed: number;
  remindersSent: number;
  motivationsSent: number;
  reflectionsSent: number;
  warningsSent: number;
  deliveriesFailed: number;
  duplicatesSkipped: number;
  /** true when stop was requested before every user was processed */
  aborted: boolean;
  durationMs: number;
}
