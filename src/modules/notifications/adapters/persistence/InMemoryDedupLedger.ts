import type { IDedupLedger } from '../../application/ports/IDedupLedger';

/**
 * Dedup ledger held in process memory; contents are lost on restart
 */
export class InMemoryDedupLedger implements IDedupLedger {
  private readonly entries = new Map<string, Set<string>>();

  public async alreadySent(userId: string, scopeDate: string, slotKey: string): Promise<boolean> {
    return this.entries.get(scopeDate)?.has(this.entryKey(userId, slotKey)) ?? false;
  }

  public async recordSent(userId: string, scopeDate: string, slotKey: string): Promise<void> {
    const day = this.entries.get(scopeDate) ?? new Set<string>();
    day.add(this.entryKey(userId, slotKey));
    this.entries.set(scopeDate, day);
  }

  public async pruneBefore(cutoffDate: string): Promise<number> {
    let removed = 0;
    for (const [scopeDate, day] of this.entries) {
      // yyyy-MM-dd compares chronologically as a string
      if (scopeDate < cutoffDate) {
        removed += day.size;
        this.entries.delete(scopeDate);
      }
    }
    return removed;
  }

  public get size(): number {
    let total = 0;
    for (const day of this.entries.values()) {
      total += day.size;
    }
    return total;
  }

  private entryKey(userId: string, slotKey: string): string {
    return JSON.stringify([userId, slotKey]);
  }
}
