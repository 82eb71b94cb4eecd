import type { IDedupLedger } from '../ports/IDedupLedger';
import { systemClock, toIsoDate, type Clock } from '../../../../shared/utils/time';
import { logger } from '../../../../shared/logger';

/**
 * Drops ledger entries no user can still need.
 *
 * Local dates run at most one day behind the UTC date (UTC-12), so anything
 * scoped before `utcDate - 1 day` is unreachable.
 */
export class PruneDedupLedgerUseCase {
  public constructor(
    private readonly ledger: IDedupLedger,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * @returns Number of removed entries
   */
  public async execute(): Promise<number> {
    const cutoffDate = toIsoDate(this.clock().toUTC().minus({ days: 1 }));
    const removed = await this.ledger.pruneBefore(cutoffDate);

    logger.info({ msg: 'Dedup ledger pruned', cutoffDate, removed });

    return removed;
  }
}
