import type { RunNotificationTickUseCase } from '../../../modules/notifications/application/use-cases/RunNotificationTickUseCase';
import type { PruneDedupLedgerUseCase } from '../../../modules/notifications/application/use-cases/PruneDedupLedgerUseCase';
import { logger } from '../../../shared/logger';
import { errorFields } from '../../../shared/utils/errors';
import { systemClock, toIsoDate, type Clock } from '../../../shared/utils/time';

export enum SchedulerState {
  IDLE = 'IDLE',
  TICKING = 'TICKING',
  STOPPED = 'STOPPED',
}

export interface NotificationSchedulerOptions {
  tickIntervalMs: number;
  clock?: Clock;
}

/**
 * In-process scheduler loop
 *
 * **Timing:**
 * Ticks once right away on start, then on every boundary of `tickIntervalMs`
 * (with the default of one minute, at hh:mm:00). The next tick is only
 * scheduled once the current one has finished, so ticks never overlap and an
 * overlong tick pushes the next one to the following boundary.
 *
 * **Failures:**
 * A tick that throws (the user list could not be loaded) is logged and the
 * loop carries on at the next boundary.
 *
 * **Ledger pruning:**
 * The first tick of each UTC day prunes the dedup ledger before the tick runs.
 *
 * **Shutdown:**
 * `stop()` cancels the pending timer, signals the running tick to stop after
 * its current user, and resolves once that tick has returned.
 */
export class NotificationScheduler {
  private state = SchedulerState.IDLE;
  private stopRequested = false;
  private started = false;
  private timer: NodeJS.Timeout | undefined;
  private inFlight: Promise<void> | undefined;
  private lastPruneDate: string | undefined;
  private readonly abortController = new AbortController();
  private readonly clock: Clock;

  public constructor(
    private readonly runTick: Pick<RunNotificationTickUseCase, 'execute'>,
    private readonly pruneLedger: Pick<PruneDedupLedgerUseCase, 'execute'>,
    private readonly options: NotificationSchedulerOptions
  ) {
    this.clock = options.clock ?? systemClock;
  }

  public get currentState(): SchedulerState {
    return this.state;
  }

  /**
   * @throws Error if the scheduler was already stopped
   */
  public start(): void {
    if (this.stopRequested) {
      throw new Error('Notification scheduler cannot be restarted after stop');
    }
    if (this.started) {
      return;
    }
    this.started = true;

    logger.info({
      msg: 'Notification scheduler started',
      tickIntervalMs: this.options.tickIntervalMs,
    });

    this.runTickNow();
  }

  public async stop(): Promise<void> {
    if (this.stopRequested) {
      await this.inFlight;
      return;
    }
    this.stopRequested = true;

    clearTimeout(this.timer);
    this.timer = undefined;
    this.abortController.abort();

    await this.inFlight;
    this.state = SchedulerState.STOPPED;

    logger.info({ msg: 'Notification scheduler stopped' });
  }

  /**
   * Milliseconds from now until the next interval boundary (never 0)
   */
  public delayUntilNextBoundary(): number {
    const interval = this.options.tickIntervalMs;
    return interval - (this.clock().toMillis() % interval);
  }

  private runTickNow(): void {
    this.inFlight = this.tick().finally(() => {
      this.inFlight = undefined;
      this.scheduleNext();
    });
  }

  private scheduleNext(): void {
    if (this.stopRequested) {
      return;
    }
    this.timer = setTimeout(() => this.runTickNow(), this.delayUntilNextBoundary());
  }

  private async tick(): Promise<void> {
    this.state = SchedulerState.TICKING;

    try {
      await this.pruneOncePerDay();
      await this.runTick.execute(this.abortController.signal);
    } catch (error) {
      logger.error({
        msg: 'Notification tick failed, retrying at next boundary',
        ...errorFields(error),
      });
    } finally {
      this.state = this.stopRequested ? SchedulerState.STOPPED : SchedulerState.IDLE;
    }
  }

  private async pruneOncePerDay(): Promise<void> {
    const utcDate = toIsoDate(this.clock().toUTC());
    if (utcDate === this.lastPruneDate) {
      return;
    }

    try {
      await this.pruneLedger.execute();
      this.lastPruneDate = utcDate;
    } catch (error) {
      logger.error({ msg: 'Dedup ledger pruning failed', ...errorFields(error) });
    }
  }
}
