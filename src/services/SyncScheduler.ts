/**
 * SyncScheduler
 * Repeats a sync run on a fixed interval; a tick that lands while a run is in flight is skipped
 */
import type { Logger } from 'pino';
import { createChildLogger, symbols } from '../core/Logger.js';
import type { ExitCode, RunOutcome } from '../core/Application.js';

export class SyncScheduler {
  private readonly logger: Logger;
  private timer: NodeJS.Timeout | null = null;
  private current: Promise<void> | null = null;
  private _runs = 0;
  private _skipped = 0;
  private _lastExitCode: ExitCode = 0;

  constructor(
    private readonly runOnce: () => Promise<RunOutcome>,
    private readonly intervalMs: number
  ) {
    this.logger = createChildLogger({ service: 'Scheduler' });
  }

  get scheduled(): boolean {
    return this.timer !== null;
  }

  get busy(): boolean {
    return this.current !== null;
  }

  get runs(): number {
    return this._runs;
  }

  get skipped(): number {
    return this._skipped;
  }

  get lastExitCode(): ExitCode {
    return this._lastExitCode;
  }

  /**
   * Run once now, then every interval
   */
  start(): void {
    if (this.timer) {
      this.logger.warn('Already scheduled');
      return;
    }

    this.logger.info({ interval: this.intervalMs }, `${symbols.sync} Starting scheduled sync`);

    this.tick();
    this.timer = setInterval(() => this.tick(), this.intervalMs);
  }

  /**
   * Cancel future ticks and wait for the run in flight, if any
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.current) {
      this.logger.info('Waiting for the current sync to finish');
      await this.current;
    }
    this.logger.info('Scheduled sync stopped');
  }

  private tick(): void {
    if (this.current) {
      this._skipped++;
      this.logger.warn('Previous sync still running, skipping this interval');
      return;
    }
    this.current = this.execute().finally(() => {
      this.current = null;
    });
  }

  private async execute(): Promise<void> {
    this._runs++;
    try {
      const outcome = await this.runOnce();
      this._lastExitCode = outcome.exitCode;
      if (outcome.exitCode !== 0) {
        this.logger.warn({ run: this._runs }, 'Sync run failed, retrying at the next interval');
      }
    } catch (error) {
      // Unexpected errors end this run only; the schedule keeps going
      this._lastExitCode = 1;
      this.logger.error({ error, run: this._runs }, 'Sync run crashed');
    }
  }
}
