import { TaskManager } from '@scheduler/domain/TaskManager';
import { TickScheduler } from '@scheduler/application/ports/TickScheduler';
import { PollStats } from '@scheduler/application/PollStats';
import { Logger } from '@shared/ports/Logger';

export interface PollingLoopOptions {
  stopOnTaskError: boolean;
}

/**
 * Owns the polling cadence for a TaskManager in a long-running process.
 *
 * The manager lets task errors escape; this loop is the caller that
 * decides what to do with them: log, count, and either keep polling or
 * stop, depending on `stopOnTaskError`.
 */
export class RunPollingLoopUseCase {
  private running = false;
  private readonly _stats: PollStats = { polls: 0, fired: 0, failures: 0 };

  constructor(
    private readonly taskManager: TaskManager,
    private readonly tickScheduler: TickScheduler,
    private readonly logger: Logger,
    private readonly options: PollingLoopOptions = { stopOnTaskError: false },
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  get stats(): Readonly<PollStats> {
    return this._stats;
  }

  start(): void {
    if (this.running) throw new Error('Polling loop is already running');
    this.running = true;

    this.logger.info('Polling loop started', { tasks: this.taskManager.size });
    this.tickScheduler.start((elapsedMs) => this.onTick(elapsedMs));
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;
    this.tickScheduler.stop();

    this.logger.info('Polling loop stopped', { ...this._stats });
  }

  /**
   * Runs one sweep over the managed tasks and returns how many fired.
   * A sweep interrupted by a failing task reports 0.
   */
  pollOnce(): number {
    this._stats.polls++;
    try {
      const fired = this.taskManager.update();
      this._stats.fired += fired;
      return fired;
    } catch (err) {
      this._stats.failures++;
      this.logger.error('Task failed during poll', {
        error: err instanceof Error ? err.message : String(err),
      });
      if (this.options.stopOnTaskError) {
        this.logger.warn('Stopping polling loop after task failure', {
          failures: this._stats.failures,
        });
        this.stop();
      }
      return 0;
    }
  }

  private onTick(elapsedMs: number): void {
    if (!this.running) return;

    const fired = this.pollOnce();
    if (fired > 0) {
      this.logger.debug('Tasks fired', { fired, elapsedMs });
    }
  }
}
