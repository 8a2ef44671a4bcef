import { Duration } from '@shared/kernel/Duration';
import { MonotonicClock } from '@shared/ports/MonotonicClock';

export type BoundWork = () => void;

/**
 * Periodic gate around one bound callable.
 *
 * A task never fires by itself: each `update()` reads the clock and, once
 * the deadline has passed, reschedules from "now" and runs the work. A
 * poller that falls behind gets a single fire, not one per missed interval.
 */
export class Task {
  private armed = false;
  private _interval: Duration = Duration.zero();
  private _nextFireAt = 0n;

  constructor(
    interval: Duration | null,
    private readonly work: BoundWork,
    private readonly clock: MonotonicClock,
  ) {
    if (interval !== null) {
      this.setInterval(interval);
    }
  }

  /**
   * Builds a task whose callable has `args` permanently bound to it.
   */
  static bind<A extends unknown[]>(
    clock: MonotonicClock,
    interval: Duration,
    fn: (...args: A) => unknown,
    ...args: A
  ): Task {
    return new Task(interval, () => {
      fn(...args);
    }, clock);
  }

  get isArmed(): boolean {
    return this.armed;
  }

  get interval(): Duration {
    return this._interval;
  }

  get nextFireAt(): bigint {
    return this._nextFireAt;
  }

  setIntervalSecs(seconds: number): void {
    this.setInterval(Duration.fromSeconds(seconds));
  }

  setIntervalMillis(millis: number): void {
    this.setInterval(Duration.fromMillis(millis));
  }

  setIntervalNanos(nanos: number | bigint): void {
    this.setInterval(Duration.fromNanos(nanos));
  }

  /**
   * Replaces the interval and restarts the countdown from now. Progress
   * toward the previous deadline is discarded.
   */
  setInterval(interval: Duration): void {
    this._interval = interval;
    this.armed = true;
    this._nextFireAt = this.clock.now() + interval.toNanos();
  }

  disarm(): void {
    this.armed = false;
  }

  /**
   * Fires the work if the deadline has been reached. Returns whether it
   * fired. Errors thrown by the work propagate to the caller; the next
   * deadline is already set by then.
   */
  update(): boolean {
    if (!this.armed) return false;

    const now = this.clock.now();
    if (now < this._nextFireAt) return false;

    this._nextFireAt = now + this._interval.toNanos();
    this.work();
    return true;
  }
}
