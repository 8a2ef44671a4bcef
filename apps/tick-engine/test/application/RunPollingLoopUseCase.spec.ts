import { RunPollingLoopUseCase } from '@scheduler/application/RunPollingLoopUseCase';
import { TickScheduler } from '@scheduler/application/ports/TickScheduler';
import { TaskManager } from '@scheduler/domain/TaskManager';
import { Task } from '@scheduler/domain/Task';
import { Duration } from '@shared/kernel/Duration';
import { Logger } from '@shared/ports/Logger';
import { ManualClock } from '../helpers/ManualClock';
import { createMockLogger } from '../helpers/mock-logger';

describe('RunPollingLoopUseCase', () => {
  let clock: ManualClock;
  let taskManager: TaskManager;
  let tickScheduler: TickScheduler;
  let logger: jest.Mocked<Logger>;
  let useCase: RunPollingLoopUseCase;

  // Capture tick callback registered via TickScheduler
  let tickCallback: ((elapsedMs: number) => void) | null;

  const tick = (elapsedMs: number): void => {
    if (!tickCallback) throw new Error('tick scheduler was not started');
    tickCallback(elapsedMs);
  };

  const failingTask = (message: string) =>
    new Task(Duration.zero(), () => {
      throw new Error(message);
    }, clock);

  beforeEach(() => {
    clock = new ManualClock();
    taskManager = new TaskManager();
    tickCallback = null;
    tickScheduler = {
      start: jest.fn((cb: (elapsedMs: number) => void) => {
        tickCallback = cb;
      }),
      stop: jest.fn(),
    };
    logger = createMockLogger();
    useCase = new RunPollingLoopUseCase(taskManager, tickScheduler, logger);
  });

  describe('start', () => {
    it('starts the tick scheduler and logs the task count', () => {
      taskManager.add(new Task(Duration.fromSeconds(1), jest.fn(), clock));

      useCase.start();

      expect(useCase.isRunning).toBe(true);
      expect(tickScheduler.start).toHaveBeenCalledTimes(1);
      expect(logger.info).toHaveBeenCalledWith('Polling loop started', { tasks: 1 });
    });

    it('throws if already running', () => {
      useCase.start();
      expect(() => useCase.start()).toThrow('Polling loop is already running');
    });
  });

  describe('ticks', () => {
    it('polls the task manager on every tick', () => {
      const work = jest.fn();
      taskManager.add(new Task(Duration.fromMillis(100), work, clock));
      useCase.start();

      clock.advanceMillis(50);
      tick(50);
      expect(work).not.toHaveBeenCalled();

      clock.advanceMillis(50);
      tick(100);
      expect(work).toHaveBeenCalledTimes(1);
      expect(useCase.stats).toEqual({ polls: 2, fired: 1, failures: 0 });
    });

    it('logs fired tasks at debug level with elapsed time', () => {
      taskManager.add(new Task(Duration.zero(), jest.fn(), clock));
      useCase.start();

      tick(10);

      expect(logger.debug).toHaveBeenCalledWith('Tasks fired', { fired: 1, elapsedMs: 10 });
    });

    it('ignores ticks after stop', () => {
      const work = jest.fn();
      taskManager.add(new Task(Duration.zero(), work, clock));
      useCase.start();
      useCase.stop();

      tick(10);

      expect(work).not.toHaveBeenCalled();
      expect(useCase.stats.polls).toBe(0);
    });
  });

  describe('pollOnce', () => {
    it('returns how many tasks fired', () => {
      taskManager.add(new Task(Duration.zero(), jest.fn(), clock));
      taskManager.add(new Task(Duration.zero(), jest.fn(), clock));

      expect(useCase.pollOnce()).toBe(2);
    });

    it('logs and counts a task failure, then keeps running', () => {
      taskManager.add(failingTask('disk full'));
      useCase.start();

      expect(useCase.pollOnce()).toBe(0);

      expect(logger.error).toHaveBeenCalledWith('Task failed during poll', {
        error: 'disk full',
      });
      expect(useCase.stats.failures).toBe(1);
      expect(useCase.isRunning).toBe(true);
      expect(tickScheduler.stop).not.toHaveBeenCalled();
    });

    it('stringifies non-Error throws', () => {
      taskManager.add(
        new Task(Duration.zero(), () => {
          throw 'plain string';
        }, clock),
      );

      useCase.pollOnce();

      expect(logger.error).toHaveBeenCalledWith('Task failed during poll', {
        error: 'plain string',
      });
    });

    it('stops the loop on failure when stopOnTaskError is set', () => {
      useCase = new RunPollingLoopUseCase(taskManager, tickScheduler, logger, {
        stopOnTaskError: true,
      });
      taskManager.add(failingTask('bad input'));
      useCase.start();

      tick(10);

      expect(useCase.isRunning).toBe(false);
      expect(tickScheduler.stop).toHaveBeenCalledTimes(1);
      expect(logger.warn).toHaveBeenCalledWith('Stopping polling loop after task failure', {
        failures: 1,
      });
    });
  });

  describe('stop', () => {
    it('stops the scheduler and logs final stats', () => {
      taskManager.add(new Task(Duration.zero(), jest.fn(), clock));
      useCase.start();
      tick(10);

      useCase.stop();

      expect(tickScheduler.stop).toHaveBeenCalledTimes(1);
      expect(logger.info).toHaveBeenLastCalledWith('Polling loop stopped', {
        polls: 1,
        fired: 1,
        failures: 0,
      });
    });

    it('is idempotent', () => {
      useCase.start();
      useCase.stop();
      useCase.stop();

      expect(tickScheduler.stop).toHaveBeenCalledTimes(1);
    });

    it('can be restarted', () => {
      useCase.start();
      useCase.stop();

      expect(() => useCase.start()).not.toThrow();
      expect(tickScheduler.start).toHaveBeenCalledTimes(2);
    });
  });
});
