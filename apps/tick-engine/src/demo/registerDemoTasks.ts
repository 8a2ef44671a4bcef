import { Task } from '@scheduler/domain/Task';
import { TaskManager } from '@scheduler/domain/TaskManager';
import { Duration } from '@shared/kernel/Duration';
import { MonotonicClock } from '@shared/ports/MonotonicClock';
import { Logger } from '@shared/ports/Logger';

export const ONE_SECOND_KEY = '1Sec';
export const TEN_SECONDS_KEY = '10Sec';

/**
 * Sample workload: four announcers at 1s, 5s, 10s and 15s. The 15s task
 * retires the 1s task the first time it runs.
 */
export function registerDemoTasks(
  manager: TaskManager,
  clock: MonotonicClock,
  logger: Logger,
): string[] {
  const announce = (label: string): void => {
    logger.info(`${label} Task`);
  };

  const keys: string[] = [];
  const register = (task: Task, key?: string): void => {
    const result = manager.add(task, key);
    if (result.added) {
      keys.push(result.key);
    } else {
      logger.warn('Demo task not registered', { key: result.key, reason: result.reason });
    }
  };

  register(Task.bind(clock, Duration.fromSeconds(1), announce, '1 Second'), ONE_SECOND_KEY);
  register(Task.bind(clock, Duration.fromSeconds(5), announce, '5 Second'));
  register(Task.bind(clock, Duration.fromSeconds(10), announce, '10 Second'), TEN_SECONDS_KEY);
  register(
    Task.bind(clock, Duration.fromSeconds(15), (label: string) => {
      announce(label);
      if (manager.remove(ONE_SECOND_KEY)) {
        logger.info('Removed task', { key: ONE_SECOND_KEY });
      }
    }, '15 Second'),
  );

  return keys;
}
