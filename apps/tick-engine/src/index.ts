export { Task, type BoundWork } from '@scheduler/domain/Task';
export { TaskManager } from '@scheduler/domain/TaskManager';
export type { AddTaskResult } from '@scheduler/domain/AddTaskResult';
export {
  RunPollingLoopUseCase,
  type PollingLoopOptions,
} from '@scheduler/application/RunPollingLoopUseCase';
export type { PollStats } from '@scheduler/application/PollStats';
export type { TickScheduler } from '@scheduler/application/ports/TickScheduler';
export { HrtimeClock } from '@scheduler/infrastructure/HrtimeClock';
export { SetIntervalTickScheduler } from '@scheduler/infrastructure/SetIntervalTickScheduler';
export { Duration, type DurationParts } from '@shared/kernel/Duration';
export {
  DomainError,
  InvalidDurationError,
  ReentrantUpdateError,
} from '@shared/kernel/DomainError';
export type { MonotonicClock } from '@shared/ports/MonotonicClock';
export type { Logger, LogLevel } from '@shared/ports/Logger';
export { ConsoleLogger } from '@shared/infrastructure/ConsoleLogger';
