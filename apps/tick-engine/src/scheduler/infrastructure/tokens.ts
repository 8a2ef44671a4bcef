export const CLOCK = 'MonotonicClock';
export const LOGGER = 'Logger';
export const TASK_MANAGER = 'TaskManager';
export const TICK_SCHEDULER = 'TickScheduler';
export const RUN_POLLING_LOOP_USE_CASE = 'RunPollingLoopUseCase';
