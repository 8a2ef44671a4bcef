import { Module } from '@nestjs/common';
import { EngineConfigModule } from '@config/config.module';
import { ENGINE_CONFIG } from '@config/env-config.provider';
import { EngineConfig } from '@config/EngineConfig';
import { Logger } from '@shared/ports/Logger';
import { MonotonicClock } from '@shared/ports/MonotonicClock';
import { ConsoleLogger } from '@shared/infrastructure/ConsoleLogger';
import { TaskManager } from '@scheduler/domain/TaskManager';
import { TickScheduler } from '@scheduler/application/ports/TickScheduler';
import { RunPollingLoopUseCase } from '@scheduler/application/RunPollingLoopUseCase';
import { HrtimeClock } from '@scheduler/infrastructure/HrtimeClock';
import { SetIntervalTickScheduler } from '@scheduler/infrastructure/SetIntervalTickScheduler';
import {
  CLOCK,
  LOGGER,
  TASK_MANAGER,
  TICK_SCHEDULER,
  RUN_POLLING_LOOP_USE_CASE,
} from '@scheduler/infrastructure/tokens';

@Module({
  imports: [EngineConfigModule],
  providers: [
    // ── Port → Implementation mappings ──────────────────
    {
      provide: CLOCK,
      useFactory: (): MonotonicClock => new HrtimeClock(),
    },
    {
      provide: LOGGER,
      useFactory: (config: EngineConfig): Logger => new ConsoleLogger(config.logLevel),
      inject: [ENGINE_CONFIG],
    },
    {
      provide: TICK_SCHEDULER,
      useFactory: (config: EngineConfig): TickScheduler =>
        new SetIntervalTickScheduler(config.pollIntervalMs),
      inject: [ENGINE_CONFIG],
    },
    {
      provide: TASK_MANAGER,
      useFactory: (): TaskManager => new TaskManager(),
    },

    // ── Use cases ───────────────────────────────────────
    {
      provide: RUN_POLLING_LOOP_USE_CASE,
      useFactory: (
        config: EngineConfig,
        taskManager: TaskManager,
        tickScheduler: TickScheduler,
        logger: Logger,
      ): RunPollingLoopUseCase =>
        new RunPollingLoopUseCase(taskManager, tickScheduler, logger, {
          stopOnTaskError: config.stopOnTaskError,
        }),
      inject: [ENGINE_CONFIG, TASK_MANAGER, TICK_SCHEDULER, LOGGER],
    },
  ],
  exports: [CLOCK, LOGGER, TASK_MANAGER, RUN_POLLING_LOOP_USE_CASE],
})
export class SchedulerModule {}
