import {
  Module,
  OnApplicationBootstrap,
  OnApplicationShutdown,
  Inject,
} from '@nestjs/common';
import { EngineConfigModule } from './config/config.module';
import { ENGINE_CONFIG } from './config/env-config.provider';
import { EngineConfig } from './config/EngineConfig';
import { SchedulerModule } from '@scheduler/infrastructure/scheduler.module';
import {
  CLOCK,
  LOGGER,
  TASK_MANAGER,
  RUN_POLLING_LOOP_USE_CASE,
} from '@scheduler/infrastructure/tokens';
import { RunPollingLoopUseCase } from '@scheduler/application/RunPollingLoopUseCase';
import { TaskManager } from '@scheduler/domain/TaskManager';
import { MonotonicClock } from '@shared/ports/MonotonicClock';
import { Logger } from '@shared/ports/Logger';
import { registerDemoTasks } from '@demo/registerDemoTasks';

@Module({
  imports: [EngineConfigModule, SchedulerModule],
})
export class AppModule
  implements OnApplicationBootstrap, OnApplicationShutdown
{
  constructor(
    @Inject(ENGINE_CONFIG) private readonly config: EngineConfig,
    @Inject(TASK_MANAGER) private readonly taskManager: TaskManager,
    @Inject(CLOCK) private readonly clock: MonotonicClock,
    @Inject(LOGGER) private readonly logger: Logger,
    @Inject(RUN_POLLING_LOOP_USE_CASE)
    private readonly pollingLoop: RunPollingLoopUseCase,
  ) {}

  onApplicationBootstrap(): void {
    if (this.config.demoTasks) {
      const keys = registerDemoTasks(this.taskManager, this.clock, this.logger);
      this.logger.info('Registered demo tasks', { keys });
    }
    this.pollingLoop.start();
  }

  onApplicationShutdown(): void {
    this.pollingLoop.stop();
  }
}
