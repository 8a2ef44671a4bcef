import { LogLevel } from '@shared/ports/Logger';

export interface EngineConfig {
  pollIntervalMs: number;
  stopOnTaskError: boolean;
  demoTasks: boolean;
  logLevel: LogLevel;
}
