import { Logger, LogLevel } from '@shared/ports/Logger';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export class ConsoleLogger implements Logger {
  constructor(private readonly level: LogLevel = 'info') {}

  debug(message: string, context?: Record<string, unknown>): void {
    if (!this.enabled('debug')) return;
    console.debug(`[DEBUG] ${message}`, context ?? '');
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (!this.enabled('info')) return;
    console.log(`[INFO] ${message}`, context ?? '');
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (!this.enabled('warn')) return;
    console.warn(`[WARN] ${message}`, context ?? '');
  }

  error(message: string, context?: Record<string, unknown>): void {
    console.error(`[ERROR] ${message}`, context ?? '');
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }
}
