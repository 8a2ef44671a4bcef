import { EngineConfig } from '@config/EngineConfig';
import { Logger } from '@shared/ports/Logger';

export interface ClosableApp {
  close(): Promise<void>;
}

export function logStartup(config: EngineConfig, logger: Logger): void {
  logger.info('Tick engine started', {
    pollIntervalMs: config.pollIntervalMs,
    demoTasks: config.demoTasks,
    stopOnTaskError: config.stopOnTaskError,
  });
}

/**
 * Returns a signal handler that closes `app` on the first signal only.
 * Later signals are logged and ignored while the close is in flight.
 */
export function createShutdownHandler(
  app: ClosableApp,
  logger: Logger,
): (signal: string) => Promise<void> {
  let shuttingDown = false;

  return async (signal: string): Promise<void> => {
    if (shuttingDown) {
      logger.warn('Shutdown already in progress', { signal });
      return;
    }
    shuttingDown = true;

    logger.info('Shutting down', { signal });
    await app.close();
    logger.info('Shutdown complete');
  };
}
