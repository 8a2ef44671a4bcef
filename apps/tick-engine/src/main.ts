import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { ENGINE_CONFIG } from '@config/env-config.provider';
import { EngineConfig } from '@config/EngineConfig';
import { LOGGER } from '@scheduler/infrastructure/tokens';
import { Logger } from '@shared/ports/Logger';
import { createShutdownHandler, logStartup } from './lifecycle';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.createApplicationContext(AppModule);
  app.enableShutdownHooks();

  const logger = app.get<Logger>(LOGGER);
  logStartup(app.get<EngineConfig>(ENGINE_CONFIG), logger);

  const shutdown = createShutdownHandler(app, logger);
  const onSignal = (signal: string): void => {
    shutdown(signal).catch((err: unknown) => {
      logger.error('Shutdown failed', { error: err instanceof Error ? err.message : String(err) });
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}

bootstrap().catch((err) => {
  console.error('[TickEngine] Fatal bootstrap error:', err);
  process.exit(1);
});
