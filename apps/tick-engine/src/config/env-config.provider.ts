import { Provider } from '@nestjs/common';
import { EngineConfig } from './EngineConfig';
import { engineConfigSchema, RawEngineConfig } from './engine-config.schema';

export const VALIDATED_ENV = 'VALIDATED_ENV';
export const ENGINE_CONFIG = 'ENGINE_CONFIG';

export function parseEngineEnv(env: NodeJS.ProcessEnv): RawEngineConfig {
  const result = engineConfigSchema.safeParse({
    POLL_INTERVAL_MS: env.POLL_INTERVAL_MS,
    STOP_ON_TASK_ERROR: env.STOP_ON_TASK_ERROR,
    DEMO_TASKS: env.DEMO_TASKS,
    LOG_LEVEL: env.LOG_LEVEL,
  });

  if (!result.success) {
    const messages = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`[EngineConfig] Invalid environment variables:\n${messages}`);
  }

  return result.data;
}

export function toEngineConfig(env: RawEngineConfig): EngineConfig {
  return {
    pollIntervalMs: env.POLL_INTERVAL_MS,
    stopOnTaskError: env.STOP_ON_TASK_ERROR,
    demoTasks: env.DEMO_TASKS,
    logLevel: env.LOG_LEVEL,
  };
}

/**
 * Runs Zod validation once at boot. All other providers
 * derive their values from this single source of truth.
 */
export const validatedEnvProvider: Provider<RawEngineConfig> = {
  provide: VALIDATED_ENV,
  useFactory: (): RawEngineConfig => parseEngineEnv(process.env),
};

export const engineConfigProvider: Provider<EngineConfig> = {
  provide: ENGINE_CONFIG,
  useFactory: toEngineConfig,
  inject: [VALIDATED_ENV],
};
