import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false'], { error: 'must be "true" or "false"' })
  .default('false')
  .transform((v) => v === 'true');

export const engineConfigSchema = z.object({
  POLL_INTERVAL_MS: z.coerce
    .number()
    .int()
    .positive('POLL_INTERVAL_MS must be > 0')
    .default(10),

  STOP_ON_TASK_ERROR: booleanFlag,

  DEMO_TASKS: booleanFlag,

  LOG_LEVEL: z
    .enum(['debug', 'info', 'warn', 'error'])
    .default('info'),
});

export type RawEngineConfig = z.infer<typeof engineConfigSchema>;
