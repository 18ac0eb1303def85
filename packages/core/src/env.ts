import { createEnv } from '@t3-oss/env-core';
import { z } from 'zod';

export const LOG_LEVELS = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const env = createEnv({
  server: {
    TOOLGATE_MAX_STEPS: z.coerce.number().int().positive().default(256),
    TOOLGATE_PHASE_POLICY: z.string().optional(),
    NODE_ENV: z
      .enum(['development', 'test', 'production'])
      .default('development'),
    LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  },
  runtimeEnv: process.env,
  emptyStringAsUndefined: true,
});
