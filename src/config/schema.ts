import { z } from 'zod';

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  ENGINE_HOST: z.string().min(1).default('localhost'),
  ENGINE_PORT: z.coerce.number().int().min(1).max(65535).default(15888),
  ENGINE_PATH: z.string().startsWith('/').default('/ws'),
  ENGINE_API_KEY: z.string().min(1, 'ENGINE_API_KEY is required'),
  ENGINE_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  ENGINE_RETRY_ATTEMPTS: z.coerce.number().int().nonnegative().default(3),
  ENGINE_RATE_LIMIT_RPS: z.coerce.number().positive().default(50),
  EVENT_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(100),
  EVENT_STOP_GRACE_MS: z.coerce.number().int().positive().default(1000)
});

export type AppConfig = z.infer<typeof envSchema>;
