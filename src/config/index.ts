import dotenv from 'dotenv';

import { envSchema, type AppConfig } from './schema.js';

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  if (env === process.env) {
    dotenv.config();
  }

  const result = envSchema.safeParse(env);

  if (!result.success) {
    throw new Error(`Invalid configuration: ${result.error.message}`);
  }

  return result.data;
}

export { envSchema, type AppConfig } from './schema.js';
export { createLogger } from './logger.js';
