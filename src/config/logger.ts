import pino, { type Logger, type LoggerOptions } from 'pino';

import type { AppConfig } from './schema.js';

export function createLogger(config: Pick<AppConfig, 'LOG_LEVEL'>): Logger {
  const options: LoggerOptions = {
    level: config.LOG_LEVEL,
    base: {
      service: 'engine-link'
    }
  };

  return pino(options);
}
