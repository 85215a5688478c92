export * from './domain/index.js';
export * from './events/index.js';
export * from './protocol/index.js';
export { createLogger, envSchema, loadConfig, type AppConfig } from './config/index.js';
export { bootRuntime, shutdownRuntime, type RuntimeContext, type RuntimeOptions } from './app/runtime.js';
