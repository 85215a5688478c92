import pino, { type Logger } from 'pino';

import { loadConfig, type AppConfig } from '../config/index.js';
import { createLogger } from '../config/logger.js';
import { EventEngine } from '../events/eventEngine.js';
import { EventKind } from '../events/events.js';
import { ProtocolClient } from '../protocol/client.js';
import type { TransportFactory } from '../protocol/transport.js';

export type RuntimeOptions = {
  config?: AppConfig;
  logger?: Logger;
  transportFactory?: TransportFactory;
  autoConnect?: boolean;
};

export type RuntimeContext = {
  config: AppConfig;
  logger: Logger;
  eventEngine: EventEngine;
  client: ProtocolClient;
};

export async function bootRuntime(options: RuntimeOptions = {}): Promise<RuntimeContext> {
  const bootLogger = options.logger ?? pino({ name: 'runtime' });
  const boot = (step: string) => bootLogger.info({ step }, `boot: ${step}`);

  try {
    boot('1.ConfigLoader');
    const config = options.config ?? loadConfig();
    const logger = options.logger ?? createLogger(config);

    boot('2.EventEngine');
    const eventEngine = new EventEngine({
      logger: logger.child({ component: 'event-engine' }),
      pollIntervalMs: config.EVENT_POLL_INTERVAL_MS,
      stopGraceMs: config.EVENT_STOP_GRACE_MS
    });

    eventEngine.on(
      [EventKind.Error],
      (event) => {
        logger.warn({ origin: event.origin, payload: event.payload }, 'engine.error');
      },
      'error-log'
    );

    eventEngine.on(
      [EventKind.Info],
      (event) => {
        logger.info({ origin: event.origin, payload: event.payload }, 'engine.info');
      },
      'info-log'
    );

    eventEngine.start();

    boot('3.ProtocolClient');
    const client = new ProtocolClient({
      eventEngine,
      host: config.ENGINE_HOST,
      port: config.ENGINE_PORT,
      path: config.ENGINE_PATH,
      apiKey: config.ENGINE_API_KEY,
      requestTimeoutMs: config.ENGINE_REQUEST_TIMEOUT_MS,
      retryAttempts: config.ENGINE_RETRY_ATTEMPTS,
      rateLimitRps: config.ENGINE_RATE_LIMIT_RPS,
      logger: logger.child({ component: 'protocol-client' }),
      transportFactory: options.transportFactory
    });

    if (options.autoConnect) {
      boot('4.Connect');
      try {
        await client.connect();
      } catch (error) {
        await eventEngine.stop();
        throw error;
      }
    }

    return { config, logger, eventEngine, client };
  } catch (error) {
    bootLogger.error({ err: error }, 'runtime boot failed');
    throw error;
  }
}

export async function shutdownRuntime(context: RuntimeContext): Promise<void> {
  await context.client.disconnect();
  await context.eventEngine.stop();
  context.logger.info('runtime stopped');
}
