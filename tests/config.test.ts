import { loadConfig } from '../src/config/index.js';
import { envSchema } from '../src/config/schema.js';

describe('envSchema', () => {
  it('validates required environment variables', () => {
    const result = envSchema.safeParse({
      NODE_ENV: 'test',
      LOG_LEVEL: 'debug',
      ENGINE_HOST: 'engine.internal',
      ENGINE_PORT: '16000',
      ENGINE_API_KEY: 'test-api-key'
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.ENGINE_HOST).toBe('engine.internal');
      expect(result.data.ENGINE_PORT).toBe(16000);
    }
  });

  it('fills in defaults', () => {
    const config = envSchema.parse({ ENGINE_API_KEY: 'test-api-key' });

    expect(config).toEqual({
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      ENGINE_HOST: 'localhost',
      ENGINE_PORT: 15888,
      ENGINE_PATH: '/ws',
      ENGINE_API_KEY: 'test-api-key',
      ENGINE_REQUEST_TIMEOUT_MS: 5000,
      ENGINE_RETRY_ATTEMPTS: 3,
      ENGINE_RATE_LIMIT_RPS: 50,
      EVENT_POLL_INTERVAL_MS: 100,
      EVENT_STOP_GRACE_MS: 1000
    });
  });

  it('rejects an out-of-range port', () => {
    expect(envSchema.safeParse({ ENGINE_API_KEY: 'test-api-key', ENGINE_PORT: '70000' }).success).toBe(false);
  });

  it('rejects a negative retry count', () => {
    expect(envSchema.safeParse({ ENGINE_API_KEY: 'test-api-key', ENGINE_RETRY_ATTEMPTS: '-1' }).success).toBe(false);
  });
});

describe('loadConfig', () => {
  it('parses an explicit environment', () => {
    const config = loadConfig({ ENGINE_API_KEY: 'test-api-key', ENGINE_REQUEST_TIMEOUT_MS: '250' });

    expect(config.ENGINE_REQUEST_TIMEOUT_MS).toBe(250);
  });

  it('throws when the api key is missing', () => {
    expect(() => loadConfig({})).toThrow(/^Invalid configuration: /);
  });
});
