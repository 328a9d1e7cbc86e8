import { describe, it, expect } from 'vitest';
import { loadConfig, loadResearchConfig, loadStoreConfig } from '../../src/modules/config/index.js';
import { ConfigurationError } from '../../src/modules/errors/index.js';

const REQUIRED = {
  DATABASE_URL: 'postgres://localhost:5432/rotapost_test',
  TIKTOK_CLIENT_KEY: 'client-key',
  TIKTOK_CLIENT_SECRET: 'test-secret',
  IMGBB_API_KEY: 'test-key',
};

function configError(load: () => unknown): ConfigurationError {
  try {
    load();
  } catch (error) {
    if (error instanceof ConfigurationError) return error;
    throw error;
  }
  throw new Error('expected a ConfigurationError');
}

describe('loadConfig', () => {
  it('fills defaults around the required settings', () => {
    const config = loadConfig(REQUIRED);

    expect(config.store).toEqual({
      connectionString: 'postgres://localhost:5432/rotapost_test',
      maxConnections: 10,
      idleTimeoutMs: 30000,
      connectionTimeoutMs: 5000,
    });
    expect(config.run).toEqual({
      lockPath: './data/run.lock',
      lockStaleAfterMs: 60 * 60 * 1000,
      runLogPath: './logs/runs.log',
      timeoutMs: 10 * 60 * 1000,
    });
    expect(config.pipeline).toEqual({
      hosting: { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 30000 },
      publishInit: { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 30000 },
      confirmation: { maxPolls: 24, pollIntervalMs: 5000, maxDelayMs: 30000 },
      reconcileWindowMs: 24 * 60 * 60 * 1000,
      privacyLevel: 'SELF_ONLY',
    });
    expect(config.content).toEqual({
      anthropicApiKey: undefined,
      model: 'claude-3-5-sonnet-20241022',
      disclosure: 'PR',
    });
    expect(config.daemon).toEqual({
      cronExpression: '0 8,14,20 * * *',
      timezone: 'UTC',
      schedulerEnabled: true,
      port: 3000,
      environment: 'development',
      requestLogging: true,
      exposeErrorDetails: true,
    });
  });

  it('derives request logging and error detail from NODE_ENV', () => {
    expect(loadConfig({ ...REQUIRED, NODE_ENV: 'test' }).daemon).toMatchObject({
      environment: 'test',
      requestLogging: false,
      exposeErrorDetails: true,
    });
    expect(loadConfig({ ...REQUIRED, NODE_ENV: 'production' }).daemon).toMatchObject({
      environment: 'production',
      requestLogging: true,
      exposeErrorDetails: false,
    });
  });

  it('reads overrides and treats empty values as unset', () => {
    const config = loadConfig({
      ...REQUIRED,
      RUN_TIMEOUT_MS: '120000',
      CONFIRM_MAX_POLLS: '6',
      TIKTOK_PRIVACY_LEVEL: 'PUBLIC_TO_EVERYONE',
      SCHEDULER_ENABLED: 'false',
      ANTHROPIC_API_KEY: '',
      LOCK_PATH: '',
    });

    expect(config.run.timeoutMs).toBe(120000);
    expect(config.run.lockPath).toBe('./data/run.lock');
    expect(config.pipeline.confirmation.maxPolls).toBe(6);
    expect(config.pipeline.privacyLevel).toBe('PUBLIC_TO_EVERYONE');
    expect(config.daemon.schedulerEnabled).toBe(false);
    expect(config.content.anthropicApiKey).toBeUndefined();
  });

  it('lists every missing required setting at once', () => {
    const error = configError(() => loadConfig({}));

    expect(error.issues).toEqual([
      'DATABASE_URL is required',
      'TIKTOK_CLIENT_KEY is required',
      'TIKTOK_CLIENT_SECRET is required',
      'IMGBB_API_KEY is required',
    ]);
  });

  it('rejects malformed values with the field name', () => {
    const error = configError(() =>
      loadConfig({ ...REQUIRED, RUN_TIMEOUT_MS: 'soon', TIKTOK_PRIVACY_LEVEL: 'EVERYONE' })
    );

    expect(error.issues).toHaveLength(2);
    expect(error.issues[0]).toMatch(/^RUN_TIMEOUT_MS: /);
    expect(error.issues[1]).toMatch(/^TIKTOK_PRIVACY_LEVEL: /);
  });
});

describe('loadStoreConfig', () => {
  it('only needs the database settings', () => {
    expect(loadStoreConfig({ DATABASE_URL: 'postgres://localhost/catalog', DB_MAX_CONNECTIONS: '2' })).toEqual({
      connectionString: 'postgres://localhost/catalog',
      maxConnections: 2,
      idleTimeoutMs: 30000,
      connectionTimeoutMs: 5000,
    });
  });
});

describe('loadResearchConfig', () => {
  it('needs the database and a Claude API key only', () => {
    expect(
      loadResearchConfig({ DATABASE_URL: 'postgres://localhost/catalog', ANTHROPIC_API_KEY: 'test-key' })
    ).toEqual({
      store: {
        connectionString: 'postgres://localhost/catalog',
        maxConnections: 10,
        idleTimeoutMs: 30000,
        connectionTimeoutMs: 5000,
      },
      anthropicApiKey: 'test-key',
      model: 'claude-3-5-sonnet-20241022',
      maxTokens: 2000,
    });
  });

  it('reports a missing API key', () => {
    expect(configError(() => loadResearchConfig({ DATABASE_URL: 'postgres://localhost/catalog' })).issues).toEqual([
      'ANTHROPIC_API_KEY is required',
    ]);
  });
});
