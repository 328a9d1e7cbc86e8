/**
 * Configuration Module
 *
 * Turns environment variables into an explicit, validated configuration
 * structure. Nothing outside this module reads process.env.
 */

import type { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import {
  appEnvSchema,
  researchEnvSchema,
  storeEnvSchema,
  type AppEnv,
  type Environment,
  type PrivacyLevel,
  type StoreEnv,
} from './schema.js';

export { environments, privacyLevels, type Environment, type PrivacyLevel } from './schema.js';

export interface StoreConfig {
  connectionString: string;
  maxConnections: number;
  idleTimeoutMs: number;
  connectionTimeoutMs: number;
}

export interface RetryPolicy {
  /** Total attempts including the first one */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface AppConfig {
  store: StoreConfig;
  run: {
    lockPath: string;
    lockStaleAfterMs: number;
    runLogPath: string;
    timeoutMs: number;
  };
  pipeline: {
    hosting: RetryPolicy;
    publishInit: RetryPolicy;
    confirmation: {
      maxPolls: number;
      pollIntervalMs: number;
      maxDelayMs: number;
    };
    reconcileWindowMs: number;
    privacyLevel: PrivacyLevel;
  };
  credentials: {
    refreshMarginMs: number;
    refresh: RetryPolicy;
  };
  tiktok: {
    clientKey: string;
    clientSecret: string;
    apiBaseUrl: string;
    authUrl: string;
  };
  hosting: {
    apiKey: string;
    apiUrl: string;
    maxBytes: number;
  };
  content: {
    anthropicApiKey?: string;
    model: string;
    disclosure: string;
  };
  daemon: {
    cronExpression: string;
    timezone: string;
    schedulerEnabled: boolean;
    port: number;
    environment: Environment;
    /** Log every API request; off under test */
    requestLogging: boolean;
    /** Put unexpected error messages in 500 responses; off in production */
    exposeErrorDetails: boolean;
  };
}

export interface ResearchConfig {
  store: StoreConfig;
  anthropicApiKey: string;
  model: string;
  maxTokens: number;
}

type Env = Record<string, string | undefined>;

function parseEnv<T extends z.ZodTypeAny>(schema: T, env: Env): z.infer<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => {
        const field = issue.path.join('.');
        return issue.message.startsWith(field) ? issue.message : `${field}: ${issue.message}`;
      })
    );
  }
  return result.data;
}

function toStoreConfig(env: StoreEnv): StoreConfig {
  return {
    connectionString: env.DATABASE_URL,
    maxConnections: env.DB_MAX_CONNECTIONS,
    idleTimeoutMs: env.DB_IDLE_TIMEOUT_MS,
    connectionTimeoutMs: env.DB_CONNECTION_TIMEOUT_MS,
  };
}

/**
 * Load only what the store-facing commands need (init-store, catalog)
 */
export function loadStoreConfig(env: Env = process.env): StoreConfig {
  return toStoreConfig(parseEnv(storeEnvSchema, env));
}

/**
 * Load what `research` needs: the store and a Claude API key
 */
export function loadResearchConfig(env: Env = process.env): ResearchConfig {
  const parsed = parseEnv(researchEnvSchema, env);
  return {
    store: toStoreConfig(parsed),
    anthropicApiKey: parsed.ANTHROPIC_API_KEY,
    model: parsed.CONTENT_MODEL,
    maxTokens: parsed.RESEARCH_MAX_TOKENS,
  };
}

/**
 * Load and validate the full application configuration
 *
 * @throws ConfigurationError listing every missing or invalid field
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const parsed: AppEnv = parseEnv(appEnvSchema, env);

  const retry = (maxAttempts: number): RetryPolicy => ({
    maxAttempts,
    baseDelayMs: parsed.RETRY_BASE_DELAY_MS,
    maxDelayMs: parsed.RETRY_MAX_DELAY_MS,
  });

  return {
    store: toStoreConfig(parsed),
    run: {
      lockPath: parsed.LOCK_PATH,
      lockStaleAfterMs: parsed.LOCK_STALE_AFTER_MS,
      runLogPath: parsed.RUN_LOG_PATH,
      timeoutMs: parsed.RUN_TIMEOUT_MS,
    },
    pipeline: {
      hosting: retry(parsed.HOSTING_MAX_ATTEMPTS),
      publishInit: retry(parsed.PUBLISH_INIT_MAX_ATTEMPTS),
      confirmation: {
        maxPolls: parsed.CONFIRM_MAX_POLLS,
        pollIntervalMs: parsed.CONFIRM_POLL_INTERVAL_MS,
        maxDelayMs: parsed.RETRY_MAX_DELAY_MS,
      },
      reconcileWindowMs: parsed.RECONCILE_WINDOW_MS,
      privacyLevel: parsed.TIKTOK_PRIVACY_LEVEL,
    },
    credentials: {
      refreshMarginMs: parsed.TOKEN_REFRESH_MARGIN_MS,
      refresh: retry(parsed.TOKEN_REFRESH_MAX_ATTEMPTS),
    },
    tiktok: {
      clientKey: parsed.TIKTOK_CLIENT_KEY,
      clientSecret: parsed.TIKTOK_CLIENT_SECRET,
      apiBaseUrl: parsed.TIKTOK_API_BASE_URL,
      authUrl: parsed.TIKTOK_AUTH_URL,
    },
    hosting: {
      apiKey: parsed.IMGBB_API_KEY,
      apiUrl: parsed.IMGBB_API_URL,
      maxBytes: parsed.MEDIA_MAX_BYTES,
    },
    content: {
      anthropicApiKey: parsed.ANTHROPIC_API_KEY || undefined,
      model: parsed.CONTENT_MODEL,
      disclosure: parsed.CAPTION_DISCLOSURE,
    },
    daemon: {
      cronExpression: parsed.SCHEDULE_CRON,
      timezone: parsed.SCHEDULE_TIMEZONE,
      schedulerEnabled: parsed.SCHEDULER_ENABLED,
      port: parsed.PORT,
      environment: parsed.NODE_ENV,
      requestLogging: parsed.NODE_ENV !== 'test',
      exposeErrorDetails: parsed.NODE_ENV !== 'production',
    },
  };
}
