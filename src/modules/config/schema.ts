import { z } from 'zod';

const MINUTE = 60 * 1000;
const HOUR = 60 * MINUTE;

/**
 * Integer env var with a default. Empty strings count as unset.
 */
function intVar(defaultValue: number, min = 0) {
  return z.preprocess(
    (value) => (value === undefined || value === '' ? defaultValue : value),
    z.coerce.number().int().min(min)
  );
}

function stringVar(defaultValue: string) {
  return z.preprocess(
    (value) => (value === undefined || value === '' ? defaultValue : value),
    z.string().min(1)
  );
}

const requiredString = (name: string) =>
  z.string({ required_error: `${name} is required` }).min(1, `${name} is required`);

const booleanVar = (defaultValue: boolean) =>
  z.preprocess(
    (value) => (value === undefined || value === '' ? String(defaultValue) : value),
    z.enum(['true', 'false']).transform((value) => value === 'true')
  );

// =============================================================================
// ENVIRONMENT SCHEMAS
// =============================================================================

export const storeEnvSchema = z.object({
  DATABASE_URL: requiredString('DATABASE_URL'),
  DB_MAX_CONNECTIONS: intVar(10, 1),
  DB_IDLE_TIMEOUT_MS: intVar(30000),
  DB_CONNECTION_TIMEOUT_MS: intVar(5000),
});

export const privacyLevels = [
  'SELF_ONLY',
  'MUTUAL_FOLLOW_FRIENDS',
  'FOLLOWER_OF_CREATOR',
  'PUBLIC_TO_EVERYONE',
] as const;

export const environments = ['development', 'production', 'test'] as const;

export const appEnvSchema = storeEnvSchema.extend({
  NODE_ENV: z.preprocess(
    (value) => (value === undefined || value === '' ? 'development' : value),
    z.enum(environments)
  ),

  // Run
  LOCK_PATH: stringVar('./data/run.lock'),
  LOCK_STALE_AFTER_MS: intVar(HOUR, 1),
  RUN_LOG_PATH: stringVar('./logs/runs.log'),
  RUN_TIMEOUT_MS: intVar(10 * MINUTE, 1),

  // Retries
  PUBLISH_INIT_MAX_ATTEMPTS: intVar(3, 1),
  HOSTING_MAX_ATTEMPTS: intVar(3, 1),
  RETRY_BASE_DELAY_MS: intVar(1000),
  RETRY_MAX_DELAY_MS: intVar(30000),
  CONFIRM_MAX_POLLS: intVar(24, 1),
  CONFIRM_POLL_INTERVAL_MS: intVar(5000),
  RECONCILE_WINDOW_MS: intVar(24 * HOUR),

  // Credentials
  TOKEN_REFRESH_MARGIN_MS: intVar(5 * MINUTE),
  TOKEN_REFRESH_MAX_ATTEMPTS: intVar(3, 1),

  // Publishing
  TIKTOK_CLIENT_KEY: requiredString('TIKTOK_CLIENT_KEY'),
  TIKTOK_CLIENT_SECRET: requiredString('TIKTOK_CLIENT_SECRET'),
  TIKTOK_API_BASE_URL: stringVar('https://open.tiktokapis.com').pipe(z.string().url()),
  TIKTOK_AUTH_URL: stringVar('https://www.tiktok.com/v2/auth/authorize/').pipe(z.string().url()),
  TIKTOK_PRIVACY_LEVEL: z.preprocess(
    (value) => (value === undefined || value === '' ? 'SELF_ONLY' : value),
    z.enum(privacyLevels)
  ),

  // Hosting
  IMGBB_API_KEY: requiredString('IMGBB_API_KEY'),
  IMGBB_API_URL: stringVar('https://api.imgbb.com/1/upload').pipe(z.string().url()),
  MEDIA_MAX_BYTES: intVar(10 * 1024 * 1024, 1),

  // Captions
  ANTHROPIC_API_KEY: z.string().optional(),
  CONTENT_MODEL: stringVar('claude-3-5-sonnet-20241022'),
  CAPTION_DISCLOSURE: stringVar('PR'),

  // Daemon
  SCHEDULE_CRON: stringVar('0 8,14,20 * * *'),
  SCHEDULE_TIMEZONE: stringVar('UTC'),
  SCHEDULER_ENABLED: booleanVar(true),
  PORT: intVar(3000, 1),
});

export const researchEnvSchema = storeEnvSchema.extend({
  ANTHROPIC_API_KEY: requiredString('ANTHROPIC_API_KEY'),
  CONTENT_MODEL: stringVar('claude-3-5-sonnet-20241022'),
  RESEARCH_MAX_TOKENS: intVar(2000, 1),
});

export type StoreEnv = z.infer<typeof storeEnvSchema>;
export type ResearchEnv = z.infer<typeof researchEnvSchema>;
export type AppEnv = z.infer<typeof appEnvSchema>;
export type PrivacyLevel = (typeof privacyLevels)[number];
export type Environment = (typeof environments)[number];
