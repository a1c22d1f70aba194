// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG LOADER — Environment → Validated AppConfig
// ═══════════════════════════════════════════════════════════════════════════════

import {
  validateConfig,
  type AppConfig,
  type AppConfigInput,
  type Environment,
} from './schema.js';

type RawSection = Record<string, unknown>;

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

type Env = Readonly<Record<string, string | undefined>>;

function envBool(env: Env, key: string): boolean | undefined {
  const value = env[key]?.toLowerCase();
  if (value === undefined || value === '') return undefined;
  return value === 'true' || value === '1' || value === 'yes';
}

/**
 * Non-numeric values are passed through as NaN so validation reports them
 * instead of silently falling back to the default.
 */
function envNumber(env: Env, key: string): number | undefined {
  const value = env[key];
  if (value === undefined || value === '') return undefined;
  return Number(value);
}

function envString(env: Env, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Drop undefined leaves so zod defaults apply.
 */
function compact(section: RawSection): RawSection {
  return Object.fromEntries(
    Object.entries(section).filter(([, value]) => value !== undefined)
  );
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOADING
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Map environment variables onto the raw config shape.
 * Values are left unvalidated; AppConfigSchema checks them.
 */
export function configFromEnv(env: Env = process.env): RawSection {
  return compact({
    environment: envString(env, 'NODE_ENV'),
    storage: compact({
      backend: envString(env, 'STORAGE_BACKEND'),
      redisUrl: envString(env, 'REDIS_URL'),
      keyPrefix: envString(env, 'KEY_PREFIX'),
      connectTimeoutMs: envNumber(env, 'REDIS_CONNECT_TIMEOUT_MS'),
    }),
    scheduler: compact({
      enabled: envBool(env, 'SCHEDULER_ENABLED'),
      cronExpression: envString(env, 'REMINDER_CRON'),
      intervalMs: envNumber(env, 'REMINDER_INTERVAL_MS'),
      graceMs: envNumber(env, 'REMINDER_GRACE_MS'),
      penaltyXp: envNumber(env, 'PENALTY_XP'),
      lockWaitMs: envNumber(env, 'SCHEDULER_LOCK_WAIT_MS'),
    }),
    state: compact({
      lockWaitMs: envNumber(env, 'STATE_LOCK_WAIT_MS'),
    }),
    router: compact({
      storageRetryAttempts: envNumber(env, 'STORAGE_RETRY_ATTEMPTS'),
      storageRetryDelayMs: envNumber(env, 'STORAGE_RETRY_DELAY_MS'),
    }),
    logging: compact({
      level: envString(env, 'LOG_LEVEL')?.toLowerCase(),
      pretty: envBool(env, 'LOG_PRETTY'),
    }),
  });
}

let cachedConfig: AppConfig | null = null;

/**
 * Load and validate configuration from the environment (cached).
 * Throws ConfigValidationError on invalid values.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  if (cachedConfig) return cachedConfig;
  cachedConfig = validateConfig(configFromEnv(env));
  return cachedConfig;
}

/**
 * Get the loaded config; loads from process.env on first use.
 */
export function getConfig(): AppConfig {
  return cachedConfig ?? loadConfig();
}

export function isConfigLoaded(): boolean {
  return cachedConfig !== null;
}

export function getEnvironment(): Environment {
  return getConfig().environment;
}

export function isProduction(): boolean {
  return getEnvironment() === 'production';
}

export function resetConfig(): void {
  cachedConfig = null;
}

/**
 * Build a test configuration without touching process.env.
 */
export function loadTestConfig(overrides: AppConfigInput = {}): AppConfig {
  cachedConfig = validateConfig({
    environment: 'test',
    ...overrides,
  });
  return cachedConfig;
}
