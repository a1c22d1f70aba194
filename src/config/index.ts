// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG MODULE — Barrel Export
// ═══════════════════════════════════════════════════════════════════════════════

export {
  AppConfigSchema,
  StorageConfigSchema,
  SchedulerConfigSchema,
  DEFAULT_REMINDER_INTERVAL_MS,
  ConfigValidationError,
  validateConfig,
  safeValidateConfig,
  formatConfigErrors,
  getDefaultConfig,
  resolveGraceMs,
  type AppConfig,
  type AppConfigInput,
  type Environment,
  type StorageConfig,
  type SchedulerConfig,
  type StateConfig,
  type RouterConfig,
  type LoggingConfig,
} from './schema.js';

export {
  configFromEnv,
  loadConfig,
  getConfig,
  isConfigLoaded,
  getEnvironment,
  isProduction,
  resetConfig,
  loadTestConfig,
} from './loader.js';
