// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG SCHEMA — Zod Validation for Application Configuration
// ═══════════════════════════════════════════════════════════════════════════════
//
// Every field has a default, so `AppConfigSchema.parse({})` yields a runnable
// development configuration backed by the in-memory store.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

// ─────────────────────────────────────────────────────────────────────────────────
// CONSTANTS
// ─────────────────────────────────────────────────────────────────────────────────

const MINUTE_MS = 60 * 1000;

/** Accountability window between reminders. */
export const DEFAULT_REMINDER_INTERVAL_MS = 15 * MINUTE_MS;

// ─────────────────────────────────────────────────────────────────────────────────
// SECTIONS
// ─────────────────────────────────────────────────────────────────────────────────

export const EnvironmentSchema = z.enum(['development', 'test', 'staging', 'production']);

export const StorageConfigSchema = z.object({
  backend: z.enum(['memory', 'redis']).default('memory'),
  redisUrl: z.string().url().default('redis://localhost:6379'),
  keyPrefix: z
    .string()
    .regex(/^[a-z0-9:_-]*$/, 'Key prefix may only contain lowercase letters, digits, ":", "_" and "-"')
    .default('jobhunt:'),
  connectTimeoutMs: z.number().int().positive().default(5000),
});

export const SchedulerConfigSchema = z.object({
  enabled: z.boolean().default(true),
  cronExpression: z.string().min(1).default('*/15 * * * *'),
  intervalMs: z.number().int().positive().default(DEFAULT_REMINDER_INTERVAL_MS),
  /** Defaults to one additional interval when omitted */
  graceMs: z.number().int().positive().optional(),
  penaltyXp: z.number().int().positive().default(10),
  lockWaitMs: z.number().int().positive().default(2000),
});

export const StateConfigSchema = z.object({
  lockWaitMs: z.number().int().positive().default(10_000),
});

export const RouterConfigSchema = z.object({
  storageRetryAttempts: z.number().int().min(0).max(10).default(2),
  storageRetryDelayMs: z.number().int().min(0).default(200),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  pretty: z.boolean().default(false),
});

// ─────────────────────────────────────────────────────────────────────────────────
// ROOT SCHEMA
// ─────────────────────────────────────────────────────────────────────────────────

export const AppConfigSchema = z.object({
  environment: EnvironmentSchema.default('development'),
  storage: StorageConfigSchema.default({}),
  scheduler: SchedulerConfigSchema.default({}),
  state: StateConfigSchema.default({}),
  router: RouterConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type Environment = z.infer<typeof EnvironmentSchema>;
export type StorageConfig = z.infer<typeof StorageConfigSchema>;
export type SchedulerConfig = z.infer<typeof SchedulerConfigSchema>;
export type StateConfig = z.infer<typeof StateConfigSchema>;
export type RouterConfig = z.infer<typeof RouterConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Input shape accepted before defaults are applied.
 */
export type AppConfigInput = z.input<typeof AppConfigSchema>;

// ─────────────────────────────────────────────────────────────────────────────────
// VALIDATION
// ─────────────────────────────────────────────────────────────────────────────────

export class ConfigValidationError extends Error {
  readonly issues: readonly z.ZodIssue[];

  constructor(issues: readonly z.ZodIssue[]) {
    super(`Invalid configuration:\n${formatConfigErrors(issues)}`);
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

/**
 * Format zod issues as one "path: message" line each.
 */
export function formatConfigErrors(issues: readonly z.ZodIssue[]): string {
  return issues
    .map(issue => `  - ${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('\n');
}

/**
 * Validate raw config, throwing ConfigValidationError on failure.
 */
export function validateConfig(raw: unknown): AppConfig {
  const result = AppConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigValidationError(result.error.issues);
  }
  return result.data;
}

export function safeValidateConfig(raw: unknown): z.SafeParseReturnType<AppConfigInput, AppConfig> {
  return AppConfigSchema.safeParse(raw);
}

export function getDefaultConfig(): AppConfig {
  return AppConfigSchema.parse({});
}

/**
 * Grace period after a reminder; one extra interval unless configured.
 */
export function resolveGraceMs(scheduler: SchedulerConfig): number {
  return scheduler.graceMs ?? scheduler.intervalMs;
}
