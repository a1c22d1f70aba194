// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING — Barrel Export
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type LogLevel,
  type LoggerConfig,
  type LoggerOptions,
  type ILogger,
  LOG_LEVELS,
  isLogLevel,
  configureLogger,
  getLogger,
  resetLogger,
} from './logger.js';

export { redact, type RedactionOptions } from './redaction.js';
