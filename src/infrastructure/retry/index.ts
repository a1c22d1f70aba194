// ═══════════════════════════════════════════════════════════════════════════════
// RETRY MODULE INDEX — Retry Policy Exports
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type BackoffStrategy,
  type JitterType,
  type BackoffConfig,
  type RetryConfig,
  type RetryEvent,
  type BackoffCalculator,
  DEFAULT_RETRY_CONFIG,
} from './types.js';

export {
  BackoffCalculatorImpl,
  createBackoffCalculator,
  sleep,
  formatDelay,
} from './backoff.js';

export { retryResult } from './policy.js';
