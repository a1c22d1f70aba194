// ═══════════════════════════════════════════════════════════════════════════════
// RETRY TYPES — Retry Policy Types and Configuration
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// BACKOFF STRATEGIES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Backoff strategy types.
 */
export type BackoffStrategy =
  | 'fixed'           // Same delay each time
  | 'exponential';    // Delay multiplies each time

/**
 * Jitter types for randomization.
 */
export type JitterType =
  | 'none'           // No jitter
  | 'full'           // Random between 0 and delay
  | 'equal';         // Random between delay/2 and delay

// ─────────────────────────────────────────────────────────────────────────────────
// CONFIGURATION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Retry policy configuration.
 */
export interface RetryConfig<E> {
  /** Maximum number of retry attempts (excluding initial attempt) */
  readonly maxAttempts: number;

  /** Initial delay in ms before first retry */
  readonly initialDelayMs: number;

  /** Maximum delay in ms between retries */
  readonly maxDelayMs: number;

  readonly backoffStrategy: BackoffStrategy;

  readonly jitter: JitterType;

  /** Multiplier for exponential backoff */
  readonly backoffMultiplier: number;

  /** Decide whether a failed attempt's error is worth another try */
  readonly isRetryable?: (error: E, attempt: number) => boolean;

  /** Called before each retry */
  readonly onRetry?: (event: RetryEvent<E>) => void;

  /** Replaceable for tests */
  readonly sleep?: (ms: number) => Promise<void>;
}

export type BackoffConfig = Pick<
  RetryConfig<unknown>,
  'initialDelayMs' | 'maxDelayMs' | 'backoffStrategy' | 'jitter' | 'backoffMultiplier'
>;

/**
 * Default retry configuration.
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig<unknown> = {
  maxAttempts: 2,
  initialDelayMs: 200,
  maxDelayMs: 5000,
  backoffStrategy: 'exponential',
  jitter: 'equal',
  backoffMultiplier: 2,
};

// ─────────────────────────────────────────────────────────────────────────────────
// EVENTS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Retry attempt event.
 */
export interface RetryEvent<E> {
  /** Attempt that just failed (1-based) */
  readonly attempt: number;

  /** Maximum retries allowed */
  readonly maxAttempts: number;

  /** Error that caused the retry */
  readonly error: E;

  /** Delay before the next attempt in ms */
  readonly delayMs: number;

  /** Time elapsed since first attempt in ms */
  readonly elapsedMs: number;
}

// ─────────────────────────────────────────────────────────────────────────────────
// INTERFACES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Backoff calculator interface.
 */
export interface BackoffCalculator {
  /** Delay before retry number `attempt` (1-based) */
  calculate(attempt: number): number;
}
