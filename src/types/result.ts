// ═══════════════════════════════════════════════════════════════════════════════
// RESULT PATTERN — Type-Safe Error Handling
// ═══════════════════════════════════════════════════════════════════════════════
//
// Expected failures (storage down, wrong input mode, unknown quest) travel as
// values. Exceptions are reserved for programming errors.
//
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// CORE RESULT TYPE
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Success variant of Result.
 */
export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
  readonly error?: never;
}

/**
 * Failure variant of Result.
 */
export interface Err<E> {
  readonly ok: false;
  readonly error: E;
  readonly value?: never;
}

/**
 * Result type representing either success (Ok) or failure (Err).
 *
 * @example
 * ```typescript
 * const result = await manager.getOrCreate(userId);
 * if (result.ok) {
 *   console.log(result.value.level);
 * } else {
 *   console.error(result.error.code);
 * }
 * ```
 */
export type Result<T, E = Error> = Ok<T> | Err<E>;

/**
 * Promise that resolves to a Result.
 */
export type AsyncResult<T, E = Error> = Promise<Result<T, E>>;

// ─────────────────────────────────────────────────────────────────────────────────
// CONSTRUCTORS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Create a success Result.
 */
export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

/**
 * Create a failure Result.
 */
export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

/**
 * Create a success Result with no value (void).
 */
export function okVoid(): Ok<void> {
  return { ok: true, value: undefined };
}

// ─────────────────────────────────────────────────────────────────────────────────
// UNWRAP OPERATIONS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Unwrap the value from an Ok Result.
 * Throws if the Result is Err.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value;
  }
  throw new Error(`Unwrap called on Err: ${JSON.stringify(result.error)}`);
}

/**
 * Unwrap the error from an Err Result.
 * Throws if the Result is Ok.
 */
export function unwrapErr<T, E>(result: Result<T, E>): E {
  if (!result.ok) {
    return result.error;
  }
  throw new Error('unwrapErr called on Ok');
}
