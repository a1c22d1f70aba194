// ═══════════════════════════════════════════════════════════════════════════════
// PROGRESSION ERRORS — Error Codes and Constructors
// ═══════════════════════════════════════════════════════════════════════════════

import type { InputMode } from './types.js';

export const ProgressionErrorCode = {
  /** Read or write did not complete; nothing changed, retry is safe */
  STORAGE_FAILURE: 'STORAGE_FAILURE',

  /** Quest not in the catalog */
  INVALID_QUEST: 'INVALID_QUEST',

  /** Input arrived in the wrong input mode, or a reply with no pending reminder */
  INCONSISTENT_MODE: 'INCONSISTENT_MODE',

  /** Empty or oversized note text */
  INVALID_INPUT: 'INVALID_INPUT',

  /** Per-user lock not acquired within the wait budget */
  LOCK_TIMEOUT: 'LOCK_TIMEOUT',

  /** A transform produced an illegal transition; not committed */
  INVARIANT_VIOLATION: 'INVARIANT_VIOLATION',
} as const;

export type ProgressionErrorCode = (typeof ProgressionErrorCode)[keyof typeof ProgressionErrorCode];

export interface ProgressionError {
  readonly code: ProgressionErrorCode;
  readonly message: string;
  readonly cause?: unknown;
  readonly details?: Readonly<Record<string, unknown>>;
}

// ─────────────────────────────────────────────────────────────────────────────────
// CONSTRUCTORS
// ─────────────────────────────────────────────────────────────────────────────────

export function storageFailure(message: string, cause?: unknown): ProgressionError {
  return { code: ProgressionErrorCode.STORAGE_FAILURE, message, cause };
}

export function invalidQuest(query: string): ProgressionError {
  return {
    code: ProgressionErrorCode.INVALID_QUEST,
    message: `Unknown quest: ${query}`,
    details: { query },
  };
}

export function inconsistentMode(
  action: string,
  actual: InputMode,
  expected: readonly InputMode[]
): ProgressionError {
  return {
    code: ProgressionErrorCode.INCONSISTENT_MODE,
    message: `Cannot ${action} while ${actual}`,
    details: { action, actual, expected },
  };
}

export function noPendingReminder(): ProgressionError {
  return {
    code: ProgressionErrorCode.INCONSISTENT_MODE,
    message: 'No pending reminder to reply to',
  };
}

export function invalidInput(message: string): ProgressionError {
  return { code: ProgressionErrorCode.INVALID_INPUT, message };
}

export function lockTimeout(userId: string, waitedMs: number): ProgressionError {
  return {
    code: ProgressionErrorCode.LOCK_TIMEOUT,
    message: `Player ${userId} is busy; gave up after ${waitedMs}ms`,
    details: { userId, waitedMs },
  };
}

export function invariantViolation(message: string): ProgressionError {
  return { code: ProgressionErrorCode.INVARIANT_VIOLATION, message };
}

// ─────────────────────────────────────────────────────────────────────────────────
// PREDICATES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Only storage failures are transient.
 */
export function isTransientError(error: ProgressionError): boolean {
  return error.code === ProgressionErrorCode.STORAGE_FAILURE;
}
