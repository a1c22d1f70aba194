// ═══════════════════════════════════════════════════════════════════════════════
// BRANDED TYPES — Nominal Identifiers
// ═══════════════════════════════════════════════════════════════════════════════

export declare const __brand: unique symbol;

/**
 * Nominal wrapper so a UserId cannot be passed where a QuestId is expected.
 */
export type Brand<T, B extends string> = T & { readonly [__brand]: B };

/**
 * Opaque, stable per-user identifier handed to us by the transport.
 */
export type UserId = Brand<string, 'UserId'>;

/**
 * Catalog slug of a quest (e.g. "apply").
 */
export type QuestId = Brand<string, 'QuestId'>;

/**
 * Milliseconds since the Unix epoch.
 */
export type Timestamp = Brand<number, 'Timestamp'>;

const USER_ID_PATTERN = /^[A-Za-z0-9_:.-]{1,128}$/;

/**
 * Validate and brand a raw user identifier.
 * The pattern keeps identifiers safe to embed in storage keys.
 */
export function createUserId(raw: string | number): UserId {
  const value = String(raw);
  if (!USER_ID_PATTERN.test(value)) {
    throw new TypeError(`Invalid user id: ${JSON.stringify(value)}`);
  }
  return value as UserId;
}

export function isValidUserId(raw: string): boolean {
  return USER_ID_PATTERN.test(raw);
}

export function createQuestId(raw: string): QuestId {
  return raw as QuestId;
}

/**
 * Brand a millisecond timestamp; defaults to now.
 */
export function createTimestamp(ms: number = Date.now()): Timestamp {
  if (!Number.isFinite(ms)) {
    throw new RangeError(`Invalid timestamp: ${ms}`);
  }
  return Math.trunc(ms) as Timestamp;
}
