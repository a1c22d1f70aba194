// ═══════════════════════════════════════════════════════════════════════════════
// LOCKING MODULE — Barrel Export
// ═══════════════════════════════════════════════════════════════════════════════

export {
  KeyedLock,
  createKeyedLock,
  DEFAULT_LOCK_CONFIG,
  type LockConfig,
  type LockError,
  type LockErrorCode,
  type AcquireOptions,
  type ReleaseFn,
} from './keyed-lock.js';
