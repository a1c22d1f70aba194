// ═══════════════════════════════════════════════════════════════════════════════
// INFRASTRUCTURE MODULE — Core Infrastructure Services
// ═══════════════════════════════════════════════════════════════════════════════
//
// - Per-key FIFO locking with bounded wait
// - Retry of Result-returning operations with exponential backoff
// - Graceful shutdown handling
//
// Quick Start:
//   import { KeyedLock, retryResult, registerShutdownHook } from './infrastructure/index.js';
//
//   const lock = new KeyedLock({ waitTimeoutMs: 2000 });
//   const result = await lock.withLock(userId, () => persist(record));
//
//   registerShutdownHook('store', () => store.disconnect(), { priority: 'normal' });
//   installSignalHandlers();
//
// ═══════════════════════════════════════════════════════════════════════════════

export * from './locking/index.js';
export * from './retry/index.js';
export * from './shutdown/index.js';
