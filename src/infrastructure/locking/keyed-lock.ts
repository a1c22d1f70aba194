// ═══════════════════════════════════════════════════════════════════════════════
// KEYED LOCK — Per-Key FIFO Mutex With Bounded Wait
// ═══════════════════════════════════════════════════════════════════════════════
//
// Serializes async critical sections that share a key while leaving other
// keys untouched. Waiters are granted the lock in arrival order; a waiter
// whose wait budget runs out is dropped from the queue and gets LOCK_TIMEOUT.
//
// Lock is in-process only. Running several processes against one store
// needs a distributed lock in front of it.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { Result } from '../../types/result.js';
import { ok, err } from '../../types/result.js';
import { getLogger } from '../../observability/logging/index.js';

const logger = getLogger({ component: 'keyed-lock' });

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type LockErrorCode = 'LOCK_TIMEOUT';

export interface LockError {
  readonly code: LockErrorCode;
  readonly message: string;
  readonly key: string;
  readonly waitedMs: number;
}

/**
 * Releases a held lock. Calling it more than once is a no-op.
 */
export type ReleaseFn = () => void;

export interface LockConfig {
  /** Maximum time to wait for the lock */
  readonly waitTimeoutMs: number;
}

export interface AcquireOptions {
  /** Overrides the configured wait for this call */
  readonly waitTimeoutMs?: number;
}

export const DEFAULT_LOCK_CONFIG: LockConfig = {
  waitTimeoutMs: 10_000,
};

interface Waiter {
  readonly grant: (release: ReleaseFn) => void;
  readonly timer: ReturnType<typeof setTimeout>;
}

// ─────────────────────────────────────────────────────────────────────────────────
// KEYED LOCK
// ─────────────────────────────────────────────────────────────────────────────────

export class KeyedLock {
  private readonly config: LockConfig;
  private readonly held = new Set<string>();
  private readonly queues = new Map<string, Waiter[]>();

  constructor(config?: Partial<LockConfig>) {
    this.config = { ...DEFAULT_LOCK_CONFIG, ...config };
  }

  /**
   * Acquire the lock for a key, waiting at most `waitTimeoutMs`.
   */
  acquire(key: string, options: AcquireOptions = {}): Promise<Result<ReleaseFn, LockError>> {
    if (!this.held.has(key)) {
      this.held.add(key);
      return Promise.resolve(ok(this.createRelease(key)));
    }

    const waitTimeoutMs = options.waitTimeoutMs ?? this.config.waitTimeoutMs;
    const startTime = Date.now();

    if (waitTimeoutMs <= 0) {
      return Promise.resolve(err(this.timeoutError(key, 0)));
    }

    return new Promise(resolve => {
      const timer = setTimeout(() => {
        this.removeWaiter(key, waiter);
        const waitedMs = Date.now() - startTime;
        logger.debug('Lock wait timed out', { key, waitedMs });
        resolve(err(this.timeoutError(key, waitedMs)));
      }, waitTimeoutMs);

      const waiter: Waiter = {
        grant: release => {
          clearTimeout(timer);
          resolve(ok(release));
        },
        timer,
      };

      const queue = this.queues.get(key);
      if (queue) {
        queue.push(waiter);
      } else {
        this.queues.set(key, [waiter]);
      }
    });
  }

  /**
   * Run `fn` while holding the lock for `key`. The lock is released when
   * `fn` settles; a rejection from `fn` propagates.
   */
  async withLock<T>(
    key: string,
    fn: () => Promise<T>,
    options: AcquireOptions = {}
  ): Promise<Result<T, LockError>> {
    const acquired = await this.acquire(key, options);
    if (!acquired.ok) {
      return acquired;
    }

    try {
      return ok(await fn());
    } finally {
      acquired.value();
    }
  }

  isLocked(key: string): boolean {
    return this.held.has(key);
  }

  /**
   * Number of callers waiting (not holding) for a key.
   */
  pendingCount(key: string): number {
    return this.queues.get(key)?.length ?? 0;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────────────────

  private createRelease(key: string): ReleaseFn {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.handOff(key);
    };
  }

  /**
   * Pass the lock to the next waiter, or free it.
   */
  private handOff(key: string): void {
    const queue = this.queues.get(key);
    const next = queue?.shift();

    if (queue && queue.length === 0) {
      this.queues.delete(key);
    }

    if (next) {
      next.grant(this.createRelease(key));
    } else {
      this.held.delete(key);
    }
  }

  private removeWaiter(key: string, waiter: Waiter): void {
    const queue = this.queues.get(key);
    if (!queue) return;

    const index = queue.indexOf(waiter);
    if (index !== -1) {
      queue.splice(index, 1);
    }
    if (queue.length === 0) {
      this.queues.delete(key);
    }
  }

  private timeoutError(key: string, waitedMs: number): LockError {
    return {
      code: 'LOCK_TIMEOUT',
      message: `Timed out waiting for lock "${key}" after ${waitedMs}ms`,
      key,
      waitedMs,
    };
  }
}

export function createKeyedLock(config?: Partial<LockConfig>): KeyedLock {
  return new KeyedLock(config);
}
