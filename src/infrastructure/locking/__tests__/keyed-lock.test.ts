// ═══════════════════════════════════════════════════════════════════════════════
// KEYED LOCK TESTS — FIFO Ordering, Bounded Wait, Key Isolation
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { KeyedLock, createKeyedLock, type ReleaseFn } from '../keyed-lock.js';
import { unwrap } from '../../../types/result.js';

describe('KeyedLock', () => {
  let lock: KeyedLock;

  beforeEach(() => {
    lock = createKeyedLock({ waitTimeoutMs: 1000 });
  });

  describe('acquire', () => {
    it('should grant a free lock immediately', async () => {
      const result = await lock.acquire('user-1');

      expect(result.ok).toBe(true);
      expect(lock.isLocked('user-1')).toBe(true);

      unwrap(result)();
      expect(lock.isLocked('user-1')).toBe(false);
    });

    it('should grant waiters in arrival order', async () => {
      const release = unwrap(await lock.acquire('user-1'));
      const order: number[] = [];

      const waiters = [1, 2, 3].map(n =>
        lock.acquire('user-1').then(result => {
          order.push(n);
          unwrap(result)();
        })
      );

      expect(lock.pendingCount('user-1')).toBe(3);
      release();
      await Promise.all(waiters);

      expect(order).toEqual([1, 2, 3]);
      expect(lock.isLocked('user-1')).toBe(false);
      expect(lock.pendingCount('user-1')).toBe(0);
    });

    it('should not block other keys', async () => {
      unwrap(await lock.acquire('user-1'));

      const other = await lock.acquire('user-2', { waitTimeoutMs: 0 });

      expect(other.ok).toBe(true);
    });

    it('should fail immediately with a zero wait budget when held', async () => {
      unwrap(await lock.acquire('user-1'));

      const result = await lock.acquire('user-1', { waitTimeoutMs: 0 });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('LOCK_TIMEOUT');
        expect(result.error.waitedMs).toBe(0);
      }
    });

    it('should ignore a second release call', async () => {
      const first = unwrap(await lock.acquire('user-1'));
      const waiter = lock.acquire('user-1');

      first();
      const second = unwrap(await waiter);
      first();

      expect(lock.isLocked('user-1')).toBe(true);
      second();
      expect(lock.isLocked('user-1')).toBe(false);
    });
  });

  describe('bounded wait', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should time out and leave the queue without disturbing others', async () => {
      const holder = unwrap(await lock.acquire('user-1'));
      const impatient = lock.acquire('user-1', { waitTimeoutMs: 50 });
      const patient = lock.acquire('user-1', { waitTimeoutMs: 5000 });

      await vi.advanceTimersByTimeAsync(50);
      const timedOut = await impatient;

      expect(timedOut.ok).toBe(false);
      if (!timedOut.ok) {
        expect(timedOut.error).toEqual({
          code: 'LOCK_TIMEOUT',
          message: 'Timed out waiting for lock "user-1" after 50ms',
          key: 'user-1',
          waitedMs: 50,
        });
      }
      expect(lock.pendingCount('user-1')).toBe(1);

      holder();
      const granted = await patient;
      expect(granted.ok).toBe(true);
    });
  });

  describe('withLock', () => {
    it('should return the function result and release', async () => {
      const result = await lock.withLock('user-1', async () => 42);

      expect(result).toEqual({ ok: true, value: 42 });
      expect(lock.isLocked('user-1')).toBe(false);
    });

    it('should release when the function throws', async () => {
      await expect(
        lock.withLock('user-1', async () => {
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');

      expect(lock.isLocked('user-1')).toBe(false);
    });

    it('should serialize overlapping critical sections', async () => {
      let active = 0;
      let maxActive = 0;
      let gate: ReleaseFn = () => undefined;
      const opened = new Promise<void>(resolve => {
        gate = () => resolve();
      });

      const first = lock.withLock('user-1', async () => {
        active++;
        maxActive = Math.max(maxActive, active);
        await opened;
        active--;
      });
      const second = lock.withLock('user-1', async () => {
        active++;
        maxActive = Math.max(maxActive, active);
        active--;
      });

      gate();
      await Promise.all([first, second]);

      expect(maxActive).toBe(1);
    });
  });
});
