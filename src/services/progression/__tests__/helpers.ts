// ═══════════════════════════════════════════════════════════════════════════════
// TEST HELPERS — Store and Channel Doubles
// ═══════════════════════════════════════════════════════════════════════════════

import { MemoryStore } from '../../../storage/memory.js';
import type { UserId } from '../../../types/branded.js';
import { levelFor } from '../levels.js';
import type { OutboundChannel } from '../outbound.js';
import type { PlayerRecord, ProgressionEvent } from '../types.js';

/**
 * MemoryStore that can be told to fail or to hold writes for a key.
 */
export class FlakyStore extends MemoryStore {
  failReads = false;
  failIndex = false;
  private failingWrites = 0;
  private readonly gates = new Map<string, Promise<void>>();

  /** Fail the next `count` SETs */
  failNextWrites(count: number): void {
    this.failingWrites = count;
  }

  /** Block SETs on `key` until the returned function is called */
  holdWrites(key: string): () => void {
    let release: () => void = () => undefined;
    this.gates.set(key, new Promise<void>(resolve => {
      release = resolve;
    }));
    return () => {
      this.gates.delete(key);
      release();
    };
  }

  override async get(key: string): Promise<string | null> {
    if (this.failReads) throw new Error('connection reset');
    return super.get(key);
  }

  override async set(key: string, value: string): Promise<void> {
    const gate = this.gates.get(key);
    if (gate) await gate;
    if (this.failingWrites > 0) {
      this.failingWrites--;
      throw new Error('disk full');
    }
    return super.set(key, value);
  }

  override async sadd(key: string, ...members: string[]): Promise<number> {
    if (this.failIndex) throw new Error('index unavailable');
    return super.sadd(key, ...members);
  }

  override async smembers(key: string): Promise<string[]> {
    if (this.failIndex) throw new Error('index unavailable');
    return super.smembers(key);
  }
}

/**
 * OutboundChannel that records what it was asked to send.
 */
export class RecordingChannel implements OutboundChannel {
  readonly published: Array<{ userId: UserId; events: readonly ProgressionEvent[] }> = [];
  readonly reminders: UserId[] = [];
  failPublish = false;
  failReminders = false;

  async publishEvents(userId: UserId, events: readonly ProgressionEvent[]): Promise<void> {
    if (this.failPublish) throw new Error('transport down');
    this.published.push({ userId, events });
  }

  async deliverReminder(userId: UserId): Promise<void> {
    if (this.failReminders) throw new Error('transport down');
    this.reminders.push(userId);
  }
}

export function withXp(record: PlayerRecord, xp: number): PlayerRecord {
  return { ...record, xp, level: levelFor(xp) };
}

/**
 * Let pending promise callbacks and zero-delay timers run.
 */
export function flush(): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, 0));
}
