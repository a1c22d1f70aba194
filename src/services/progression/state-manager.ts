// ═══════════════════════════════════════════════════════════════════════════════
// PLAYER STATE MANAGER — Serialized Per-User Mutation and Persistence
// ═══════════════════════════════════════════════════════════════════════════════
//
// Owns the one in-memory copy of every player's record and is the only
// writer to the PlayerStore. All access to a user goes through that user's
// lock, so a quest completion and a scheduler tick for the same player are
// totally ordered, while different players never wait on each other.
//
// mutate() commit order:
//   1. lock (bounded wait)      -> LOCK_TIMEOUT, nothing happens
//   2. load fresh record        -> STORAGE_FAILURE
//   3. transform(record, now)   -> transform's own error
//   4. append events to log, validate transition -> INVARIANT_VIOLATION
//   5. persist                  -> STORAGE_FAILURE, cache untouched
//   6. swap into cache, unlock
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { AsyncResult, Result } from '../../types/result.js';
import { ok, err } from '../../types/result.js';
import { createTimestamp, type Timestamp, type UserId } from '../../types/branded.js';
import { KeyedLock, type AcquireOptions } from '../../infrastructure/locking/index.js';
import { getLogger } from '../../observability/logging/index.js';
import { createPlayerRecord, validateTransition } from './engine.js';
import { lockTimeout, type ProgressionError } from './errors.js';
import type { PlayerStore } from './player-store.js';
import type { ActivityLogEntry, PlayerRecord, ProgressionEvent, Transition } from './types.js';

const logger = getLogger({ component: 'player-state' });

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * What a transform decided: leave the record alone, or replace it.
 */
export type MutationStep<T> =
  | { readonly kind: 'unchanged'; readonly value: T }
  | {
      readonly kind: 'changed';
      readonly record: PlayerRecord;
      readonly events: readonly ProgressionEvent[];
      readonly value: T;
    };

/**
 * Runs under the user's lock against the freshest record. Must be
 * synchronous and pure; side effects belong after mutate() returns.
 */
export type Transform<T> = (record: PlayerRecord, now: Timestamp) => Result<MutationStep<T>, ProgressionError>;

export interface MutationOutcome<T> {
  /** Committed record (or the current one when unchanged) */
  readonly record: PlayerRecord;
  readonly events: readonly ProgressionEvent[];
  readonly value: T;
  readonly changed: boolean;
}

export interface StateManagerConfig {
  /** Default wait for a user's lock */
  readonly lockWaitMs: number;

  /** Millisecond clock */
  readonly clock: () => number;
}

export const DEFAULT_STATE_MANAGER_CONFIG: StateManagerConfig = {
  lockWaitMs: 10_000,
  clock: Date.now,
};

export type MutateOptions = AcquireOptions;

// ─────────────────────────────────────────────────────────────────────────────────
// STEP HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

export function unchangedStep<T>(value: T): MutationStep<T> {
  return { kind: 'unchanged', value };
}

export function changedStep<T>(transition: Transition, value: T): MutationStep<T> {
  return { kind: 'changed', record: transition.record, events: transition.events, value };
}

/**
 * Lift a fallible engine transition into a transform result.
 */
export function fromTransition(
  result: Result<Transition, ProgressionError>
): Result<MutationStep<readonly ProgressionEvent[]>, ProgressionError> {
  if (!result.ok) {
    return result;
  }
  return ok(changedStep(result.value, result.value.events));
}

// ─────────────────────────────────────────────────────────────────────────────────
// MANAGER
// ─────────────────────────────────────────────────────────────────────────────────

export class PlayerStateManager {
  private readonly store: PlayerStore;
  private readonly config: StateManagerConfig;
  private readonly lock: KeyedLock;
  private readonly records = new Map<UserId, PlayerRecord>();
  private readonly inFlight = new Set<Promise<unknown>>();

  constructor(store: PlayerStore, config?: Partial<StateManagerConfig>) {
    this.store = store;
    this.config = { ...DEFAULT_STATE_MANAGER_CONFIG, ...config };
    this.lock = new KeyedLock({ waitTimeoutMs: this.config.lockWaitMs });
  }

  /**
   * Current record, loading or creating it on first contact.
   */
  getOrCreate(userId: UserId, options?: MutateOptions): AsyncResult<PlayerRecord, ProgressionError> {
    return this.withUserLock(userId, options, () => this.load(userId));
  }

  /**
   * Snapshot for read-only views. Records are immutable, so the snapshot
   * cannot change under the caller.
   */
  read(userId: UserId, options?: MutateOptions): AsyncResult<PlayerRecord, ProgressionError> {
    return this.getOrCreate(userId, options);
  }

  /**
   * The only way to change a player's record.
   */
  mutate<T>(
    userId: UserId,
    transform: Transform<T>,
    options?: MutateOptions
  ): AsyncResult<MutationOutcome<T>, ProgressionError> {
    return this.withUserLock(userId, options, () => this.commit(userId, transform));
  }

  /**
   * Users known to the store plus any cached ones. Fails only when the
   * store index cannot be read.
   */
  async knownUserIds(): AsyncResult<UserId[], ProgressionError> {
    const listed = await this.store.listUserIds();
    if (!listed.ok) {
      return listed;
    }
    const ids = new Set<UserId>(listed.value);
    for (const userId of this.records.keys()) {
      ids.add(userId);
    }
    return ok([...ids].sort());
  }

  cachedUserIds(): UserId[] {
    return [...this.records.keys()].sort();
  }

  /**
   * Resolves once every mutation started before the call has finished.
   */
  async drain(): Promise<void> {
    await Promise.allSettled([...this.inFlight]);
  }

  /**
   * Current time on the manager's clock.
   */
  now(): Timestamp {
    return createTimestamp(this.config.clock());
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────────────────

  private async withUserLock<T>(
    userId: UserId,
    options: MutateOptions | undefined,
    fn: () => AsyncResult<T, ProgressionError>
  ): AsyncResult<T, ProgressionError> {
    const run = async (): AsyncResult<T, ProgressionError> => {
      const acquired = await this.lock.acquire(userId, options);
      if (!acquired.ok) {
        logger.warn('Player lock wait timed out', { userId, waitedMs: acquired.error.waitedMs });
        return err(lockTimeout(userId, acquired.error.waitedMs));
      }
      try {
        return await fn();
      } finally {
        acquired.value();
      }
    };

    const pending = run();
    this.inFlight.add(pending);
    try {
      return await pending;
    } finally {
      this.inFlight.delete(pending);
    }
  }

  /**
   * Caller must hold the user's lock.
   */
  private async load(userId: UserId): AsyncResult<PlayerRecord, ProgressionError> {
    const cached = this.records.get(userId);
    if (cached) {
      return ok(cached);
    }

    const stored = await this.store.get(userId);
    if (!stored.ok) {
      return stored;
    }
    if (stored.value) {
      this.records.set(userId, stored.value);
      return ok(stored.value);
    }

    const record = createPlayerRecord(userId, this.now());
    const created = await this.store.create(userId, record);
    if (!created.ok) {
      return created;
    }
    logger.info('Player created', { userId });
    this.records.set(userId, record);
    return ok(record);
  }

  /**
   * Caller must hold the user's lock.
   */
  private async commit<T>(
    userId: UserId,
    transform: Transform<T>
  ): AsyncResult<MutationOutcome<T>, ProgressionError> {
    const loaded = await this.load(userId);
    if (!loaded.ok) {
      return loaded;
    }
    const current = loaded.value;
    const now = this.now();

    const step = transform(current, now);
    if (!step.ok) {
      return step;
    }
    const decision = step.value;
    if (decision.kind === 'unchanged') {
      return ok({ record: current, events: [], value: decision.value, changed: false });
    }

    const { events, value } = decision;
    const entries: ActivityLogEntry[] = events.map(event => ({ ...event, at: now }));
    const next: PlayerRecord = {
      ...decision.record,
      activityLog: [...decision.record.activityLog, ...entries],
      updatedAt: now,
    };

    const valid = validateTransition(current, next);
    if (!valid.ok) {
      logger.error('Rejected illegal transition', valid.error, { userId });
      return valid;
    }

    const persisted = await this.store.put(userId, next);
    if (!persisted.ok) {
      return persisted;
    }

    this.records.set(userId, next);
    logger.debug('Player updated', {
      userId,
      events: events.map(e => e.event.kind),
      xp: next.xp,
      level: next.level,
    });
    return ok({ record: next, events, value, changed: true });
  }
}

export function createPlayerStateManager(
  store: PlayerStore,
  config?: Partial<StateManagerConfig>
): PlayerStateManager {
  return new PlayerStateManager(store, config);
}
