// ═══════════════════════════════════════════════════════════════════════════════
// ACTION ROUTER — Inbound Commands to State Mutations
// ═══════════════════════════════════════════════════════════════════════════════
//
// Each mutating command is exactly one PlayerStateManager.mutate() call
// (repeated only when storage fails, which commits nothing). Committed
// events are handed to the outbound channel afterwards.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { AsyncResult, Result } from '../../types/result.js';
import { ok, err } from '../../types/result.js';
import type { Timestamp, UserId } from '../../types/branded.js';
import { retryResult } from '../../infrastructure/retry/index.js';
import { getLogger } from '../../observability/logging/index.js';
import type { QuestCatalog } from './catalog.js';
import {
  beginNote,
  cancelInput,
  completeQuest,
  openReminderReply,
  resolveReminderReply,
  submitNote,
} from './engine.js';
import { inconsistentMode, invalidInput, isTransientError, type ProgressionError } from './errors.js';
import { randomGoldRoll } from './gold-roll.js';
import { describeProgress } from './levels.js';
import type { OutboundChannel } from './outbound.js';
import {
  fromTransition,
  type MutationStep,
  type PlayerStateManager,
} from './state-manager.js';
import type {
  ActivityLogEntry,
  GoldRoll,
  Note,
  PlayerRecord,
  ProfileView,
  ProgressionEvent,
  QuestDefinition,
  Transition,
} from './types.js';

const logger = getLogger({ component: 'action-router' });

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface ActionRouterConfig {
  /** xp removed when the player admits inactivity */
  readonly penaltyXp: number;

  /** Extra attempts after a storage failure */
  readonly storageRetryAttempts: number;

  readonly storageRetryDelayMs: number;

  /** Entries shown in the profile view */
  readonly recentActivityLimit: number;

  readonly goldRoll: GoldRoll;
}

export const DEFAULT_ACTION_ROUTER_CONFIG: ActionRouterConfig = {
  penaltyXp: 10,
  storageRetryAttempts: 2,
  storageRetryDelayMs: 200,
  recentActivityLimit: 10,
  goldRoll: randomGoldRoll,
};

export interface CommandOutcome {
  readonly record: PlayerRecord;
  readonly events: readonly ProgressionEvent[];
  readonly changed: boolean;
}

/**
 * Slice of an append-only history. Newest first unless told otherwise.
 */
export interface HistoryQuery {
  readonly limit?: number;
  readonly newestFirst?: boolean;
}

type EventTransform = (
  record: PlayerRecord,
  now: Timestamp
) => Result<MutationStep<readonly ProgressionEvent[]>, ProgressionError>;

const AFFIRMATIVE_REPLIES = new Set(['yes', 'y', 'done', 'did it']);
const NEGATIVE_REPLIES = new Set(['no', 'n', 'nothing', 'not yet']);

/**
 * Read a free-text answer to "did you make progress?".
 * Returns whether the player admits inactivity, or null when unclear.
 */
export function parseReminderReply(text: string): boolean | null {
  const answer = text.trim().toLowerCase().replace(/[.!]+$/, '');
  if (AFFIRMATIVE_REPLIES.has(answer)) return false;
  if (NEGATIVE_REPLIES.has(answer)) return true;
  return null;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ROUTER
// ─────────────────────────────────────────────────────────────────────────────────

export class ActionRouter {
  private readonly manager: PlayerStateManager;
  private readonly catalog: QuestCatalog;
  private readonly channel: OutboundChannel;
  private readonly config: ActionRouterConfig;

  constructor(
    manager: PlayerStateManager,
    catalog: QuestCatalog,
    channel: OutboundChannel,
    config?: Partial<ActionRouterConfig>
  ) {
    this.manager = manager;
    this.catalog = catalog;
    this.channel = channel;
    this.config = { ...DEFAULT_ACTION_ROUTER_CONFIG, ...config };
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Commands
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Reward a quest by catalog id or name. Unknown quests are rejected
   * before the player's lock is taken.
   */
  async completeQuest(userId: UserId, questNameOrId: string): AsyncResult<CommandOutcome, ProgressionError> {
    const quest = this.catalog.find(questNameOrId);
    if (!quest.ok) {
      return quest;
    }
    const definition = quest.value;
    return this.run(userId, 'complete_quest', (record, now) =>
      fromTransition(completeQuest(record, definition, this.config.goldRoll, now))
    );
  }

  beginNote(userId: UserId): AsyncResult<CommandOutcome, ProgressionError> {
    return this.run(userId, 'begin_note', record => fromTransition(beginNote(record)));
  }

  submitNote(userId: UserId, text: string): AsyncResult<CommandOutcome, ProgressionError> {
    return this.run(userId, 'submit_note', (record, now) => fromTransition(submitNote(record, text, now)));
  }

  /**
   * Free text from the player, interpreted by the current input mode.
   */
  handleText(userId: UserId, text: string): AsyncResult<CommandOutcome, ProgressionError> {
    return this.run(userId, 'handle_text', (record, now) => {
      switch (record.inputMode) {
        case 'awaiting_note':
          return fromTransition(submitNote(record, text, now));
        case 'awaiting_procrastination_reply': {
          const admits = parseReminderReply(text);
          if (admits === null) {
            return err(invalidInput('Reply with "yes" or "no"'));
          }
          return fromTransition(resolveReminderReply(record, admits, this.config.penaltyXp));
        }
        case 'idle':
          return err(inconsistentMode('send text', record.inputMode, ['awaiting_note', 'awaiting_procrastination_reply']));
      }
    });
  }

  openReminderReply(userId: UserId): AsyncResult<CommandOutcome, ProgressionError> {
    return this.run(userId, 'open_reminder_reply', record => fromTransition(openReminderReply(record)));
  }

  replyToReminder(userId: UserId, admitsInactivity: boolean): AsyncResult<CommandOutcome, ProgressionError> {
    return this.run(userId, 'reply_to_reminder', record =>
      fromTransition(resolveReminderReply(record, admitsInactivity, this.config.penaltyXp))
    );
  }

  cancelInput(userId: UserId): AsyncResult<CommandOutcome, ProgressionError> {
    return this.run(userId, 'cancel_input', record => fromTransition(ok<Transition>(cancelInput(record))));
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Queries
  // ─────────────────────────────────────────────────────────────────────────────

  async requestProfile(userId: UserId): AsyncResult<ProfileView, ProgressionError> {
    const snapshot = await this.withStorageRetry(() => this.manager.read(userId));
    if (!snapshot.ok) {
      return snapshot;
    }

    const record = snapshot.value;
    const limit = this.config.recentActivityLimit;
    return ok({
      ...describeProgress(record),
      userId: record.userId,
      inputMode: record.inputMode,
      pendingReminderAt: record.pendingReminderAt,
      notesCount: record.notes.length,
      recentActivity: limit > 0 ? record.activityLog.slice(-limit) : [],
    });
  }

  /**
   * The player's journal: every activity log entry.
   */
  async activityLog(userId: UserId, query: HistoryQuery = {}): AsyncResult<readonly ActivityLogEntry[], ProgressionError> {
    const snapshot = await this.withStorageRetry(() => this.manager.read(userId));
    if (!snapshot.ok) {
      return snapshot;
    }
    return selectHistory(snapshot.value.activityLog, query);
  }

  async listNotes(userId: UserId, query: HistoryQuery = {}): AsyncResult<readonly Note[], ProgressionError> {
    const snapshot = await this.withStorageRetry(() => this.manager.read(userId));
    if (!snapshot.ok) {
      return snapshot;
    }
    return selectHistory(snapshot.value.notes, query);
  }

  listQuests(): readonly QuestDefinition[] {
    return this.catalog.list();
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Private Helpers
  // ─────────────────────────────────────────────────────────────────────────────

  private async run(
    userId: UserId,
    command: string,
    transform: EventTransform
  ): AsyncResult<CommandOutcome, ProgressionError> {
    const result = await this.withStorageRetry(() => this.manager.mutate(userId, transform));

    if (!result.ok) {
      logger.info('Command rejected', { userId, command, code: result.error.code });
      return result;
    }

    const { record, events, changed } = result.value;
    if (events.length > 0) {
      try {
        await this.channel.publishEvents(userId, events);
      } catch (error) {
        logger.warn('Failed to publish events', { userId, command, error: error instanceof Error ? error.message : String(error) });
      }
    }

    return ok({ record, events, changed });
  }

  private withStorageRetry<T>(operation: () => AsyncResult<T, ProgressionError>): AsyncResult<T, ProgressionError> {
    return retryResult(operation, {
      maxAttempts: this.config.storageRetryAttempts,
      initialDelayMs: this.config.storageRetryDelayMs,
      isRetryable: isTransientError,
    });
  }
}

function selectHistory<T>(items: readonly T[], query: HistoryQuery): Result<readonly T[], ProgressionError> {
  const { limit, newestFirst = true } = query;
  if (limit !== undefined && (!Number.isSafeInteger(limit) || limit < 0)) {
    return err(invalidInput(`History limit must be a non-negative integer, got ${limit}`));
  }

  const ordered = newestFirst ? [...items].reverse() : [...items];
  return ok(limit === undefined ? ordered : ordered.slice(0, limit));
}

export function createActionRouter(
  manager: PlayerStateManager,
  catalog: QuestCatalog,
  channel: OutboundChannel,
  config?: Partial<ActionRouterConfig>
): ActionRouter {
  return new ActionRouter(manager, catalog, channel, config);
}
