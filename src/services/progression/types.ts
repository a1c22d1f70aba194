// ═══════════════════════════════════════════════════════════════════════════════
// PROGRESSION TYPES — Player Records, Quests, Activity Events
// ═══════════════════════════════════════════════════════════════════════════════

import type { QuestId, Timestamp, UserId } from '../../types/branded.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Version written with every persisted record.
 */
export const PLAYER_SCHEMA_VERSION = 1;

/**
 * Longest note body accepted, in Unicode code points.
 */
export const MAX_NOTE_LENGTH = 2000;

// ═══════════════════════════════════════════════════════════════════════════════
// INPUT MODE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * How the next free-text message from the user is interpreted.
 */
export const INPUT_MODES = ['idle', 'awaiting_note', 'awaiting_procrastination_reply'] as const;

export type InputMode = (typeof INPUT_MODES)[number];

// ═══════════════════════════════════════════════════════════════════════════════
// QUESTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Inclusive gold range awarded for a quest.
 */
export interface GoldRange {
  readonly min: number;
  readonly max: number;
}

export interface QuestDefinition {
  readonly id: QuestId;
  readonly name: string;
  readonly xpReward: number;
  readonly goldReward: GoldRange;
}

/**
 * Draws an integer in [min, max].
 */
export type GoldRoll = (min: number, max: number) => number;

// ═══════════════════════════════════════════════════════════════════════════════
// ACTIVITY
// ═══════════════════════════════════════════════════════════════════════════════

export type PenaltyReason = 'reminder_expired' | 'admitted_inactivity';

export type ActivityEvent =
  | { readonly kind: 'quest_completed'; readonly questId: QuestId; readonly questName: string }
  | { readonly kind: 'level_up'; readonly level: number }
  | { readonly kind: 'penalty_applied'; readonly reason: PenaltyReason };

/**
 * An event emitted by a state transition, before it is stamped and logged.
 */
export interface ProgressionEvent {
  readonly event: ActivityEvent;
  readonly xpDelta: number;
  readonly goldDelta: number;
}

export interface ActivityLogEntry extends ProgressionEvent {
  readonly at: Timestamp;
}

export interface Note {
  readonly at: Timestamp;
  readonly text: string;
}

// ═══════════════════════════════════════════════════════════════════════════════
// PLAYER RECORD
// ═══════════════════════════════════════════════════════════════════════════════

export interface PlayerRecord {
  readonly schemaVersion: number;
  readonly userId: UserId;

  /** Cumulative, never negative */
  readonly xp: number;

  /** Always equal to levelFor(xp) */
  readonly level: number;

  readonly gold: number;
  readonly inputMode: InputMode;

  /** Last rewarded quest completion, or creation time */
  readonly lastActivityAt: Timestamp;

  /** Last unanswered reminder */
  readonly pendingReminderAt: Timestamp | null;

  readonly notes: readonly Note[];
  readonly activityLog: readonly ActivityLogEntry[];
  readonly createdAt: Timestamp;
  readonly updatedAt: Timestamp;

  /** Stored fields this version does not know; written back unchanged */
  readonly extensions?: Readonly<Record<string, unknown>>;
}

/**
 * Output of a pure state transition.
 */
export interface Transition {
  readonly record: PlayerRecord;
  readonly events: readonly ProgressionEvent[];
}

// ═══════════════════════════════════════════════════════════════════════════════
// VIEWS
// ═══════════════════════════════════════════════════════════════════════════════

export interface ProgressSummary {
  readonly level: number;
  readonly xp: number;

  /** xp earned since reaching the current level */
  readonly xpIntoLevel: number;

  /** xp between the current level and the next */
  readonly xpForNextLevel: number;

  readonly gold: number;
}

export interface ProfileView extends ProgressSummary {
  readonly userId: UserId;
  readonly inputMode: InputMode;
  readonly pendingReminderAt: Timestamp | null;
  readonly notesCount: number;

  /** Most recent entries, oldest first */
  readonly recentActivity: readonly ActivityLogEntry[];
}
