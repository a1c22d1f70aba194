// ═══════════════════════════════════════════════════════════════════════════════
// PROGRESSION ENGINE — Pure State Transitions
// ═══════════════════════════════════════════════════════════════════════════════
//
// Every function here is pure: it takes a record and returns a new one plus
// the events the change produced. Nothing here reads the clock, touches
// storage, or appends to the activity log; PlayerStateManager does that
// when it commits a transition.
//
// Programming errors (negative xp, non-positive penalty, an out-of-range
// roll) throw RangeError. Expected rejections come back as Err values.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { Result } from '../../types/result.js';
import { ok, err, okVoid } from '../../types/result.js';
import type { Timestamp, UserId } from '../../types/branded.js';
import {
  inconsistentMode,
  invalidInput,
  invariantViolation,
  noPendingReminder,
  type ProgressionError,
} from './errors.js';
import { levelFor, xpForLevel } from './levels.js';
import {
  MAX_NOTE_LENGTH,
  PLAYER_SCHEMA_VERSION,
  type GoldRoll,
  type PenaltyReason,
  type PlayerRecord,
  type ProgressionEvent,
  type QuestDefinition,
  type Transition,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// CREATION
// ─────────────────────────────────────────────────────────────────────────────────

export function createPlayerRecord(userId: UserId, now: Timestamp): PlayerRecord {
  return {
    schemaVersion: PLAYER_SCHEMA_VERSION,
    userId,
    xp: 0,
    level: 1,
    gold: 0,
    inputMode: 'idle',
    lastActivityAt: now,
    pendingReminderAt: null,
    notes: [],
    activityLog: [],
    createdAt: now,
    updatedAt: now,
  };
}

function unchanged(record: PlayerRecord): Transition {
  return { record, events: [] };
}

// ─────────────────────────────────────────────────────────────────────────────────
// REWARDS & PENALTIES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Apply a quest reward. Emits quest_completed followed by one level_up per
 * level gained. Marks the player active and answers any pending reminder.
 * Leaves inputMode alone; see completeQuest for the mode-aware variant.
 */
export function applyQuest(
  record: PlayerRecord,
  quest: QuestDefinition,
  roll: GoldRoll,
  now: Timestamp
): Transition {
  const { min, max } = quest.goldReward;
  const gold = roll(min, max);
  if (!Number.isSafeInteger(gold) || gold < min || gold > max) {
    throw new RangeError(`Gold roll ${gold} outside [${min}, ${max}] for quest ${quest.id}`);
  }

  const xp = record.xp + quest.xpReward;
  const level = levelFor(xp);

  const events: ProgressionEvent[] = [
    {
      event: { kind: 'quest_completed', questId: quest.id, questName: quest.name },
      xpDelta: quest.xpReward,
      goldDelta: gold,
    },
  ];
  for (let reached = record.level + 1; reached <= level; reached++) {
    events.push({ event: { kind: 'level_up', level: reached }, xpDelta: 0, goldDelta: 0 });
  }

  return {
    record: {
      ...record,
      xp,
      level: Math.max(record.level, level),
      gold: record.gold + gold,
      lastActivityAt: now,
      pendingReminderAt: null,
    },
    events,
  };
}

/**
 * Deduct xp for inactivity.
 *
 * The deduction stops at the floor of the current level (and so never below
 * zero): levels are never lost, and level stays equal to levelFor(xp). The
 * emitted event carries the xp actually removed, which may be less than
 * `amount` and may be zero.
 */
export function applyPenalty(record: PlayerRecord, amount: number, reason: PenaltyReason): Transition {
  if (!Number.isSafeInteger(amount) || amount <= 0) {
    throw new RangeError(`Penalty must be a positive integer, got ${amount}`);
  }

  const floor = xpForLevel(record.level);
  const xp = Math.max(floor, record.xp - amount);

  return {
    record: { ...record, xp },
    events: [
      {
        event: { kind: 'penalty_applied', reason },
        xpDelta: xp - record.xp,
        goldDelta: 0,
      },
    ],
  };
}

/**
 * Quest completion as submitted by the player. Rejected mid-note; answers a
 * reminder question that is waiting for a reply.
 */
export function completeQuest(
  record: PlayerRecord,
  quest: QuestDefinition,
  roll: GoldRoll,
  now: Timestamp
): Result<Transition, ProgressionError> {
  if (record.inputMode === 'awaiting_note') {
    return err(inconsistentMode('complete a quest', record.inputMode, ['idle', 'awaiting_procrastination_reply']));
  }

  const applied = applyQuest(record, quest, roll, now);
  return ok<Transition>({
    record: { ...applied.record, inputMode: 'idle' },
    events: applied.events,
  });
}

// ─────────────────────────────────────────────────────────────────────────────────
// REMINDER PREDICATES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * The player has been quiet for a full interval and has not been reminded yet.
 */
export function dueForReminder(record: PlayerRecord, now: number, intervalMs: number): boolean {
  return record.pendingReminderAt === null && now - record.lastActivityAt >= intervalMs;
}

/**
 * A reminder went unanswered for the whole grace period.
 */
export function reminderIsOverdue(record: PlayerRecord, now: number, graceMs: number): boolean {
  return record.pendingReminderAt !== null && now - record.pendingReminderAt >= graceMs;
}

// ─────────────────────────────────────────────────────────────────────────────────
// INPUT MODE TRANSITIONS
// ─────────────────────────────────────────────────────────────────────────────────

export function beginNote(record: PlayerRecord): Result<Transition, ProgressionError> {
  if (record.inputMode === 'awaiting_note') {
    return ok(unchanged(record));
  }
  if (record.inputMode !== 'idle') {
    return err(inconsistentMode('start a note', record.inputMode, ['idle']));
  }
  return ok<Transition>({ record: { ...record, inputMode: 'awaiting_note' }, events: [] });
}

export function submitNote(
  record: PlayerRecord,
  text: string,
  now: Timestamp
): Result<Transition, ProgressionError> {
  if (record.inputMode !== 'awaiting_note') {
    return err(inconsistentMode('save a note', record.inputMode, ['awaiting_note']));
  }

  const body = text.trim();
  if (body.length === 0) {
    return err(invalidInput('Note text is empty'));
  }
  // code points, so an emoji counts once
  if ([...body].length > MAX_NOTE_LENGTH) {
    return err(invalidInput(`Note text exceeds ${MAX_NOTE_LENGTH} characters`));
  }

  return ok<Transition>({
    record: {
      ...record,
      inputMode: 'idle',
      notes: [...record.notes, { at: now, text: body }],
    },
    events: [],
  });
}

/**
 * The player tapped the reminder and is about to answer it.
 */
export function openReminderReply(record: PlayerRecord): Result<Transition, ProgressionError> {
  if (record.pendingReminderAt === null) {
    return err(noPendingReminder());
  }
  if (record.inputMode === 'awaiting_procrastination_reply') {
    return ok(unchanged(record));
  }
  if (record.inputMode !== 'idle') {
    return err(inconsistentMode('answer a reminder', record.inputMode, ['idle']));
  }
  return ok<Transition>({ record: { ...record, inputMode: 'awaiting_procrastination_reply' }, events: [] });
}

/**
 * Abandon whatever input was expected.
 */
export function cancelInput(record: PlayerRecord): Transition {
  if (record.inputMode === 'idle') {
    return unchanged(record);
  }
  return { record: { ...record, inputMode: 'idle' }, events: [] };
}

/**
 * Answer a pending reminder. Affirming clears it; admitting inactivity
 * applies the penalty right away instead of waiting out the grace period.
 */
export function resolveReminderReply(
  record: PlayerRecord,
  admitsInactivity: boolean,
  penaltyXp: number
): Result<Transition, ProgressionError> {
  if (record.pendingReminderAt === null) {
    return err(noPendingReminder());
  }
  if (record.inputMode === 'awaiting_note') {
    return err(inconsistentMode('answer a reminder', record.inputMode, ['idle', 'awaiting_procrastination_reply']));
  }

  const base = admitsInactivity
    ? applyPenalty(record, penaltyXp, 'admitted_inactivity')
    : unchanged(record);

  return ok<Transition>({
    record: { ...base.record, inputMode: 'idle', pendingReminderAt: null },
    events: base.events,
  });
}

/**
 * Penalty for a reminder whose grace period ran out; clears the reminder.
 */
export function expireReminder(record: PlayerRecord, penaltyXp: number): Transition {
  const penalized = applyPenalty(record, penaltyXp, 'reminder_expired');
  return {
    record: { ...penalized.record, pendingReminderAt: null },
    events: penalized.events,
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// TRANSITION VALIDATION
// ─────────────────────────────────────────────────────────────────────────────────

function isPrefix<T>(prefix: readonly T[], full: readonly T[]): boolean {
  return prefix.length <= full.length && prefix.every((item, i) => full[i] === item);
}

/**
 * Check that `next` is a legal successor of `prev`.
 */
export function validateTransition(
  prev: PlayerRecord,
  next: PlayerRecord
): Result<void, ProgressionError> {
  if (next.userId !== prev.userId) {
    return err(invariantViolation(`userId changed from ${prev.userId} to ${next.userId}`));
  }
  if (!Number.isSafeInteger(next.xp) || next.xp < 0) {
    return err(invariantViolation(`xp must be a non-negative integer, got ${next.xp}`));
  }
  if (!Number.isSafeInteger(next.gold) || next.gold < 0) {
    return err(invariantViolation(`gold must be a non-negative integer, got ${next.gold}`));
  }
  if (next.level !== levelFor(next.xp)) {
    return err(invariantViolation(`level ${next.level} does not match xp ${next.xp}`));
  }
  if (next.level < prev.level) {
    return err(invariantViolation(`level decreased from ${prev.level} to ${next.level}`));
  }
  if (!isPrefix(prev.activityLog, next.activityLog)) {
    return err(invariantViolation('activity log entries were removed or rewritten'));
  }
  if (!isPrefix(prev.notes, next.notes)) {
    return err(invariantViolation('notes were removed or rewritten'));
  }
  return okVoid();
}
