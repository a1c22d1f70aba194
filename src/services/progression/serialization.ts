// ═══════════════════════════════════════════════════════════════════════════════
// SERIALIZATION — PlayerRecord <-> JSON
// ═══════════════════════════════════════════════════════════════════════════════
//
// Decoding is lenient where it is safe to be: fields missing from older
// records get defaults, and fields a newer writer added are kept in
// `extensions` and written back on the next encode. Anything that cannot
// be decoded is a storage failure; the caller never gets a blank record in
// place of a damaged one.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import type { Result } from '../../types/result.js';
import { ok, err } from '../../types/result.js';
import {
  type __brand,
  createQuestId,
  createTimestamp,
  createUserId,
  isValidUserId,
} from '../../types/branded.js';
import { storageFailure, type ProgressionError } from './errors.js';
import { levelFor } from './levels.js';
import { INPUT_MODES, PLAYER_SCHEMA_VERSION, type PlayerRecord } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// SCHEMA
// ─────────────────────────────────────────────────────────────────────────────────

const TimestampSchema = z.number().int().nonnegative().transform(ms => createTimestamp(ms));

const ActivityEventSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('quest_completed'),
    questId: z.string().min(1).transform(createQuestId),
    questName: z.string(),
  }),
  z.object({
    kind: z.literal('level_up'),
    level: z.number().int().positive(),
  }),
  z.object({
    kind: z.literal('penalty_applied'),
    reason: z.enum(['reminder_expired', 'admitted_inactivity']),
  }),
]);

const ActivityLogEntrySchema = z.object({
  at: TimestampSchema,
  event: ActivityEventSchema,
  xpDelta: z.number().int(),
  goldDelta: z.number().int(),
});

const NoteSchema = z.object({
  at: TimestampSchema,
  text: z.string(),
});

const PlayerRecordFields = z.object({
  schemaVersion: z.number().int().positive().default(PLAYER_SCHEMA_VERSION),
  userId: z.string().refine(isValidUserId, 'Invalid user id').transform(createUserId),
  xp: z.number().int().nonnegative().default(0),
  gold: z.number().int().nonnegative().default(0),
  inputMode: z.enum(INPUT_MODES).default('idle'),
  lastActivityAt: TimestampSchema,
  pendingReminderAt: TimestampSchema.nullable().default(null),
  notes: z.array(NoteSchema).default([]),
  activityLog: z.array(ActivityLogEntrySchema).default([]),
  createdAt: TimestampSchema.optional(),
  updatedAt: TimestampSchema.optional(),
});

// level is derived from xp and never carried as an extension
const KNOWN_FIELDS: ReadonlySet<string> = new Set([...Object.keys(PlayerRecordFields.shape), 'level']);

export const PlayerRecordSchema = PlayerRecordFields.passthrough().transform((raw): PlayerRecord => {
  const extensions: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!KNOWN_FIELDS.has(key)) {
      extensions[key] = value;
    }
  }

  return {
    schemaVersion: PLAYER_SCHEMA_VERSION,
    userId: raw.userId,
    xp: raw.xp,
    // a stored level is not trusted
    level: levelFor(raw.xp),
    gold: raw.gold,
    inputMode: raw.inputMode,
    lastActivityAt: raw.lastActivityAt,
    pendingReminderAt: raw.pendingReminderAt,
    notes: raw.notes,
    activityLog: raw.activityLog,
    createdAt: raw.createdAt ?? raw.lastActivityAt,
    updatedAt: raw.updatedAt ?? raw.lastActivityAt,
    ...(Object.keys(extensions).length > 0 ? { extensions } : {}),
  };
});

// ─────────────────────────────────────────────────────────────────────────────────
// ENCODE / DECODE
// ─────────────────────────────────────────────────────────────────────────────────

export function serializePlayerRecord(record: PlayerRecord): string {
  const { extensions, ...known } = record;
  return JSON.stringify({ ...extensions, ...known });
}

export function deserializePlayerRecord(raw: string): Result<PlayerRecord, ProgressionError> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    return err(storageFailure('Stored player record is not valid JSON', error));
  }

  const parsed = PlayerRecordSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    return err(storageFailure(`Stored player record is invalid (${issues.join('; ')})`, parsed.error));
  }

  return ok(parsed.data);
}
