// ═══════════════════════════════════════════════════════════════════════════════
// SERIALIZATION TESTS — Lossless Encoding, Lenient Decoding
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import { createTimestamp, createUserId } from '../../../types/branded.js';
import { unwrap, unwrapErr } from '../../../types/result.js';
import { createQuestCatalog } from '../catalog.js';
import { applyQuest, createPlayerRecord } from '../engine.js';
import { fixedGoldRoll } from '../gold-roll.js';
import { deserializePlayerRecord, serializePlayerRecord } from '../serialization.js';
import type { PlayerRecord } from '../types.js';

function playedRecord(): PlayerRecord {
  const start = createPlayerRecord(createUserId('u1'), createTimestamp(1000));
  const apply = unwrap(createQuestCatalog().find('apply'));
  const at = createTimestamp(2000);
  const { record, events } = applyQuest(start, apply, fixedGoldRoll('max'), at);
  return {
    ...record,
    notes: [{ at, text: 'Sent the portfolio' }],
    activityLog: events.map(event => ({ ...event, at })),
    pendingReminderAt: createTimestamp(3000),
    updatedAt: at,
  };
}

describe('serializePlayerRecord / deserializePlayerRecord', () => {
  it('should round-trip a record with history', () => {
    const record = playedRecord();
    expect(unwrap(deserializePlayerRecord(serializePlayerRecord(record)))).toEqual(record);
  });

  it('should fill defaults for fields an older record lacks', () => {
    const decoded = unwrap(deserializePlayerRecord('{"userId":"u1","lastActivityAt":1000}'));

    expect(decoded).toEqual({
      schemaVersion: 1,
      userId: 'u1',
      xp: 0,
      level: 1,
      gold: 0,
      inputMode: 'idle',
      lastActivityAt: 1000,
      pendingReminderAt: null,
      notes: [],
      activityLog: [],
      createdAt: 1000,
      updatedAt: 1000,
    });
  });

  it('should recompute the level instead of trusting the stored one', () => {
    const decoded = unwrap(deserializePlayerRecord('{"userId":"u1","lastActivityAt":1000,"xp":120,"level":1}'));

    expect(decoded.level).toBe(3);
    expect(decoded.extensions).toBeUndefined();
  });

  it('should keep fields it does not know and write them back', () => {
    const decoded = unwrap(
      deserializePlayerRecord('{"userId":"u1","lastActivityAt":1000,"xp":120,"streak":7,"badges":["early"]}')
    );

    expect(decoded.extensions).toEqual({ streak: 7, badges: ['early'] });

    const rewritten = JSON.parse(serializePlayerRecord({ ...decoded, xp: 130 }));
    expect(rewritten.streak).toBe(7);
    expect(rewritten.badges).toEqual(['early']);
    expect(rewritten.xp).toBe(130);
    expect('extensions' in rewritten).toBe(false);
  });

  it('should let known fields win over a clashing extension', () => {
    const record: PlayerRecord = { ...playedRecord(), extensions: { xp: 9999, streak: 2 } };

    const decoded = unwrap(deserializePlayerRecord(serializePlayerRecord(record)));

    expect(decoded.xp).toBe(50);
    expect(decoded.extensions).toEqual({ streak: 2 });
  });

  it('should report malformed JSON as a storage failure', () => {
    expect(unwrapErr(deserializePlayerRecord('{not json')).message).toBe('Stored player record is not valid JSON');
  });

  it('should report an invalid record as a storage failure', () => {
    const error = unwrapErr(deserializePlayerRecord('{"userId":"u1","lastActivityAt":1000,"xp":-5}'));

    expect(error.code).toBe('STORAGE_FAILURE');
    expect(error.message).toContain('xp:');
  });

  it('should reject an unknown input mode', () => {
    const error = unwrapErr(
      deserializePlayerRecord('{"userId":"u1","lastActivityAt":1000,"inputMode":"dancing"}')
    );
    expect(error.code).toBe('STORAGE_FAILURE');
  });
});
