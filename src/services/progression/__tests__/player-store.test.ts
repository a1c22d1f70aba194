// ═══════════════════════════════════════════════════════════════════════════════
// PLAYER STORE TESTS — Keys, Index, Failure Mapping
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach } from 'vitest';
import { createTimestamp, createUserId } from '../../../types/branded.js';
import { unwrap, unwrapErr } from '../../../types/result.js';
import { createPlayerRecord } from '../engine.js';
import { PlayerStore } from '../player-store.js';
import { serializePlayerRecord } from '../serialization.js';
import { FlakyStore, withXp } from './helpers.js';

const U1 = createUserId('u1');
const T0 = createTimestamp(1000);

describe('PlayerStore', () => {
  let store: FlakyStore;
  let players: PlayerStore;

  beforeEach(() => {
    store = new FlakyStore();
    players = new PlayerStore(store, { keyPrefix: 'test:' });
  });

  it('should return null for a user never stored', async () => {
    expect(unwrap(await players.get(U1))).toBeNull();
  });

  it('should create, index and read back a record', async () => {
    const record = withXp(createPlayerRecord(U1, T0), 120);
    unwrap(await players.create(U1, record));

    expect(unwrap(await players.get(U1))).toEqual(record);
    expect(await store.get('test:player:u1')).not.toBeNull();
    expect(await store.smembers('test:players')).toEqual(['u1']);
  });

  it('should list user ids sorted and skip malformed index members', async () => {
    unwrap(await players.create(createUserId('b'), createPlayerRecord(createUserId('b'), T0)));
    unwrap(await players.create(createUserId('a'), createPlayerRecord(createUserId('a'), T0)));
    await store.sadd('test:players', 'not a valid id');

    expect(unwrap(await players.listUserIds())).toEqual(['a', 'b']);
  });

  it('should refuse a record stored under another user', async () => {
    await store.set('test:player:u1', serializePlayerRecord(createPlayerRecord(createUserId('u2'), T0)));

    const error = unwrapErr(await players.get(U1));
    expect(error.code).toBe('STORAGE_FAILURE');
    expect(error.message).toBe('Record under test:player:u1 belongs to u2');
  });

  it('should map a corrupted record to a storage failure', async () => {
    await store.set('test:player:u1', 'garbage');
    expect(unwrapErr(await players.get(U1)).code).toBe('STORAGE_FAILURE');
  });

  it('should map store errors to storage failures', async () => {
    store.failNextWrites(1);
    expect(unwrapErr(await players.put(U1, createPlayerRecord(U1, T0))).message).toBe(
      'Failed to write player u1: disk full'
    );

    store.failReads = true;
    expect(unwrapErr(await players.get(U1)).message).toBe('Failed to read player u1: connection reset');
  });

  it('should not write the record when indexing fails', async () => {
    store.failIndex = true;

    expect(unwrapErr(await players.create(U1, createPlayerRecord(U1, T0))).message).toBe(
      'Failed to index player u1: index unavailable'
    );
    expect(await store.get('test:player:u1')).toBeNull();
    expect(unwrapErr(await players.listUserIds()).code).toBe('STORAGE_FAILURE');
  });
});
