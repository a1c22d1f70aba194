// ═══════════════════════════════════════════════════════════════════════════════
// MEMORY STORE TESTS
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryStore } from '../memory.js';

describe('MemoryStore', () => {
  let store: MemoryStore;

  beforeEach(() => {
    store = new MemoryStore();
  });

  it('should set, get and overwrite values', async () => {
    expect(await store.get('k')).toBeNull();

    await store.set('k', 'v1');
    await store.set('k', 'v2');

    expect(await store.get('k')).toBe('v2');
    expect(store.size()).toBe(1);
  });

  it('should count only new set members', async () => {
    expect(await store.sadd('s', 'a', 'b', 'a')).toBe(2);
    expect(await store.sadd('s', 'b', 'c')).toBe(1);
    expect((await store.smembers('s')).sort()).toEqual(['a', 'b', 'c']);
    expect(await store.smembers('missing')).toEqual([]);
  });

  it('should keep strings and sets under separate keys', async () => {
    await store.set('k', 'v');
    await store.sadd('s', 'a');

    expect(await store.get('s')).toBeNull();
    expect(await store.smembers('k')).toEqual([]);
    expect(store.size()).toBe(2);
  });

  it('should answer ping and disconnect', async () => {
    expect(await store.ping()).toBe('PONG');
    expect(store.isConnected()).toBe(true);

    await store.disconnect();

    expect(store.isConnected()).toBe(false);
  });
});
