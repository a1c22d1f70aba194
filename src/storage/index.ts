// ═══════════════════════════════════════════════════════════════════════════════
// STORAGE MODULE — Backend Selection
// ═══════════════════════════════════════════════════════════════════════════════

import type { StorageConfig } from '../config/index.js';
import { getLogger } from '../observability/logging/index.js';
import { MemoryStore } from './memory.js';
import { RedisStore } from './redis.js';
import type { KeyValueStore } from './types.js';

export type { KeyValueStore } from './types.js';
export { MemoryStore } from './memory.js';
export { RedisStore, type RedisStoreConfig } from './redis.js';

const logger = getLogger({ component: 'storage' });

/**
 * Create and connect the configured store.
 * Rejects when Redis is selected and cannot be reached.
 */
export async function createKeyValueStore(config: StorageConfig): Promise<KeyValueStore> {
  if (config.backend === 'memory') {
    logger.warn('Using in-memory storage; player records will not survive a restart');
    return new MemoryStore();
  }

  const store = new RedisStore({
    url: config.redisUrl,
    connectTimeoutMs: config.connectTimeoutMs,
  });
  await store.connect();
  const pong = await store.ping();
  logger.info('Connected to Redis', { pong });
  return store;
}
