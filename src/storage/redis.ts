// ═══════════════════════════════════════════════════════════════════════════════
// REDIS STORE — ioredis-Backed KeyValueStore
// ═══════════════════════════════════════════════════════════════════════════════

import { Redis } from 'ioredis';
import type { KeyValueStore } from './types.js';
import { getLogger } from '../observability/logging/index.js';

const logger = getLogger({ component: 'redis-store' });

export interface RedisStoreConfig {
  readonly url: string;
  readonly connectTimeoutMs: number;
  readonly maxRetriesPerRequest?: number;
}

/**
 * KeyValueStore over a single ioredis connection.
 *
 * Commands issued while disconnected fail fast instead of queueing, so a
 * mutation surfaces a storage failure rather than hanging on the user's lock.
 */
export class RedisStore implements KeyValueStore {
  private readonly client: Redis;

  constructor(config: RedisStoreConfig) {
    this.client = new Redis(config.url, {
      connectTimeout: config.connectTimeoutMs,
      maxRetriesPerRequest: config.maxRetriesPerRequest ?? 1,
      enableOfflineQueue: false,
      lazyConnect: true,
    });

    this.client.on('error', (error: Error) => {
      logger.error('Redis connection error', error);
    });
    this.client.on('ready', () => {
      logger.info('Redis connection ready');
    });
  }

  /**
   * Open the connection. Rejects when the server is unreachable.
   */
  async connect(): Promise<void> {
    await this.client.connect();
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // String operations
  // ─────────────────────────────────────────────────────────────────────────────

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string): Promise<void> {
    await this.client.set(key, value);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Set operations
  // ─────────────────────────────────────────────────────────────────────────────

  async sadd(key: string, ...members: string[]): Promise<number> {
    return this.client.sadd(key, ...members);
  }

  async smembers(key: string): Promise<string[]> {
    return this.client.smembers(key);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Utility
  // ─────────────────────────────────────────────────────────────────────────────

  async ping(): Promise<string> {
    return this.client.ping();
  }

  async disconnect(): Promise<void> {
    await this.client.quit();
  }
}
