// ═══════════════════════════════════════════════════════════════════════════════
// PLAYER STORE — Durable PlayerRecord Persistence
// ═══════════════════════════════════════════════════════════════════════════════
//
// Key layout (under the configured prefix):
//   player:<userId>   serialized PlayerRecord (one SET per write)
//   players           set of every userId with a record
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { KeyValueStore } from '../../storage/index.js';
import type { AsyncResult } from '../../types/result.js';
import { ok, err, okVoid } from '../../types/result.js';
import { createUserId, isValidUserId, type UserId } from '../../types/branded.js';
import { getLogger } from '../../observability/logging/index.js';
import { storageFailure, type ProgressionError } from './errors.js';
import { deserializePlayerRecord, serializePlayerRecord } from './serialization.js';
import type { PlayerRecord } from './types.js';

const logger = getLogger({ component: 'player-store' });

export interface PlayerStoreConfig {
  readonly keyPrefix: string;
}

export const DEFAULT_PLAYER_STORE_CONFIG: PlayerStoreConfig = {
  keyPrefix: 'jobhunt:',
};

function describeCause(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class PlayerStore {
  private readonly store: KeyValueStore;
  private readonly config: PlayerStoreConfig;

  constructor(store: KeyValueStore, config?: Partial<PlayerStoreConfig>) {
    this.store = store;
    this.config = { ...DEFAULT_PLAYER_STORE_CONFIG, ...config };
  }

  recordKey(userId: UserId): string {
    return `${this.config.keyPrefix}player:${userId}`;
  }

  indexKey(): string {
    return `${this.config.keyPrefix}players`;
  }

  /**
   * Load a record; Ok(null) when the user has never been stored.
   */
  async get(userId: UserId): AsyncResult<PlayerRecord | null, ProgressionError> {
    let raw: string | null;
    try {
      raw = await this.store.get(this.recordKey(userId));
    } catch (error) {
      logger.error('Failed to read player record', error, { userId });
      return err(storageFailure(`Failed to read player ${userId}: ${describeCause(error)}`, error));
    }

    if (raw === null) {
      return ok(null);
    }

    const decoded = deserializePlayerRecord(raw);
    if (!decoded.ok) {
      logger.error('Undecodable player record', decoded.error, { userId });
      return decoded;
    }
    if (decoded.value.userId !== userId) {
      return err(storageFailure(`Record under ${this.recordKey(userId)} belongs to ${decoded.value.userId}`));
    }
    return ok(decoded.value);
  }

  /**
   * Overwrite a record with a single SET.
   */
  async put(userId: UserId, record: PlayerRecord): AsyncResult<void, ProgressionError> {
    try {
      await this.store.set(this.recordKey(userId), serializePlayerRecord(record));
      return okVoid();
    } catch (error) {
      logger.error('Failed to write player record', error, { userId });
      return err(storageFailure(`Failed to write player ${userId}: ${describeCause(error)}`, error));
    }
  }

  /**
   * Store a new record and add it to the player index. The index is written
   * first, so a failure in between leaves an indexed user with no record,
   * which reads as a first contact.
   */
  async create(userId: UserId, record: PlayerRecord): AsyncResult<void, ProgressionError> {
    try {
      await this.store.sadd(this.indexKey(), userId);
    } catch (error) {
      logger.error('Failed to index player', error, { userId });
      return err(storageFailure(`Failed to index player ${userId}: ${describeCause(error)}`, error));
    }
    return this.put(userId, record);
  }

  async listUserIds(): AsyncResult<UserId[], ProgressionError> {
    let members: string[];
    try {
      members = await this.store.smembers(this.indexKey());
    } catch (error) {
      logger.error('Failed to list players', error);
      return err(storageFailure(`Failed to list players: ${describeCause(error)}`, error));
    }

    const valid = members.filter(isValidUserId);
    if (valid.length !== members.length) {
      logger.warn('Ignoring malformed ids in player index', { ignored: members.length - valid.length });
    }
    return ok(valid.map(id => createUserId(id)).sort());
  }
}

export function createPlayerStore(store: KeyValueStore, config?: Partial<PlayerStoreConfig>): PlayerStore {
  return new PlayerStore(store, config);
}
