// ═══════════════════════════════════════════════════════════════════════════════
// STORAGE — Store Selection
// ═══════════════════════════════════════════════════════════════════════════════

import type { KeyValueStore } from './types.js';
import { MemoryStore } from './memory.js';
import { RedisStore } from './redis.js';
import { loadConfig } from '../config/index.js';
import { getLogger } from '../logging/index.js';

export type { KeyValueStore } from './types.js';
export { MemoryStore } from './memory.js';
export { RedisStore } from './redis.js';

const logger = getLogger({ component: 'storage' });

// ─────────────────────────────────────────────────────────────────────────────────
// STORE MANAGER
// ─────────────────────────────────────────────────────────────────────────────────

class StoreManager {
  private store: KeyValueStore | null = null;
  private redis: RedisStore | null = null;

  /**
   * Connects to Redis when REDIS_URL is set. Falls back to the in-memory
   * store if the connection cannot be established.
   */
  async initialize(): Promise<void> {
    const { storage } = loadConfig();

    if (!storage.redisUrl) {
      logger.info('REDIS_URL not set, using in-memory store');
      this.store = new MemoryStore();
      return;
    }

    const redis = new RedisStore(storage.redisUrl, storage);
    try {
      await redis.connect();
      this.redis = redis;
      this.store = redis;
    } catch (error) {
      logger.error('Redis unavailable, falling back to in-memory store', error);
      this.store = new MemoryStore();
    }
  }

  getStore(): KeyValueStore {
    if (!this.store) {
      this.store = new MemoryStore();
    }
    return this.store;
  }

  isUsingRedis(): boolean {
    return this.redis !== null;
  }

  async shutdown(): Promise<void> {
    if (this.redis) {
      await this.redis.disconnect();
      this.redis = null;
    }
    this.store = null;
  }
}

export const storeManager = new StoreManager();

export function getStore(): KeyValueStore {
  return storeManager.getStore();
}
