// ═══════════════════════════════════════════════════════════════════════════════
// REDIS STORE — ioredis-backed KeyValueStore
// ═══════════════════════════════════════════════════════════════════════════════
//
// Every command is bounded by `commandTimeout`, so an unreachable Redis
// surfaces as a rejected promise instead of a hung request.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Redis } from 'ioredis';

import type { KeyValueStore } from './types.js';
import type { StorageConfig } from '../config/index.js';
import { getLogger } from '../logging/index.js';

const logger = getLogger({ component: 'redis-store' });

export class RedisStore implements KeyValueStore {
  private readonly client: Redis;

  constructor(url: string, config: Pick<StorageConfig, 'keyPrefix' | 'commandTimeoutMs' | 'connectTimeoutMs'>) {
    this.client = new Redis(url, {
      keyPrefix: config.keyPrefix,
      commandTimeout: config.commandTimeoutMs,
      connectTimeout: config.connectTimeoutMs,
      maxRetriesPerRequest: 1,
      lazyConnect: true,
      retryStrategy(times) {
        return Math.min(times * 200, 2000);
      },
    });

    this.client.on('error', (error: Error) => {
      logger.warn('Redis connection error', { error: error.message });
    });

    this.client.on('ready', () => {
      logger.info('Connected to Redis');
    });
  }

  async connect(): Promise<void> {
    await this.client.connect();
  }

  async disconnect(): Promise<void> {
    await this.client.quit();
  }

  // ─────────────────────────────────────────────────────────────────────────────────
  // STRING OPERATIONS
  // ─────────────────────────────────────────────────────────────────────────────────

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    if (ttlSeconds) {
      await this.client.set(key, value, 'EX', ttlSeconds);
    } else {
      await this.client.set(key, value);
    }
  }

  async delete(key: string): Promise<boolean> {
    const removed = await this.client.del(key);
    return removed > 0;
  }

  async exists(key: string): Promise<boolean> {
    const count = await this.client.exists(key);
    return count > 0;
  }

  // ─────────────────────────────────────────────────────────────────────────────────
  // LIST OPERATIONS
  // ─────────────────────────────────────────────────────────────────────────────────

  async rpush(key: string, ...values: string[]): Promise<number> {
    return this.client.rpush(key, ...values);
  }

  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    return this.client.lrange(key, start, stop);
  }

  async llen(key: string): Promise<number> {
    return this.client.llen(key);
  }

  async lrem(key: string, count: number, value: string): Promise<number> {
    return this.client.lrem(key, count, value);
  }

  async ping(): Promise<string> {
    return this.client.ping();
  }
}
