// ═══════════════════════════════════════════════════════════════════════════════
// MEMORY STORE — In-Process KeyValueStore for Tests and Local Development
// ═══════════════════════════════════════════════════════════════════════════════

import type { KeyValueStore } from './types.js';

export class MemoryStore implements KeyValueStore {
  private data: Map<string, { value: string; expiresAt?: number }> = new Map();
  private lists: Map<string, string[]> = new Map();

  // ═══════════════════════════════════════════════════════════════════════════════
  // STRING OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════════════

  async get(key: string): Promise<string | null> {
    const entry = this.data.get(key);
    if (!entry) return null;

    if (entry.expiresAt && Date.now() > entry.expiresAt) {
      this.data.delete(key);
      return null;
    }

    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    const expiresAt = ttlSeconds ? Date.now() + ttlSeconds * 1000 : undefined;
    this.data.set(key, { value, expiresAt });
  }

  async delete(key: string): Promise<boolean> {
    const existed = this.data.has(key) || this.lists.has(key);
    this.data.delete(key);
    this.lists.delete(key);
    return existed;
  }

  async exists(key: string): Promise<boolean> {
    const entry = this.data.get(key);
    if (!entry) return this.lists.has(key);

    if (entry.expiresAt && Date.now() > entry.expiresAt) {
      this.data.delete(key);
      return false;
    }

    return true;
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // LIST OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════════════

  async rpush(key: string, ...values: string[]): Promise<number> {
    let list = this.lists.get(key);
    if (!list) {
      list = [];
      this.lists.set(key, list);
    }
    list.push(...values);
    return list.length;
  }

  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    const list = this.lists.get(key);
    if (!list) return [];

    // Negative indices count from the tail, as in Redis
    const len = list.length;
    const startIdx = start < 0 ? Math.max(0, len + start) : start;
    const stopIdx = stop < 0 ? len + stop : Math.min(stop, len - 1);

    if (startIdx > stopIdx || startIdx >= len) return [];

    return list.slice(startIdx, stopIdx + 1);
  }

  async llen(key: string): Promise<number> {
    return this.lists.get(key)?.length ?? 0;
  }

  async lrem(key: string, count: number, value: string): Promise<number> {
    const list = this.lists.get(key);
    if (!list) return 0;

    let removed = 0;
    const newList: string[] = [];

    for (const item of list) {
      if (item === value && (count === 0 || removed < Math.abs(count))) {
        removed++;
      } else {
        newList.push(item);
      }
    }

    if (newList.length === 0) {
      this.lists.delete(key);
    } else {
      this.lists.set(key, newList);
    }
    return removed;
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // UTILITY
  // ═══════════════════════════════════════════════════════════════════════════════

  async ping(): Promise<string> {
    return 'PONG';
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // TEST HELPERS
  // ═══════════════════════════════════════════════════════════════════════════════

  clear(): void {
    this.data.clear();
    this.lists.clear();
  }

  size(): number {
    return this.data.size + this.lists.size;
  }
}
