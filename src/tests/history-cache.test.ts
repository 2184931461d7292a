// ═══════════════════════════════════════════════════════════════════════════════
// HISTORY CACHE TESTS — TTL, Invalidation Scope, In-Flight Fetches
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach } from 'vitest';
import { ChatHistoryCache, type HistorySource } from '../core/memory/history-cache.js';
import { WellnessStore } from '../core/memory/store.js';
import type { ChatMessage } from '../core/memory/types.js';
import { MemoryStore } from '../storage/memory.js';

// ─────────────────────────────────────────────────────────────────────────────────
// FAKES
// ─────────────────────────────────────────────────────────────────────────────────

function message(id: string, content: string): ChatMessage {
  return { id, role: 'user', content, timestamp: '2024-03-01T09:00:00.000Z' };
}

class CountingSource implements HistorySource {
  calls = 0;
  readonly messages = new Map<string, ChatMessage[]>();

  async getRecentMessages(userId: string, limit: number): Promise<ChatMessage[]> {
    this.calls++;
    const all = this.messages.get(userId) ?? [];
    return all.slice(-limit);
  }
}

interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(error: unknown): void;
}

function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

class ControlledSource implements HistorySource {
  readonly pending: Deferred<ChatMessage[]>[] = [];

  getRecentMessages(): Promise<ChatMessage[]> {
    const next = deferred<ChatMessage[]>();
    this.pending.push(next);
    return next.promise;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// TTL & HITS
// ─────────────────────────────────────────────────────────────────────────────────

describe('ChatHistoryCache', () => {
  let source: CountingSource;
  let now: number;
  let cache: ChatHistoryCache;

  beforeEach(() => {
    source = new CountingSource();
    source.messages.set('alice', [message('m1', 'hi'), message('m2', 'how are you')]);
    source.messages.set('bob', [message('m3', 'hey')]);
    now = 1_000_000;
    cache = new ChatHistoryCache(source, { ttlMs: 60_000, clock: () => now });
  });

  it('should fetch once and serve later reads from cache', async () => {
    const first = await cache.get('alice', 10);
    const second = await cache.get('alice', 10);

    expect(first.map((m) => m.id)).toEqual(['m1', 'm2']);
    expect(second).toEqual(first);
    expect(source.calls).toBe(1);
    expect(cache.stats()).toMatchObject({ hits: 1, misses: 1, totalEntries: 1 });
  });

  it('should refetch once the TTL has elapsed', async () => {
    await cache.get('alice', 10);

    now += 59_999;
    await cache.get('alice', 10);
    expect(source.calls).toBe(1);

    now += 2;
    await cache.get('alice', 10);
    expect(source.calls).toBe(2);
  });

  it('should key entries by limit', async () => {
    await cache.get('alice', 10);
    const one = await cache.get('alice', 1);

    expect(one.map((m) => m.id)).toEqual(['m2']);
    expect(source.calls).toBe(2);
    expect(cache.stats().totalEntries).toBe(2);
  });

  it('should not let callers mutate the cached window', async () => {
    const first = await cache.get('alice', 10);
    first.pop();

    const second = await cache.get('alice', 10);
    expect(second).toHaveLength(2);
  });

  // ───────────────────────────────────────────────────────────────────────────────
  // INVALIDATION
  // ───────────────────────────────────────────────────────────────────────────────

  it('should drop every limit for the invalidated user only', async () => {
    await cache.get('alice', 10);
    await cache.get('alice', 5);
    await cache.get('bob', 10);
    expect(source.calls).toBe(3);

    cache.invalidate('alice');

    expect(cache.stats()).toMatchObject({ cachedUsers: 1, totalEntries: 1, userIds: ['bob'] });

    await cache.get('bob', 10);
    expect(source.calls).toBe(3);

    await cache.get('alice', 10);
    expect(source.calls).toBe(4);
  });

  it('should reset counters and entries on clear', async () => {
    await cache.get('alice', 10);
    await cache.get('alice', 10);

    cache.clear();

    expect(cache.stats()).toEqual({
      hits: 0,
      misses: 0,
      cachedUsers: 0,
      totalEntries: 0,
      ttlMs: 60_000,
      userIds: [],
    });
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// IN-FLIGHT FETCHES
// ─────────────────────────────────────────────────────────────────────────────────

describe('ChatHistoryCache in-flight fetches', () => {
  it('should share one fetch between concurrent misses', async () => {
    const source = new ControlledSource();
    const cache = new ChatHistoryCache(source);

    const a = cache.get('alice', 10);
    const b = cache.get('alice', 10);
    expect(source.pending).toHaveLength(1);

    source.pending[0]?.resolve([message('m1', 'hi')]);

    expect((await a).map((m) => m.id)).toEqual(['m1']);
    expect((await b).map((m) => m.id)).toEqual(['m1']);
    expect(cache.stats().misses).toBe(2);
  });

  it('should not cache a fetch that started before an invalidation', async () => {
    const source = new ControlledSource();
    const cache = new ChatHistoryCache(source);

    const stale = cache.get('alice', 10);
    cache.invalidate('alice');
    source.pending[0]?.resolve([message('m1', 'old')]);

    expect((await stale).map((m) => m.id)).toEqual(['m1']);
    expect(cache.stats().totalEntries).toBe(0);

    const fresh = cache.get('alice', 10);
    expect(source.pending).toHaveLength(2);
    source.pending[1]?.resolve([message('m1', 'old'), message('m2', 'new')]);

    expect((await fresh).map((m) => m.id)).toEqual(['m1', 'm2']);
    expect(cache.stats().totalEntries).toBe(1);
  });

  it('should start a new fetch after invalidation instead of joining the stale one', async () => {
    const source = new ControlledSource();
    const cache = new ChatHistoryCache(source);

    const stale = cache.get('alice', 10);
    cache.invalidate('alice');
    const fresh = cache.get('alice', 10);

    expect(source.pending).toHaveLength(2);

    source.pending[1]?.resolve([message('m2', 'new')]);
    source.pending[0]?.resolve([message('m1', 'old')]);

    expect((await fresh).map((m) => m.id)).toEqual(['m2']);
    expect((await stale).map((m) => m.id)).toEqual(['m1']);

    const cached = await cache.get('alice', 10);
    expect(cached.map((m) => m.id)).toEqual(['m2']);
    expect(source.pending).toHaveLength(2);
  });

  it('should write nothing when the fetch fails', async () => {
    const source = new ControlledSource();
    const cache = new ChatHistoryCache(source);

    const failing = cache.get('alice', 10);
    source.pending[0]?.reject(new Error('store down'));

    await expect(failing).rejects.toThrow('store down');
    expect(cache.stats().totalEntries).toBe(0);

    const retry = cache.get('alice', 10);
    expect(source.pending).toHaveLength(2);
    source.pending[1]?.resolve([]);
    await expect(retry).resolves.toEqual([]);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// WRITE-THEN-INVALIDATE
// ─────────────────────────────────────────────────────────────────────────────────

describe('ChatHistoryCache over WellnessStore', () => {
  it('should include a message appended before the next read', async () => {
    const store = new WellnessStore(new MemoryStore());
    const cache = new ChatHistoryCache(store);

    expect(await cache.get('alice', 10)).toEqual([]);

    const appended = await store.appendMessage('alice', { role: 'user', content: 'I aced my quiz' });
    cache.invalidate('alice');

    const history = await cache.get('alice', 10);
    expect(history.map((m) => m.id)).toEqual([appended.id]);
  });
});
