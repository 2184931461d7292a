// ═══════════════════════════════════════════════════════════════════════════════
// STORAGE TESTS — Memory Store and Wellness Store
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryStore } from '../storage/memory.js';
import type { KeyValueStore } from '../storage/types.js';
import { WellnessStore } from '../core/memory/store.js';
import { StoreUnavailableError } from '../core/errors.js';
import { createDefaultLiveState } from '../core/persona/types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// MEMORY STORE
// ─────────────────────────────────────────────────────────────────────────────────

describe('MemoryStore', () => {
  let store: MemoryStore;

  beforeEach(() => {
    store = new MemoryStore();
  });

  it('should set, get and delete values', async () => {
    await store.set('key1', 'value1');
    expect(await store.get('key1')).toBe('value1');
    expect(await store.exists('key1')).toBe(true);

    expect(await store.delete('key1')).toBe(true);
    expect(await store.get('key1')).toBeNull();
    expect(await store.delete('key1')).toBe(false);
  });

  it('should read list ranges with negative indices', async () => {
    await store.rpush('list', 'a', 'b', 'c', 'd');

    expect(await store.lrange('list', 0, -1)).toEqual(['a', 'b', 'c', 'd']);
    expect(await store.lrange('list', -2, -1)).toEqual(['c', 'd']);
    expect(await store.lrange('list', -10, -1)).toEqual(['a', 'b', 'c', 'd']);
    expect(await store.lrange('missing', 0, -1)).toEqual([]);
    expect(await store.llen('list')).toBe(4);
  });

  it('should remove matching list items', async () => {
    await store.rpush('list', 'a', 'b', 'a');

    expect(await store.lrem('list', 0, 'a')).toBe(2);
    expect(await store.lrange('list', 0, -1)).toEqual(['b']);
  });

  it('should answer ping', async () => {
    expect(await store.ping()).toBe('PONG');
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// WELLNESS STORE
// ─────────────────────────────────────────────────────────────────────────────────

describe('WellnessStore', () => {
  let kv: MemoryStore;
  let store: WellnessStore;

  beforeEach(() => {
    kv = new MemoryStore();
    store = new WellnessStore(kv);
  });

  it('should return null for a user with no persona or state', async () => {
    expect(await store.getPersona('nobody')).toBeNull();
    expect(await store.getLiveState('nobody')).toBeNull();
    expect(await store.getUserRecord('nobody')).toBeNull();
  });

  it('should overwrite live state in full', async () => {
    const first = createDefaultLiveState(new Date('2024-03-01T09:00:00.000Z'));
    const second = { ...first, chatMessageCount: 3, currentMood: 'happy' as const };

    await store.putLiveState('u1', first);
    await store.putLiveState('u1', second);

    expect(await store.getLiveState('u1')).toEqual(second);
  });

  it('should record when the persona was generated', async () => {
    await store.markPersonaGenerated('u1', new Date('2024-03-01T09:00:00.000Z'));

    expect(await store.getUserRecord('u1')).toEqual({
      personaGenerated: true,
      personaGeneratedAt: '2024-03-01T09:00:00.000Z',
    });
  });

  it('should count personas generated in the last 24 hours', async () => {
    await store.markPersonaGenerated('u1', new Date('2024-03-01T09:00:00.000Z'));
    await store.markPersonaGenerated('u2', new Date('2024-03-01T09:00:00.001Z'));
    await store.markPersonaGenerated('u3', new Date('2024-02-20T09:00:00.000Z'));
    await store.markPersonaGenerated('u3', new Date('2024-03-02T08:00:00.000Z'));

    expect(await store.getPersonaStats(new Date('2024-03-02T09:00:00.000Z'))).toEqual({
      totalPersonas: 3,
      recent24h: 2,
      timestamp: '2024-03-02T09:00:00.000Z',
    });
  });

  it('should report no personas for an empty store', async () => {
    expect(await store.getPersonaStats(new Date('2024-03-02T09:00:00.000Z'))).toEqual({
      totalPersonas: 0,
      recent24h: 0,
      timestamp: '2024-03-02T09:00:00.000Z',
    });
  });

  it('should return the most recent messages oldest first', async () => {
    for (let i = 1; i <= 4; i++) {
      await store.appendMessage('u1', { role: 'user', content: `m${i}`, timestamp: `2024-03-01T09:0${i}:00.000Z` });
    }

    const recent = await store.getRecentMessages('u1', 2);

    expect(recent.map((m) => m.content)).toEqual(['m3', 'm4']);
    expect(await store.getRecentMessages('u1', 0)).toEqual([]);
    expect(await store.countMessages('u1')).toBe(4);
  });

  it('should clear messages and report how many were removed', async () => {
    await store.appendMessage('u1', { role: 'user', content: 'hi' });
    await store.appendMessage('u1', { role: 'assistant', content: 'hello' });

    expect(await store.clearMessages('u1')).toBe(2);
    expect(await store.countMessages('u1')).toBe(0);
  });

  it('should list insights newest first and delete one by id', async () => {
    const older = await store.appendInsight('u1', {
      type: 'stressor',
      content: 'Academic stress detected: exam',
      originalMessage: 'exam',
      timestamp: '2024-03-01T09:00:00.000Z',
      category: 'academic',
    });
    const newer = await store.appendInsight('u1', {
      type: 'crisis',
      content: 'CRISIS',
      originalMessage: 'help',
      timestamp: '2024-03-01T10:00:00.000Z',
      priority: 'urgent',
    });

    expect((await store.getRecentInsights('u1', 5)).map((i) => i.id)).toEqual([newer.id, older.id]);
    expect(await store.getInsightStats('u1')).toEqual({
      total: 2,
      byType: { stressor: 1, breakthrough: 0, support_need: 0, milestone: 0, crisis: 1 },
      lastInsightAt: '2024-03-01T10:00:00.000Z',
    });

    expect(await store.deleteInsight('u1', older.id)).toBe(true);
    expect(await store.deleteInsight('u1', older.id)).toBe(false);
    expect((await store.getRecentInsights('u1', 5)).map((i) => i.id)).toEqual([newer.id]);
  });

  it('should reject a corrupt stored document', async () => {
    await kv.set('state:u1', '{"currentMood": 42}');

    await expect(store.getLiveState('u1')).rejects.toBeInstanceOf(StoreUnavailableError);
  });

  it('should surface backing-store failures as StoreUnavailableError', async () => {
    const broken: KeyValueStore = {
      get: () => Promise.reject(new Error('ECONNREFUSED')),
      set: () => Promise.reject(new Error('ECONNREFUSED')),
      delete: () => Promise.reject(new Error('ECONNREFUSED')),
      exists: () => Promise.reject(new Error('ECONNREFUSED')),
      rpush: () => Promise.reject(new Error('ECONNREFUSED')),
      lrange: () => Promise.reject(new Error('ECONNREFUSED')),
      llen: () => Promise.reject(new Error('ECONNREFUSED')),
      lrem: () => Promise.reject(new Error('ECONNREFUSED')),
      ping: () => Promise.reject(new Error('ECONNREFUSED')),
    };
    const failing = new WellnessStore(broken);

    await expect(failing.getPersona('u1')).rejects.toThrow('Store operation failed: getPersona');
    await expect(failing.appendMessage('u1', { role: 'user', content: 'hi' })).rejects.toBeInstanceOf(
      StoreUnavailableError
    );
  });
});
