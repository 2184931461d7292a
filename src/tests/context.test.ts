// ═══════════════════════════════════════════════════════════════════════════════
// CONTEXT COMPOSER TESTS — Assembly Order, Defaults, Truncation
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach } from 'vitest';
import { ContextComposer, formatContextForPrompt } from '../core/context/builder.js';
import { ChatHistoryCache } from '../core/memory/history-cache.js';
import { WellnessStore } from '../core/memory/store.js';
import { RuleBasedPersonaGenerator } from '../core/persona/generator.js';
import { createDefaultLiveState } from '../core/persona/types.js';
import { NoPersonaError } from '../core/errors.js';
import { MemoryStore } from '../storage/memory.js';
import { ALL_A } from './helpers.js';

const NOW = new Date('2024-03-01T09:00:00.000Z');

describe('ContextComposer', () => {
  let store: WellnessStore;
  let cache: ChatHistoryCache;
  let composer: ContextComposer;

  async function createPersona(userId: string): Promise<void> {
    const profile = await new RuleBasedPersonaGenerator(() => NOW).generate(ALL_A);
    await store.savePersona({ userId, profile, liveState: createDefaultLiveState(NOW) });
  }

  beforeEach(() => {
    store = new WellnessStore(new MemoryStore());
    cache = new ChatHistoryCache(store);
    composer = new ContextComposer(store, cache, { historyLimit: 10, insightLimit: 5 }, () => NOW);
  });

  it('should require a persona, then succeed with empty enrichments', async () => {
    await expect(composer.build('u1', 'hello')).rejects.toBeInstanceOf(NoPersonaError);
    await expect(composer.build('u1', 'hello')).rejects.toThrow(
      'No persona found for user u1. Generate a persona first.'
    );

    await createPersona('u1');
    const context = await composer.build('u1', 'hello');

    expect(context.persona.communicationStyle).toBe('emotional');
    expect(context.persona.systemPrompt.length).toBeGreaterThan(0);
    expect(context.recentHistory).toEqual([]);
    expect(context.insights).toEqual([]);
    expect(context.incomingMessage).toBe('hello');
    expect(context.assembledAt).toBe(NOW.toISOString());
  });

  it('should substitute a default live state when none is stored', async () => {
    const profile = await new RuleBasedPersonaGenerator(() => NOW).generate(ALL_A);
    const kv = new MemoryStore();
    await kv.set('persona:u2', JSON.stringify(profile));
    const bare = new WellnessStore(kv);
    const isolated = new ContextComposer(bare, new ChatHistoryCache(bare), {}, () => NOW);

    const context = await isolated.build('u2', 'hello');

    expect(context.liveState).toEqual(createDefaultLiveState(NOW));
  });

  it('should place persona, live state, insights and history in that order', async () => {
    await createPersona('u1');
    await store.appendMessage('u1', { role: 'user', content: 'first message' });
    await store.appendInsight('u1', {
      type: 'milestone',
      content: 'Achievement: I finished my essay',
      originalMessage: 'I finished my essay',
      timestamp: NOW.toISOString(),
    });

    const context = await composer.build('u1', 'hello');
    expect(Object.keys(context).slice(0, 4)).toEqual(['persona', 'liveState', 'insights', 'recentHistory']);

    const prompt = formatContextForPrompt(context);
    const persona = prompt.indexOf('<persona>');
    const liveState = prompt.indexOf('<live_state>');
    const insights = prompt.indexOf('<insights>');
    const history = prompt.indexOf('<recent_history>');

    expect(persona).toBeGreaterThan(-1);
    expect(liveState).toBeGreaterThan(persona);
    expect(insights).toBeGreaterThan(liveState);
    expect(history).toBeGreaterThan(insights);
    expect(prompt).toContain(
      '- [MILESTONE] Achievement: I finished my essay (2024-03-01T09:00:00.000Z)\n  Context: "I finished my essay"'
    );
    expect(prompt).toContain('<recent_history>\nuser: first message\n</recent_history>');
  });

  it('should leave history out of the prompt when asked', async () => {
    await createPersona('u1');
    await store.appendMessage('u1', { role: 'user', content: 'first message' });

    const context = await composer.build('u1', 'hello');

    expect(composer.formatForPrompt(context, { includeHistory: false })).not.toContain('<recent_history>');
  });

  it('should cap history and insights at their limits', async () => {
    await createPersona('u1');
    for (let i = 1; i <= 12; i++) {
      await store.appendMessage('u1', { role: 'user', content: `message ${i}` });
      await store.appendInsight('u1', {
        type: 'milestone',
        content: `Achievement: step ${i}`,
        originalMessage: `step ${i}`,
        timestamp: NOW.toISOString(),
      });
    }

    const context = await composer.build('u1', 'hello');

    expect(context.recentHistory.map((m) => m.content)).toEqual(
      Array.from({ length: 10 }, (_, i) => `message ${i + 3}`)
    );
    expect(context.insights.map((i) => i.content)).toEqual([
      'Achievement: step 12',
      'Achievement: step 11',
      'Achievement: step 10',
      'Achievement: step 9',
      'Achievement: step 8',
    ]);
  });

  it('should return no history for a zero history limit', async () => {
    await createPersona('u1');
    await store.appendMessage('u1', { role: 'user', content: 'first message' });

    const context = await composer.build('u1', 'hello', { historyLimit: 0 });

    expect(context.recentHistory).toEqual([]);
  });
});
