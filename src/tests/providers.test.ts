// ═══════════════════════════════════════════════════════════════════════════════
// PROVIDER TESTS — Reply Generators and Tool Recommendations
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeAll } from 'vitest';
import { MockReplyGenerator } from '../providers/mock.js';
import { OpenAIReplyGenerator } from '../providers/openai.js';
import { stripCodeFence, type ChatCompletionClient, type ChatCompletionRequest } from '../providers/openai-client.js';
import { createReplyGenerator } from '../providers/index.js';
import { RuleBasedPersonaGenerator } from '../core/persona/generator.js';
import { createDefaultLiveState } from '../core/persona/types.js';
import type { ConversationContext } from '../core/context/builder.js';
import { GenerationFailureError } from '../core/errors.js';
import { recommendTools } from '../services/tool-recommender.js';
import { loadConfig } from '../config/index.js';
import { ALL_A } from './helpers.js';

const NOW = new Date('2024-03-01T09:00:00.000Z');

let baseContext: ConversationContext;

beforeAll(async () => {
  baseContext = {
    persona: await new RuleBasedPersonaGenerator(() => NOW).generate(ALL_A),
    liveState: createDefaultLiveState(NOW),
    insights: [],
    recentHistory: [],
    incomingMessage: 'hello',
    assembledAt: NOW.toISOString(),
  };
});

// ─────────────────────────────────────────────────────────────────────────────────
// MOCK
// ─────────────────────────────────────────────────────────────────────────────────

describe('MockReplyGenerator', () => {
  const generator = new MockReplyGenerator();

  it('should echo the message', async () => {
    const reply = await generator.generateReply(baseContext, '  hello  ');

    expect(reply).toBe('I hear you. You said: "hello". What would help most right now?');
  });

  it('should mention mood and the newest insight', async () => {
    const context: ConversationContext = {
      ...baseContext,
      liveState: { ...baseContext.liveState, currentMood: 'sad' },
      insights: [{
        id: 'i1',
        type: 'milestone',
        content: 'Achievement: I finished my essay',
        originalMessage: 'I finished my essay',
        timestamp: NOW.toISOString(),
      }],
    };

    const reply = await generator.generateReply(context, 'hey');

    expect(reply).toBe(
      'I hear you. You said: "hey". It sounds like you\'ve been feeling sad lately.' +
      ' I remember: Achievement: I finished my essay. What would help most right now?'
    );
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// OPENAI
// ─────────────────────────────────────────────────────────────────────────────────

function recordingClient(content: string | null): ChatCompletionClient & { requests: ChatCompletionRequest[] } {
  const requests: ChatCompletionRequest[] = [];
  return {
    requests,
    chat: {
      completions: {
        create: async (body: ChatCompletionRequest) => {
          requests.push(body);
          return { choices: [{ message: { content } }] };
        },
      },
    },
  };
}

describe('OpenAIReplyGenerator', () => {
  const options = { model: 'test-model', temperature: 0.7, maxTokens: 200 };

  it('should send the composed context as system prompt and history as turns', async () => {
    const client = recordingClient('  That sounds hard.  ');
    const generator = new OpenAIReplyGenerator(client, options);
    const context: ConversationContext = {
      ...baseContext,
      recentHistory: [
        { id: 'm1', role: 'user', content: 'rough day', timestamp: NOW.toISOString() },
        { id: 'm2', role: 'assistant', content: 'I am here.', timestamp: NOW.toISOString() },
      ],
    };

    const reply = await generator.generateReply(context, 'still rough');

    expect(reply).toBe('That sounds hard.');
    expect(generator.model).toBe('test-model');

    const request = client.requests[0];
    expect(request?.max_tokens).toBe(200);
    expect(request?.messages.slice(1)).toEqual([
      { role: 'user', content: 'rough day' },
      { role: 'assistant', content: 'I am here.' },
      { role: 'user', content: 'still rough' },
    ]);

    const system = request?.messages[0];
    expect(system?.role).toBe('system');
    expect(typeof system?.content === 'string' && system.content.includes('<wellness_context>')).toBe(true);
    expect(typeof system?.content === 'string' && system.content.includes('<recent_history>')).toBe(false);
  });

  it('should fail on an empty reply', async () => {
    const generator = new OpenAIReplyGenerator(recordingClient('   '), options);

    await expect(generator.generateReply(baseContext, 'hi')).rejects.toBeInstanceOf(GenerationFailureError);
  });

  it('should fail when the request errors', async () => {
    const client: ChatCompletionClient = {
      chat: { completions: { create: () => Promise.reject(new Error('rate limited')) } },
    };

    await expect(new OpenAIReplyGenerator(client, options).generateReply(baseContext, 'hi'))
      .rejects.toThrow('Generation failed: reply model request failed');
  });
});

describe('createReplyGenerator', () => {
  it('should refuse to reply without an API key', async () => {
    const model = { ...loadConfig().model, apiKey: undefined, useMockProvider: false };
    const generator = createReplyGenerator(model);

    expect(generator.name).toBe('unconfigured');
    await expect(generator.generateReply(baseContext, 'hi')).rejects.toThrow(
      'Generation failed: reply model not configured'
    );
  });

  it('should use the mock generator only when asked for', () => {
    const model = { ...loadConfig().model, apiKey: undefined, useMockProvider: true };

    expect(createReplyGenerator(model).name).toBe('mock');
  });
});

describe('stripCodeFence', () => {
  it('should unwrap fenced JSON', () => {
    expect(stripCodeFence('```json\n{"a":1}\n```')).toBe('{"a":1}');
    expect(stripCodeFence('  {"a":1} ')).toBe('{"a":1}');
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// TOOL RECOMMENDATIONS
// ─────────────────────────────────────────────────────────────────────────────────

describe('recommendTools', () => {
  it('should rank tools by keyword hits plus mood fit', () => {
    expect(recommendTools('I feel anxious about my exam', 'anxious')).toEqual({
      breathing_exercise: 1,
      grounding_technique: 0.5,
      pomodoro_timer: 0.5,
    });
  });

  it('should return nothing when no tool fits', () => {
    expect(recommendTools('hello there', 'neutral')).toEqual({});
  });

  it('should return at most three tools', () => {
    const tools = recommendTools('Tired, tense and overwhelmed before the exam, feeling anxious', 'stressed');

    expect(Object.keys(tools)).toHaveLength(3);
  });
});
