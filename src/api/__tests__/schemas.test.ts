// ═══════════════════════════════════════════════════════════════════════════════
// SCHEMA TESTS — Request Validation
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import {
  GeneratePersonaSchema,
  HistoryQuerySchema,
  InsightParamSchema,
  InsightsQuerySchema,
  MAX_MESSAGE_LENGTH,
  SendMessageSchema,
  UpdateStateSchema,
  UserIdParamSchema,
} from '../schemas/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// IDENTIFIERS
// ─────────────────────────────────────────────────────────────────────────────────

describe('UserIdParamSchema', () => {
  it('should accept word characters and dashes', () => {
    expect(UserIdParamSchema.safeParse({ userId: 'student_42-b' }).success).toBe(true);
  });

  it('should reject empty, spaced and oversized ids', () => {
    expect(UserIdParamSchema.safeParse({ userId: '' }).success).toBe(false);
    expect(UserIdParamSchema.safeParse({ userId: 'a b' }).success).toBe(false);
    expect(UserIdParamSchema.safeParse({ userId: 'x'.repeat(129) }).success).toBe(false);
  });

  it('should require both ids for insight routes', () => {
    expect(InsightParamSchema.safeParse({ userId: 'u1' }).success).toBe(false);
    expect(InsightParamSchema.parse({ userId: 'u1', insightId: 'abc-123' })).toEqual({
      userId: 'u1',
      insightId: 'abc-123',
    });
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// PERSONA
// ─────────────────────────────────────────────────────────────────────────────────

describe('GeneratePersonaSchema', () => {
  it('should trim answers', () => {
    const parsed = GeneratePersonaSchema.parse({ userId: 'u1', quizData: { '1': ' a ' } });

    expect(parsed.quizData).toEqual({ '1': 'a' });
  });

  it('should reject blank answers and missing quiz data', () => {
    expect(GeneratePersonaSchema.safeParse({ userId: 'u1', quizData: { '1': '  ' } }).success).toBe(false);
    expect(GeneratePersonaSchema.safeParse({ userId: 'u1' }).success).toBe(false);
  });
});

describe('UpdateStateSchema', () => {
  it('should accept each known action type', () => {
    const actions = [
      { type: 'chat_message', mood: 'sad' },
      { type: 'breathing_exercise', technique: 'Box Breathing', completed: true },
      { type: 'grounding_technique', currentStressLevel: 'High' },
      { type: 'mindfulness_meditation', completionRate: 80 },
      { type: 'body_relaxation', hasVeryTenseTensionAreas: true },
      { type: 'tool_use', toolName: 'journal' },
      { type: 'sleep_log', hours: 7.5, quality: 'good' },
    ];

    for (const action of actions) {
      expect(UpdateStateSchema.safeParse({ userId: 'u1', action }).success).toBe(true);
    }
  });

  it('should reject unknown action types and out-of-range values', () => {
    expect(UpdateStateSchema.safeParse({ userId: 'u1', action: { type: 'dance' } }).success).toBe(false);
    expect(UpdateStateSchema.safeParse({ userId: 'u1', action: { type: 'sleep_log', hours: 25 } }).success).toBe(false);
    expect(
      UpdateStateSchema.safeParse({ userId: 'u1', action: { type: 'chat_message', mood: 'ecstatic' } }).success
    ).toBe(false);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// CHAT
// ─────────────────────────────────────────────────────────────────────────────────

describe('SendMessageSchema', () => {
  it('should trim the message and default includeHistory', () => {
    expect(SendMessageSchema.parse({ userId: 'u1', message: '  hi  ' })).toEqual({
      userId: 'u1',
      message: 'hi',
      includeHistory: true,
    });
  });

  it('should reject blank and oversized messages', () => {
    expect(SendMessageSchema.safeParse({ userId: 'u1', message: '   ' }).success).toBe(false);
    expect(
      SendMessageSchema.safeParse({ userId: 'u1', message: 'x'.repeat(MAX_MESSAGE_LENGTH + 1) }).success
    ).toBe(false);
  });

  it('should accept a known mood only', () => {
    expect(SendMessageSchema.parse({ userId: 'u1', message: 'hi', mood: 'tired' }).mood).toBe('tired');
    expect(SendMessageSchema.safeParse({ userId: 'u1', message: 'hi', mood: 'grumpy' }).success).toBe(false);
  });
});

describe('limit queries', () => {
  it('should default and coerce limits', () => {
    expect(HistoryQuerySchema.parse({})).toEqual({ limit: 50 });
    expect(InsightsQuerySchema.parse({})).toEqual({ limit: 20 });
    expect(HistoryQuerySchema.parse({ limit: '15' })).toEqual({ limit: 15 });
  });

  it('should reject limits outside 1..100', () => {
    expect(HistoryQuerySchema.safeParse({ limit: '0' }).success).toBe(false);
    expect(HistoryQuerySchema.safeParse({ limit: '101' }).success).toBe(false);
    expect(HistoryQuerySchema.safeParse({ limit: 'many' }).success).toBe(false);
  });
});
