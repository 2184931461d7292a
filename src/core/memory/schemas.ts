// ═══════════════════════════════════════════════════════════════════════════════
// DOCUMENT SCHEMAS — Validation of Stored JSON
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

import {
  COMMUNICATION_STYLES,
  PRIMARY_STRESSORS,
  SOCIAL_PROFILES,
  COPING_MECHANISMS,
  STRESS_LEVELS,
  MOODS,
  type LiveUserState,
  type PersonalityProfile,
  type QuizResponses,
} from '../persona/types.js';
import {
  INSIGHT_TYPES,
  STRESSOR_CATEGORIES,
  type ChatMessage,
  type Insight,
} from './types.js';

export const PersonalityProfileSchema: z.ZodType<PersonalityProfile> = z.object({
  communicationStyle: z.enum(COMMUNICATION_STYLES),
  primaryStressor: z.enum(PRIMARY_STRESSORS),
  socialProfile: z.enum(SOCIAL_PROFILES),
  copingMechanism: z.enum(COPING_MECHANISMS),
  stressLevel: z.enum(STRESS_LEVELS),
  strengths: z.array(z.string()),
  vulnerabilities: z.array(z.string()),
  recommendedApproach: z.string(),
  chatbotTone: z.string(),
  chatbotMethodology: z.string(),
  proactiveTriggers: z.array(z.string()),
  systemPrompt: z.string(),
  generatedAt: z.string(),
  quizVersion: z.string(),
});

export const LiveUserStateSchema: z.ZodType<LiveUserState> = z.object({
  currentMood: z.enum(MOODS),
  lastInteraction: z.enum([
    'onboarding',
    'chat',
    'tool_use',
    'sleep_log',
    'breathing_exercise',
    'grounding_technique',
    'mindfulness_meditation',
    'body_relaxation',
  ]),
  lastInteractionAt: z.string(),
  chatMessageCount: z.number().int().nonnegative(),
  toolUsageCount: z.number().int().nonnegative(),
  sleepLogCount: z.number().int().nonnegative(),
  recentStressors: z.array(z.string()),
  copingSuccesses: z.array(z.string()),
  needsCheckIn: z.boolean(),
  consecutiveNegativeMoods: z.number().int().nonnegative(),
  updatedAt: z.string(),
});

export const ChatMessageSchema: z.ZodType<ChatMessage> = z.object({
  id: z.string(),
  role: z.enum(['user', 'assistant']),
  content: z.string(),
  timestamp: z.string(),
  metadata: z
    .object({
      mood: z.enum(MOODS).optional(),
      model: z.string().optional(),
      recommendedTools: z.record(z.string(), z.number()).optional(),
    })
    .optional(),
});

export const InsightSchema: z.ZodType<Insight> = z.object({
  id: z.string(),
  type: z.enum(INSIGHT_TYPES),
  content: z.string(),
  originalMessage: z.string(),
  timestamp: z.string(),
  category: z.enum(STRESSOR_CATEGORIES).optional(),
  priority: z.literal('urgent').optional(),
});

export const QuizResponsesSchema: z.ZodType<QuizResponses> = z.record(
  z.string(),
  z.enum(['a', 'b', 'c', 'd'])
);

export const UserRecordSchema = z.object({
  personaGenerated: z.boolean(),
  personaGeneratedAt: z.string().optional(),
});

export type UserRecord = z.infer<typeof UserRecordSchema>;
