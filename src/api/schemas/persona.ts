// ═══════════════════════════════════════════════════════════════════════════════
// PERSONA SCHEMAS — Quiz Submission and Live-State Actions
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { MoodSchema, UserIdSchema } from './common.js';

// ─────────────────────────────────────────────────────────────────────────────────
// GENERATE PERSONA
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * @example
 * POST /api/persona/generate
 * {
 *   "userId": "student_42",
 *   "quizData": { "1": "a", "2": "c", ... "10": "b" }
 * }
 *
 * Answer letters and question keys are checked against the quiz definition
 * after this schema passes.
 */
export const GeneratePersonaSchema = z.object({
  userId: UserIdSchema,
  quizData: z.record(z.string(), z.string().trim().min(1, 'Answer is required')),
});

// ─────────────────────────────────────────────────────────────────────────────────
// LIVE-STATE ACTIONS
// ─────────────────────────────────────────────────────────────────────────────────

const ShortText = z.string().trim().max(200);

export const LiveStateActionSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('chat_message'),
    content: z.string().max(4000).optional(),
    mood: MoodSchema.optional(),
    stressorDetected: ShortText.optional(),
    crisisDetected: z.boolean().optional(),
  }),
  z.object({
    type: z.literal('breathing_exercise'),
    technique: ShortText.optional(),
    afterMood: ShortText.optional(),
    moodImprovement: ShortText.optional(),
    sessionQuality: ShortText.optional(),
    completed: z.boolean().optional(),
    pausedTimes: z.number().int().min(0).optional(),
  }),
  z.object({
    type: z.literal('grounding_technique'),
    techniqueUsed: ShortText.optional(),
    afterMood: ShortText.optional(),
    moodImprovement: ShortText.optional(),
    currentStressLevel: ShortText.optional(),
    environmentType: ShortText.optional(),
  }),
  z.object({
    type: z.literal('mindfulness_meditation'),
    techniqueUsed: ShortText.optional(),
    moodAfter: ShortText.optional(),
    moodImprovement: ShortText.optional(),
    sessionQuality: ShortText.optional(),
    completed: z.boolean().optional(),
    pauseCount: z.number().int().min(0).optional(),
    completionRate: z.number().min(0).max(100).optional(),
  }),
  z.object({
    type: z.literal('body_relaxation'),
    toolUsed: ShortText.optional(),
    moodAfter: ShortText.optional(),
    moodImprovement: ShortText.optional(),
    sessionQuality: ShortText.optional(),
    hasVeryTenseTensionAreas: z.boolean().optional(),
  }),
  z.object({
    type: z.literal('tool_use'),
    toolName: ShortText.optional(),
  }),
  z.object({
    type: z.literal('sleep_log'),
    hours: z.number().min(0).max(24).optional(),
    quality: ShortText.optional(),
  }),
]);

/**
 * @example
 * POST /api/persona/update-state
 * {
 *   "userId": "student_42",
 *   "action": { "type": "breathing_exercise", "technique": "Box Breathing", "moodImprovement": "Improved" }
 * }
 */
export const UpdateStateSchema = z.object({
  userId: UserIdSchema,
  action: LiveStateActionSchema,
});

export type GeneratePersonaRequest = z.infer<typeof GeneratePersonaSchema>;
export type UpdateStateRequest = z.infer<typeof UpdateStateSchema>;
