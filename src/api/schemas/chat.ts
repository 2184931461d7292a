// ═══════════════════════════════════════════════════════════════════════════════
// CHAT SCHEMAS — Messages, History and Insight Queries
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { MoodSchema, UserIdSchema, createLimitSchema } from './common.js';

export const MAX_MESSAGE_LENGTH = 4000;

/**
 * @example
 * POST /api/chat
 * {
 *   "userId": "student_42",
 *   "message": "Exams are next week and I can't focus",
 *   "mood": "anxious"
 * }
 */
export const SendMessageSchema = z.object({
  userId: UserIdSchema,
  message: z
    .string()
    .trim()
    .min(1, 'Message is required')
    .max(MAX_MESSAGE_LENGTH, `Message must be ${MAX_MESSAGE_LENGTH} characters or less`),
  mood: MoodSchema.optional(),
  includeHistory: z.boolean().optional().default(true),
});

export const HistoryQuerySchema = z.object({
  limit: createLimitSchema(50),
});

export const InsightsQuerySchema = z.object({
  limit: createLimitSchema(20),
});

export type SendMessageRequest = z.infer<typeof SendMessageSchema>;
export type HistoryQuery = z.infer<typeof HistoryQuerySchema>;
export type InsightsQuery = z.infer<typeof InsightsQuerySchema>;
