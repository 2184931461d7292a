// ═══════════════════════════════════════════════════════════════════════════════
// COMMON SCHEMAS — Shared Identifiers and Query Parameters
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { MOODS } from '../../core/persona/types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// ID SCHEMAS
// ─────────────────────────────────────────────────────────────────────────────────

export const IdSchema = z
  .string()
  .min(1, 'ID is required')
  .max(128, 'ID too long')
  .regex(/^[a-zA-Z0-9_-]+$/, 'Invalid ID format');

export const UserIdSchema = IdSchema;

export const UserIdParamSchema = z.object({
  userId: UserIdSchema,
});

export const InsightParamSchema = z.object({
  userId: UserIdSchema,
  insightId: IdSchema,
});

// ─────────────────────────────────────────────────────────────────────────────────
// FIELDS
// ─────────────────────────────────────────────────────────────────────────────────

export const MoodSchema = z.enum(MOODS);

/**
 * Query-string limit, coerced from text and clamped to a sane range.
 */
export function createLimitSchema(defaultLimit: number, max = 100) {
  return z.coerce
    .number()
    .int('Limit must be an integer')
    .min(1, 'Limit must be at least 1')
    .max(max, `Limit must be ${max} or less`)
    .default(defaultLimit);
}

export type UserIdParam = z.infer<typeof UserIdParamSchema>;
export type InsightParam = z.infer<typeof InsightParamSchema>;
