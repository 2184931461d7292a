// ═══════════════════════════════════════════════════════════════════════════════
// MEMORY TYPES — Chat Messages, Insights, Cache Entries
// ═══════════════════════════════════════════════════════════════════════════════
//
// Two tiers of conversational memory:
// - Recent history: the last N chat messages, served through the history cache
// - Insights: short typed summaries of significant moments, kept long-term
//
// Both are append-only. Messages can only be cleared in bulk; insights can be
// deleted one at a time.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { Mood } from '../persona/types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// CHAT MESSAGES
// ─────────────────────────────────────────────────────────────────────────────────

export type ChatRole = 'user' | 'assistant';

export interface ChatMessageMetadata {
  mood?: Mood;
  model?: string;
  recommendedTools?: Record<string, number>;
}

export interface ChatMessage {
  id: string;
  role: ChatRole;
  content: string;
  timestamp: string;
  metadata?: ChatMessageMetadata;
}

// ─────────────────────────────────────────────────────────────────────────────────
// INSIGHTS
// ─────────────────────────────────────────────────────────────────────────────────

export const INSIGHT_TYPES = ['stressor', 'breakthrough', 'support_need', 'milestone', 'crisis'] as const;
export type InsightType = typeof INSIGHT_TYPES[number];

export const STRESSOR_CATEGORIES = ['academic', 'social', 'authority', 'health', 'sleep', 'financial'] as const;
export type StressorCategory = typeof STRESSOR_CATEGORIES[number];

export type InsightPriority = 'urgent';

/**
 * An insight produced by the extractor, not yet persisted.
 */
export interface CandidateInsight {
  type: InsightType;
  content: string;           // Template-filled summary, never the raw message
  originalMessage: string;   // Verbatim source text
  timestamp: string;
  category?: StressorCategory;
  priority?: InsightPriority;
}

export interface Insight extends CandidateInsight {
  id: string;
}

export interface InsightStats {
  total: number;
  byType: Record<InsightType, number>;
  lastInsightAt: string | null;
}

// ─────────────────────────────────────────────────────────────────────────────────
// PERSONA STATS
// ─────────────────────────────────────────────────────────────────────────────────

export interface PersonaStats {
  totalPersonas: number;
  /** Personas generated less than 24 hours before `timestamp` */
  recent24h: number;
  timestamp: string;
}

// ─────────────────────────────────────────────────────────────────────────────────
// HISTORY CACHE
// ─────────────────────────────────────────────────────────────────────────────────

export interface CacheEntry {
  messages: readonly ChatMessage[];
  storedAt: number;
}

export interface HistoryCacheStats {
  hits: number;
  misses: number;
  cachedUsers: number;
  totalEntries: number;
  ttlMs: number;
  userIds: string[];
}
