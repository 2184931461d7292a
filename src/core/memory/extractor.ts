// ═══════════════════════════════════════════════════════════════════════════════
// INSIGHT EXTRACTOR — Keyword Detectors over User Messages
// ═══════════════════════════════════════════════════════════════════════════════
//
// Five independent detectors, one per insight type. Each is a pure function
// of (message, lowercased message, timestamp) and may yield zero or more
// candidates. A message can produce several insight types at once; detector
// order never changes the result set.
//
// Keyword lists live in data/insight-patterns.json.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { readFileSync } from 'node:fs';
import { z } from 'zod';

import {
  STRESSOR_CATEGORIES,
  type CandidateInsight,
  type InsightType,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// PATTERNS
// ─────────────────────────────────────────────────────────────────────────────────

const KeywordList = z.array(z.string().min(1).toLowerCase());

const InsightPatternsSchema = z.object({
  crisis: KeywordList,
  stressors: z.object({
    academic: KeywordList,
    social: KeywordList,
    authority: KeywordList,
    health: KeywordList,
    sleep: KeywordList,
    financial: KeywordList,
  }),
  breakthrough: KeywordList,
  supportNeed: KeywordList,
  milestone: KeywordList,
});

export type InsightPatterns = z.infer<typeof InsightPatternsSchema>;

const PATTERNS_PATH = new URL('../../../data/insight-patterns.json', import.meta.url);

let patterns: InsightPatterns | null = null;

export function getInsightPatterns(): InsightPatterns {
  if (!patterns) {
    const raw: unknown = JSON.parse(readFileSync(PATTERNS_PATH, 'utf8'));
    patterns = InsightPatternsSchema.parse(raw);
  }
  return patterns;
}

// Characters either side of a stressor keyword kept as context
const CONTEXT_WINDOW = 30;

export const CRISIS_CONTENT = 'CRISIS: User expressed concerning thoughts - immediate support needed';
export const SUPPORT_NEED_CONTENT = 'User expressed need for support';

// ─────────────────────────────────────────────────────────────────────────────────
// DETECTORS
// ─────────────────────────────────────────────────────────────────────────────────

export type InsightDetector = (message: string, lower: string, timestamp: string) => CandidateInsight[];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function titleCase(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

/**
 * First '.'-delimited sentence of the original message containing the keyword.
 */
function findSentence(message: string, keyword: string): string | undefined {
  return message
    .split('.')
    .find((sentence) => sentence.toLowerCase().includes(keyword))
    ?.trim();
}

export const detectCrisis: InsightDetector = (message, lower, timestamp) => {
  const matched = getInsightPatterns().crisis.some((keyword) => lower.includes(keyword));
  if (!matched) return [];

  return [{
    type: 'crisis',
    content: CRISIS_CONTENT,
    originalMessage: message,
    timestamp,
    priority: 'urgent',
  }];
};

/**
 * At most one insight per stressor category.
 */
export const detectStressors: InsightDetector = (message, lower, timestamp) => {
  const insights: CandidateInsight[] = [];
  const { stressors } = getInsightPatterns();

  for (const category of STRESSOR_CATEGORIES) {
    const context = findStressorContext(lower, stressors[category]);
    if (context === undefined) continue;

    insights.push({
      type: 'stressor',
      content: `${titleCase(category)} stress detected: ${context}`,
      originalMessage: message,
      timestamp,
      category,
    });
  }

  return insights;
};

function findStressorContext(lower: string, keywords: readonly string[]): string | undefined {
  for (const keyword of keywords) {
    if (!lower.includes(keyword)) continue;

    const window = new RegExp(`.{0,${CONTEXT_WINDOW}}${escapeRegExp(keyword)}.{0,${CONTEXT_WINDOW}}`);
    const match = window.exec(lower);
    if (match) return match[0].trim();
  }
  return undefined;
}

function sentenceDetector(
  type: Extract<InsightType, 'breakthrough' | 'milestone'>,
  prefix: string,
  keywords: () => readonly string[]
): InsightDetector {
  return (message, lower, timestamp) => {
    for (const keyword of keywords()) {
      if (!lower.includes(keyword)) continue;

      const sentence = findSentence(message, keyword);
      if (sentence !== undefined) {
        return [{
          type,
          content: `${prefix}: ${sentence}`,
          originalMessage: message,
          timestamp,
        }];
      }
    }
    return [];
  };
}

export const detectBreakthrough: InsightDetector = sentenceDetector(
  'breakthrough',
  'Positive realization',
  () => getInsightPatterns().breakthrough
);

export const detectMilestone: InsightDetector = sentenceDetector(
  'milestone',
  'Achievement',
  () => getInsightPatterns().milestone
);

export const detectSupportNeed: InsightDetector = (message, lower, timestamp) => {
  const matched = getInsightPatterns().supportNeed.some((keyword) => lower.includes(keyword));
  if (!matched) return [];

  return [{
    type: 'support_need',
    content: SUPPORT_NEED_CONTENT,
    originalMessage: message,
    timestamp,
  }];
};

export const DETECTORS: Readonly<Record<InsightType, InsightDetector>> = {
  crisis: detectCrisis,
  stressor: detectStressors,
  breakthrough: detectBreakthrough,
  support_need: detectSupportNeed,
  milestone: detectMilestone,
};

// ─────────────────────────────────────────────────────────────────────────────────
// EXTRACTION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Runs every detector over the user message. Non-string or blank input
 * yields no candidates. The assistant reply is accepted with the turn but
 * not scanned.
 */
export function extractInsights(
  message: unknown,
  _aiResponse: string = '',
  timestamp: string = new Date().toISOString()
): CandidateInsight[] {
  if (typeof message !== 'string' || message.trim() === '') return [];

  const lower = message.toLowerCase();
  return Object.values(DETECTORS).flatMap((detect) => detect(message, lower, timestamp));
}
