// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RECOMMENDER — Keyword Scoring of Wellness Tools
// ═══════════════════════════════════════════════════════════════════════════════
//
// Each keyword hit in the message scores 1; a tool suited to the user's
// current mood scores 1 more. Scores are normalized against the best tool
// and only the top three are returned.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { readFileSync } from 'node:fs';
import { z } from 'zod';

import { MOODS, type Mood } from '../core/persona/types.js';

const WellnessToolsSchema = z.object({
  tools: z.array(z.object({
    id: z.string(),
    keywords: z.array(z.string().toLowerCase()),
    moods: z.array(z.enum(MOODS)),
  })),
});

type WellnessTool = z.infer<typeof WellnessToolsSchema>['tools'][number];

const TOOLS_PATH = new URL('../../data/wellness-tools.json', import.meta.url);
const MAX_RECOMMENDATIONS = 3;

let tools: WellnessTool[] | null = null;

function getTools(): WellnessTool[] {
  if (!tools) {
    const raw: unknown = JSON.parse(readFileSync(TOOLS_PATH, 'utf8'));
    tools = WellnessToolsSchema.parse(raw).tools;
  }
  return tools;
}

/**
 * Tool id → score in (0, 1], highest first.
 */
export function recommendTools(message: string, mood: Mood): Record<string, number> {
  const lower = message.toLowerCase();

  const scored = getTools()
    .map((tool) => {
      const hits = tool.keywords.filter((keyword) => lower.includes(keyword)).length;
      const moodBoost = tool.moods.includes(mood) ? 1 : 0;
      return { id: tool.id, score: hits + moodBoost };
    })
    .filter((entry) => entry.score > 0)
    .sort((a, b) => b.score - a.score)
    .slice(0, MAX_RECOMMENDATIONS);

  const best = scored[0]?.score ?? 0;
  const result: Record<string, number> = {};
  for (const entry of scored) {
    result[entry.id] = Math.round((entry.score / best) * 100) / 100;
  }
  return result;
}
