// ═══════════════════════════════════════════════════════════════════════════════
// SIGNIFICANCE FILTER — Which Candidates Become Long-Term Insights
// ═══════════════════════════════════════════════════════════════════════════════
//
// Rules, in order:
//   1. crisis                                   → always persist
//   2. stressor with hedged, low-intensity text → drop
//   3. same type + same normalized content among the last N insights
//      within the recency window                → drop
//   4. otherwise                                → persist
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { CandidateInsight } from './types.js';

export interface SignificanceOptions {
  /** How many of the most recent insights are checked for duplicates */
  dedupWindowSize: number;
  /** Maximum age difference, in ms, for an insight to count as a duplicate */
  dedupWindowMs: number;
}

export const DEFAULT_SIGNIFICANCE_OPTIONS: SignificanceOptions = {
  dedupWindowSize: 10,
  dedupWindowMs: 24 * 60 * 60 * 1000,
};

const GENERIC_STRESSOR_TERMS = ['a little', 'bit stressed', 'kinda', 'slightly'];

export function normalizeContent(content: string): string {
  return content.trim().toLowerCase().replace(/\s+/g, ' ');
}

function isGenericStressor(candidate: CandidateInsight): boolean {
  if (candidate.type !== 'stressor') return false;
  const content = candidate.content.toLowerCase();
  return GENERIC_STRESSOR_TERMS.some((term) => content.includes(term));
}

function timeOf(timestamp: string): number {
  const ms = Date.parse(timestamp);
  return Number.isNaN(ms) ? 0 : ms;
}

/**
 * @param recentInsights the user's insights, newest first
 */
export function shouldPersist(
  candidate: CandidateInsight,
  recentInsights: readonly CandidateInsight[],
  options: SignificanceOptions = DEFAULT_SIGNIFICANCE_OPTIONS
): boolean {
  if (candidate.type === 'crisis') return true;
  if (isGenericStressor(candidate)) return false;

  const content = normalizeContent(candidate.content);
  const at = timeOf(candidate.timestamp);

  const duplicate = recentInsights
    .slice(0, options.dedupWindowSize)
    .some((existing) =>
      existing.type === candidate.type &&
      normalizeContent(existing.content) === content &&
      Math.abs(at - timeOf(existing.timestamp)) <= options.dedupWindowMs
    );

  return !duplicate;
}

/**
 * Filters a batch. Candidates accepted earlier in the batch count as recent
 * insights for the ones after them.
 */
export function filterSignificant(
  candidates: readonly CandidateInsight[],
  recentInsights: readonly CandidateInsight[],
  options: SignificanceOptions = DEFAULT_SIGNIFICANCE_OPTIONS
): CandidateInsight[] {
  const accepted: CandidateInsight[] = [];
  let window: CandidateInsight[] = [...recentInsights];

  for (const candidate of candidates) {
    if (shouldPersist(candidate, window, options)) {
      accepted.push(candidate);
      window = [candidate, ...window];
    }
  }

  return accepted;
}
