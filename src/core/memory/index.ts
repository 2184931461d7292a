// ═══════════════════════════════════════════════════════════════════════════════
// MEMORY MODULE — Recent History, Long-Term Insights, Persistence
// ═══════════════════════════════════════════════════════════════════════════════
//
// Components:
// - Store: personas, live state, messages and insights on the key-value store
// - History cache: TTL-bound window of recent messages per user
// - Extractor: keyword detectors that propose insights from a message
// - Significance: decides which proposed insights are kept
//
// ═══════════════════════════════════════════════════════════════════════════════

// Types
export type {
  ChatRole,
  ChatMessage,
  ChatMessageMetadata,
  InsightType,
  StressorCategory,
  InsightPriority,
  CandidateInsight,
  Insight,
  InsightStats,
  PersonaStats,
  CacheEntry,
  HistoryCacheStats,
} from './types.js';

export { INSIGHT_TYPES, STRESSOR_CATEGORIES } from './types.js';

// Store
export {
  WellnessStore,
  type NewChatMessage,
} from './store.js';

// History cache
export {
  ChatHistoryCache,
  DEFAULT_HISTORY_TTL_MS,
  type HistorySource,
  type ChatHistoryCacheOptions,
} from './history-cache.js';

// Extractor
export {
  extractInsights,
  detectCrisis,
  detectStressors,
  detectBreakthrough,
  detectSupportNeed,
  detectMilestone,
  CRISIS_CONTENT,
  SUPPORT_NEED_CONTENT,
  type InsightDetector,
} from './extractor.js';

// Significance
export {
  shouldPersist,
  filterSignificant,
  normalizeContent,
  DEFAULT_SIGNIFICANCE_OPTIONS,
  type SignificanceOptions,
} from './significance.js';
