// ═══════════════════════════════════════════════════════════════════════════════
// CONTEXT COMPOSER — Conversation Context for Reply Generation
// ═══════════════════════════════════════════════════════════════════════════════
//
// Aggregates four sources, always in this order:
// - Persona: who the user is (required)
// - Live state: how they are doing right now (default when absent)
// - Insights: significant past moments, newest first (empty when absent)
// - Recent history: the last N messages, oldest first, through the cache
//
// ═══════════════════════════════════════════════════════════════════════════════

import { NoPersonaError } from '../errors.js';
import { loadConfig } from '../../config/index.js';
import { getLogger } from '../../logging/index.js';
import {
  createDefaultLiveState,
  type LiveUserState,
  type PersonalityProfile,
} from '../persona/types.js';
import type { ChatMessage, Insight } from '../memory/types.js';
import type { ChatHistoryCache } from '../memory/history-cache.js';
import type { WellnessStore } from '../memory/store.js';

const logger = getLogger({ component: 'context-composer' });

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface ConversationContext {
  persona: PersonalityProfile;
  liveState: LiveUserState;
  insights: Insight[];
  recentHistory: ChatMessage[];
  incomingMessage: string;
  assembledAt: string;
}

export interface ContextBuildOptions {
  historyLimit?: number;
  insightLimit?: number;
}

export interface FormatOptions {
  /** Omit when history is sent to the model as separate turns */
  includeHistory?: boolean;
}

type ContextSources = Pick<WellnessStore, 'getPersona' | 'getLiveState' | 'getRecentInsights'>;

const ORIGINAL_PREVIEW_CHARS = 80;

// ─────────────────────────────────────────────────────────────────────────────────
// CONTEXT COMPOSER CLASS
// ─────────────────────────────────────────────────────────────────────────────────

export class ContextComposer {
  private readonly defaults: Required<ContextBuildOptions>;

  constructor(
    private readonly store: ContextSources,
    private readonly historyCache: Pick<ChatHistoryCache, 'get'>,
    defaults: ContextBuildOptions = {},
    private readonly clock: () => Date = () => new Date()
  ) {
    const { context } = loadConfig();
    this.defaults = {
      historyLimit: defaults.historyLimit ?? context.historyLimit,
      insightLimit: defaults.insightLimit ?? context.insightLimit,
    };
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // BUILD
  // ─────────────────────────────────────────────────────────────────────────────

  async build(
    userId: string,
    incomingMessage: string,
    options: ContextBuildOptions = {}
  ): Promise<ConversationContext> {
    const historyLimit = options.historyLimit ?? this.defaults.historyLimit;
    const insightLimit = options.insightLimit ?? this.defaults.insightLimit;

    const persona = await this.store.getPersona(userId);
    if (!persona) {
      throw new NoPersonaError(userId);
    }

    const [liveState, insights, recentHistory] = await Promise.all([
      this.store.getLiveState(userId),
      this.store.getRecentInsights(userId, insightLimit),
      this.historyCache.get(userId, historyLimit),
    ]);

    const now = this.clock();

    logger.debug('Context assembled', {
      userId,
      insights: insights.length,
      history: recentHistory.length,
      liveState: liveState !== null,
    });

    return {
      persona,
      liveState: liveState ?? createDefaultLiveState(now),
      insights: insights.slice(0, insightLimit),
      recentHistory: historyLimit > 0 ? recentHistory.slice(-historyLimit) : [],
      incomingMessage,
      assembledAt: now.toISOString(),
    };
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // FORMAT FOR PROMPT
  // ─────────────────────────────────────────────────────────────────────────────

  formatForPrompt(context: ConversationContext, options: FormatOptions = {}): string {
    return formatContextForPrompt(context, options);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// PROMPT FORMATTING
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Renders the context as tagged sections in composition order: persona,
 * live state, insights (labelled with their timestamp), recent history.
 */
export function formatContextForPrompt(context: ConversationContext, options: FormatOptions = {}): string {
  const includeHistory = options.includeHistory ?? true;
  const parts: string[] = [];
  const { persona, liveState } = context;

  parts.push('<wellness_context>');

  // Persona
  parts.push('');
  parts.push('<persona>');
  parts.push(persona.systemPrompt);
  parts.push('');
  parts.push(`Communication Style: ${persona.communicationStyle}`);
  parts.push(`Primary Stressor: ${persona.primaryStressor}`);
  parts.push(`Social Profile: ${persona.socialProfile}`);
  parts.push(`Coping Mechanism: ${persona.copingMechanism}`);
  parts.push(`Overall Stress Level: ${persona.stressLevel}`);
  if (persona.strengths.length > 0) {
    parts.push('Strengths:');
    for (const strength of persona.strengths) parts.push(`- ${strength}`);
  }
  if (persona.vulnerabilities.length > 0) {
    parts.push('Areas Needing Support:');
    for (const vulnerability of persona.vulnerabilities) parts.push(`- ${vulnerability}`);
  }
  parts.push(`Recommended Approach: ${persona.recommendedApproach}`);
  parts.push(`Tone: ${persona.chatbotTone}`);
  parts.push(`Methodology: ${persona.chatbotMethodology}`);
  parts.push('</persona>');

  // Live state
  parts.push('');
  parts.push('<live_state>');
  parts.push(`Current Mood: ${liveState.currentMood}`);
  parts.push(`Last Interaction: ${liveState.lastInteraction} (${liveState.lastInteractionAt})`);
  parts.push(`Chat Messages: ${liveState.chatMessageCount}`);
  parts.push(`Wellness Tools Used: ${liveState.toolUsageCount}`);
  parts.push(`Sleep Logs: ${liveState.sleepLogCount}`);
  parts.push(`Recent Stressors: ${liveState.recentStressors.join(', ') || 'None identified yet'}`);
  parts.push(`Coping Successes: ${liveState.copingSuccesses.join(', ') || 'Building coping strategies'}`);
  parts.push(`Needs Check-in: ${liveState.needsCheckIn ? 'Yes - offer support with warmth' : 'No'}`);
  parts.push('</live_state>');

  // Insights
  if (context.insights.length > 0) {
    parts.push('');
    parts.push('<insights>');
    parts.push('Important past moments. Reference them naturally when relevant.');
    for (const insight of context.insights) {
      const preview = insight.originalMessage.slice(0, ORIGINAL_PREVIEW_CHARS);
      parts.push(`- [${insight.type.toUpperCase()}] ${insight.content} (${insight.timestamp})`);
      parts.push(`  Context: "${preview}"`);
    }
    parts.push('</insights>');
  }

  // Recent history
  if (includeHistory && context.recentHistory.length > 0) {
    parts.push('');
    parts.push('<recent_history>');
    for (const message of context.recentHistory) {
      parts.push(`${message.role}: ${message.content}`);
    }
    parts.push('</recent_history>');
  }

  parts.push('');
  parts.push('</wellness_context>');

  return parts.join('\n');
}
