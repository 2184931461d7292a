// ═══════════════════════════════════════════════════════════════════════════════
// CHAT SERVICE — Per-Turn Orchestration
// ═══════════════════════════════════════════════════════════════════════════════
//
// A chat turn, in order:
//   1. build context (persona, live state, insights, cached history)
//   2. generate the reply
//   3. append the user message, then the assistant message
//   4. invalidate the user's history cache
//   5. extract, filter and persist insights
//   6. apply the chat action to the live state and persist it
//
// Turns and live-state updates for the same user run one at a time, in
// arrival order. Different users never wait on each other.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { loadConfig } from '../config/index.js';
import { getLogger } from '../logging/index.js';
import { NoPersonaError, NotFoundError } from '../core/errors.js';
import type { ContextComposer } from '../core/context/builder.js';
import type { ChatHistoryCache } from '../core/memory/history-cache.js';
import type { WellnessStore } from '../core/memory/store.js';
import { extractInsights } from '../core/memory/extractor.js';
import { filterSignificant, type SignificanceOptions } from '../core/memory/significance.js';
import type { ChatMessage, HistoryCacheStats, Insight, InsightStats, PersonaStats } from '../core/memory/types.js';
import type { PersonaGenerator } from '../core/persona/generator.js';
import { applyAction } from '../core/persona/live-state.js';
import {
  createDefaultLiveState,
  type LiveStateAction,
  type LiveUserState,
  type Mood,
  type QuizResponses,
  type UserPersona,
} from '../core/persona/types.js';
import type { ReplyGenerator } from '../providers/types.js';
import { recommendTools } from './tool-recommender.js';
import { CRISIS_RESOURCES, type CrisisResource } from './crisis-resources.js';

const logger = getLogger({ component: 'chat-service' });

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface ChatServiceDeps {
  store: WellnessStore;
  historyCache: ChatHistoryCache;
  composer: ContextComposer;
  replyGenerator: ReplyGenerator;
  personaGenerator: PersonaGenerator;
  significance?: SignificanceOptions;
  clock?: () => Date;
}

export interface SendMessageOptions {
  /** Mood the user reported with this message */
  mood?: Mood;
  /** When false, the reply is generated without recent history */
  includeHistory?: boolean;
}

export interface ChatTurnResult {
  reply: string;
  insightsSaved: number;
  liveState: LiveUserState;
  recommendedTools: Record<string, number>;
  crisisResources?: readonly CrisisResource[];
}

export interface HistoryPage {
  messages: ChatMessage[];
  total: number;
}

export interface InsightsPage {
  insights: Insight[];
  stats: InsightStats;
}

// ─────────────────────────────────────────────────────────────────────────────────
// CHAT SERVICE CLASS
// ─────────────────────────────────────────────────────────────────────────────────

export class ChatService {
  private readonly store: WellnessStore;
  private readonly historyCache: ChatHistoryCache;
  private readonly composer: ContextComposer;
  private readonly replyGenerator: ReplyGenerator;
  private readonly personaGenerator: PersonaGenerator;
  private readonly significance: SignificanceOptions;
  private readonly clock: () => Date;

  private readonly queues = new Map<string, Promise<void>>();

  constructor(deps: ChatServiceDeps) {
    this.store = deps.store;
    this.historyCache = deps.historyCache;
    this.composer = deps.composer;
    this.replyGenerator = deps.replyGenerator;
    this.personaGenerator = deps.personaGenerator;
    this.clock = deps.clock ?? (() => new Date());

    const { insights } = loadConfig();
    this.significance = deps.significance ?? {
      dedupWindowSize: insights.dedupWindowSize,
      dedupWindowMs: insights.dedupWindowMs,
    };
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // PERSONA
  // ═══════════════════════════════════════════════════════════════════════════════

  async generatePersona(userId: string, responses: QuizResponses): Promise<UserPersona> {
    const profile = await this.personaGenerator.generate(responses);
    const persona: UserPersona = {
      userId,
      profile,
      liveState: createDefaultLiveState(this.clock()),
    };

    await this.serialize(userId, async () => {
      await this.store.saveQuizResponses(userId, responses);
      await this.store.savePersona(persona);
      await this.store.markPersonaGenerated(userId, this.clock());
    });

    logger.info('Persona generated', {
      userId,
      generator: this.personaGenerator.name,
      communicationStyle: profile.communicationStyle,
      stressLevel: profile.stressLevel,
    });

    return persona;
  }

  async getPersona(userId: string): Promise<UserPersona> {
    const profile = await this.store.getPersona(userId);
    if (!profile) {
      throw new NoPersonaError(userId);
    }

    const liveState = await this.store.getLiveState(userId);
    return {
      userId,
      profile,
      liveState: liveState ?? createDefaultLiveState(this.clock()),
    };
  }

  async updateLiveState(userId: string, action: LiveStateAction): Promise<LiveUserState> {
    return this.serialize(userId, async () => {
      const persona = await this.getPersona(userId);
      const next = applyAction(persona.liveState, action, this.clock());
      await this.store.putLiveState(userId, next);

      logger.debug('Live state updated', { userId, action: action.type, needsCheckIn: next.needsCheckIn });
      return next;
    });
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // CHAT TURN
  // ═══════════════════════════════════════════════════════════════════════════════

  async sendMessage(userId: string, message: string, options: SendMessageOptions = {}): Promise<ChatTurnResult> {
    return this.serialize(userId, () => this.runTurn(userId, message, options));
  }

  private async runTurn(userId: string, message: string, options: SendMessageOptions): Promise<ChatTurnResult> {
    const startedAt = Date.now();

    const context = await this.composer.build(
      userId,
      message,
      options.includeHistory === false ? { historyLimit: 0 } : {}
    );

    const reply = await this.replyGenerator.generateReply(context, message);
    const recommendedTools = recommendTools(message, context.liveState.currentMood);

    const now = this.clock();
    const timestamp = now.toISOString();

    // A failed assistant append can follow a stored user message
    try {
      await this.store.appendMessage(userId, {
        role: 'user',
        content: message,
        timestamp,
        metadata: { mood: context.liveState.currentMood },
      });
      await this.store.appendMessage(userId, {
        role: 'assistant',
        content: reply,
        timestamp,
        metadata: { model: this.replyGenerator.model, recommendedTools },
      });
    } finally {
      this.historyCache.invalidate(userId);
    }

    const candidates = extractInsights(message, reply, timestamp);
    const recent = await this.store.getRecentInsights(userId, this.significance.dedupWindowSize);
    const accepted = filterSignificant(candidates, recent, this.significance);

    for (const candidate of accepted) {
      await this.store.appendInsight(userId, candidate);
    }

    const crisisDetected = accepted.some((insight) => insight.type === 'crisis');
    const stressor = accepted.find((insight) => insight.type === 'stressor');

    const action: LiveStateAction = {
      type: 'chat_message',
      content: message,
      mood: options.mood,
      stressorDetected: stressor?.category ? `${stressor.category} stress` : undefined,
      crisisDetected,
    };
    const liveState = applyAction(context.liveState, action, now);
    await this.store.putLiveState(userId, liveState);

    if (crisisDetected) {
      logger.warn('Crisis insight recorded', { userId });
    }

    logger.time('Chat turn completed', startedAt, { userId, insightsSaved: accepted.length });

    return {
      reply,
      insightsSaved: accepted.length,
      liveState,
      recommendedTools,
      ...(crisisDetected ? { crisisResources: CRISIS_RESOURCES } : {}),
    };
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // ADMINISTRATIVE
  // ═══════════════════════════════════════════════════════════════════════════════

  async getHistory(userId: string, limit: number): Promise<HistoryPage> {
    const [messages, total] = await Promise.all([
      this.historyCache.get(userId, limit),
      this.store.countMessages(userId),
    ]);
    return { messages, total };
  }

  async clearHistory(userId: string): Promise<number> {
    return this.serialize(userId, async () => {
      const removed = await this.store.clearMessages(userId);
      this.historyCache.invalidate(userId);
      logger.info('Chat history cleared', { userId, removed });
      return removed;
    });
  }

  async getInsights(userId: string, limit: number): Promise<InsightsPage> {
    const [insights, stats] = await Promise.all([
      this.store.getRecentInsights(userId, limit),
      this.store.getInsightStats(userId),
    ]);
    return { insights, stats };
  }

  async deleteInsight(userId: string, insightId: string): Promise<void> {
    const deleted = await this.store.deleteInsight(userId, insightId);
    if (!deleted) {
      throw new NotFoundError('Insight', userId);
    }
  }

  async getPersonaStats(): Promise<PersonaStats> {
    return this.store.getPersonaStats(this.clock());
  }

  getCacheStats(): HistoryCacheStats {
    return this.historyCache.stats();
  }

  // ─────────────────────────────────────────────────────────────────────────────────
  // PER-USER SERIALIZATION
  // ─────────────────────────────────────────────────────────────────────────────────

  private async serialize<T>(userId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(userId) ?? Promise.resolve();
    const run = previous.then(() => task());
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.queues.set(userId, tail);

    try {
      return await run;
    } finally {
      if (this.queues.get(userId) === tail) {
        this.queues.delete(userId);
      }
    }
  }
}
