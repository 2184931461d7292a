// ═══════════════════════════════════════════════════════════════════════════════
// WELLNESS STORE — Persistence for Personas, Messages, Insights
// ═══════════════════════════════════════════════════════════════════════════════
//
// Layout on the key-value store:
//
//   persona:{userId}           PersonalityProfile (written once)
//   state:{userId}             LiveUserState (full overwrite)
//   quiz:{userId}              raw quiz answers
//   user:{userId}              { personaGenerated, personaGeneratedAt }
//   personas                   list of user ids with a persona, one entry each
//   chat:{userId}:messages     list of ChatMessage JSON, append-only
//   insight:{userId}:{id}      Insight
//   insights:{userId}          list of insight ids, insertion order
//
// Every store exception surfaces as StoreUnavailableError. Documents are
// validated on read; a document that fails validation is treated the same way.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { v4 as uuidv4 } from 'uuid';
import type { z } from 'zod';

import { getStore, type KeyValueStore } from '../../storage/index.js';
import { StoreUnavailableError } from '../errors.js';
import { getLogger } from '../../logging/index.js';
import type {
  LiveUserState,
  PersonalityProfile,
  QuizResponses,
  UserPersona,
} from '../persona/types.js';
import type {
  CandidateInsight,
  ChatMessage,
  Insight,
  InsightStats,
  InsightType,
  PersonaStats,
} from './types.js';
import type { HistorySource } from './history-cache.js';
import {
  ChatMessageSchema,
  InsightSchema,
  LiveUserStateSchema,
  PersonalityProfileSchema,
  QuizResponsesSchema,
  UserRecordSchema,
  type UserRecord,
} from './schemas.js';

const logger = getLogger({ component: 'wellness-store' });

// ─────────────────────────────────────────────────────────────────────────────────
// KEY GENERATION
// ─────────────────────────────────────────────────────────────────────────────────

function personaKey(userId: string): string {
  return `persona:${userId}`;
}

function liveStateKey(userId: string): string {
  return `state:${userId}`;
}

function quizKey(userId: string): string {
  return `quiz:${userId}`;
}

function userKey(userId: string): string {
  return `user:${userId}`;
}

const PERSONA_INDEX_KEY = 'personas';

const RECENT_PERSONA_WINDOW_MS = 24 * 60 * 60 * 1000;

function messagesKey(userId: string): string {
  return `chat:${userId}:messages`;
}

function insightKey(userId: string, id: string): string {
  return `insight:${userId}:${id}`;
}

function insightIdsKey(userId: string): string {
  return `insights:${userId}`;
}

// ─────────────────────────────────────────────────────────────────────────────────
// INPUT TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type NewChatMessage = Omit<ChatMessage, 'id' | 'timestamp'> & { timestamp?: string };

// ─────────────────────────────────────────────────────────────────────────────────
// WELLNESS STORE CLASS
// ─────────────────────────────────────────────────────────────────────────────────

export class WellnessStore implements HistorySource {
  private store: KeyValueStore;

  constructor(store?: KeyValueStore) {
    this.store = store ?? getStore();
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // PERSONA
  // ═══════════════════════════════════════════════════════════════════════════════

  async getPersona(userId: string): Promise<PersonalityProfile | null> {
    return this.run('getPersona', async () => {
      const data = await this.store.get(personaKey(userId));
      return data === null ? null : this.parse(PersonalityProfileSchema, data, 'getPersona');
    });
  }

  /**
   * Writes the profile and the initial live state.
   */
  async savePersona(persona: UserPersona): Promise<void> {
    await this.run('savePersona', async () => {
      await this.store.set(personaKey(persona.userId), JSON.stringify(persona.profile));
      await this.store.set(liveStateKey(persona.userId), JSON.stringify(persona.liveState));
    });
  }

  async getLiveState(userId: string): Promise<LiveUserState | null> {
    return this.run('getLiveState', async () => {
      const data = await this.store.get(liveStateKey(userId));
      return data === null ? null : this.parse(LiveUserStateSchema, data, 'getLiveState');
    });
  }

  async putLiveState(userId: string, state: LiveUserState): Promise<void> {
    await this.run('putLiveState', async () => {
      await this.store.set(liveStateKey(userId), JSON.stringify(state));
    });
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // QUIZ & USER RECORD
  // ═══════════════════════════════════════════════════════════════════════════════

  async getQuizResponses(userId: string): Promise<QuizResponses | null> {
    return this.run('getQuizResponses', async () => {
      const data = await this.store.get(quizKey(userId));
      return data === null ? null : this.parse(QuizResponsesSchema, data, 'getQuizResponses');
    });
  }

  async saveQuizResponses(userId: string, responses: QuizResponses): Promise<void> {
    await this.run('saveQuizResponses', async () => {
      await this.store.set(quizKey(userId), JSON.stringify(responses));
    });
  }

  async markPersonaGenerated(userId: string, at: Date = new Date()): Promise<void> {
    const record: UserRecord = { personaGenerated: true, personaGeneratedAt: at.toISOString() };
    await this.run('markPersonaGenerated', async () => {
      await this.store.set(userKey(userId), JSON.stringify(record));
      await this.store.lrem(PERSONA_INDEX_KEY, 0, userId);
      await this.store.rpush(PERSONA_INDEX_KEY, userId);
    });
  }

  async getPersonaStats(now: Date = new Date()): Promise<PersonaStats> {
    return this.run('getPersonaStats', async () => {
      const userIds = await this.store.lrange(PERSONA_INDEX_KEY, 0, -1);
      let recent24h = 0;

      for (const userId of userIds) {
        const data = await this.store.get(userKey(userId));
        if (data === null) continue;

        const { personaGeneratedAt } = this.parse(UserRecordSchema, data, 'getPersonaStats');
        if (personaGeneratedAt === undefined) continue;

        const age = now.getTime() - Date.parse(personaGeneratedAt);
        if (age < RECENT_PERSONA_WINDOW_MS) {
          recent24h++;
        }
      }

      return { totalPersonas: userIds.length, recent24h, timestamp: now.toISOString() };
    });
  }

  async getUserRecord(userId: string): Promise<UserRecord | null> {
    return this.run('getUserRecord', async () => {
      const data = await this.store.get(userKey(userId));
      return data === null ? null : this.parse(UserRecordSchema, data, 'getUserRecord');
    });
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // CHAT MESSAGES
  // ═══════════════════════════════════════════════════════════════════════════════

  async appendMessage(userId: string, input: NewChatMessage): Promise<ChatMessage> {
    const message: ChatMessage = {
      id: uuidv4(),
      role: input.role,
      content: input.content,
      timestamp: input.timestamp ?? new Date().toISOString(),
      ...(input.metadata ? { metadata: input.metadata } : {}),
    };

    await this.run('appendMessage', async () => {
      await this.store.rpush(messagesKey(userId), JSON.stringify(message));
    });

    return message;
  }

  /**
   * The last `limit` messages, oldest first.
   */
  async getRecentMessages(userId: string, limit: number): Promise<ChatMessage[]> {
    if (limit <= 0) return [];

    return this.run('getRecentMessages', async () => {
      const items = await this.store.lrange(messagesKey(userId), -limit, -1);
      return items.map((item) => this.parse(ChatMessageSchema, item, 'getRecentMessages'));
    });
  }

  async countMessages(userId: string): Promise<number> {
    return this.run('countMessages', () => this.store.llen(messagesKey(userId)));
  }

  /**
   * Returns how many messages were removed.
   */
  async clearMessages(userId: string): Promise<number> {
    return this.run('clearMessages', async () => {
      const count = await this.store.llen(messagesKey(userId));
      await this.store.delete(messagesKey(userId));
      return count;
    });
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // INSIGHTS
  // ═══════════════════════════════════════════════════════════════════════════════

  async appendInsight(userId: string, candidate: CandidateInsight): Promise<Insight> {
    const insight: Insight = { id: uuidv4(), ...candidate };

    await this.run('appendInsight', async () => {
      await this.store.set(insightKey(userId, insight.id), JSON.stringify(insight));
      await this.store.rpush(insightIdsKey(userId), insight.id);
    });

    return insight;
  }

  /**
   * The last `limit` insights, newest first.
   */
  async getRecentInsights(userId: string, limit: number): Promise<Insight[]> {
    if (limit <= 0) return [];

    return this.run('getRecentInsights', async () => {
      const ids = await this.store.lrange(insightIdsKey(userId), -limit, -1);
      const insights = await this.loadInsights(userId, ids);
      return insights.reverse();
    });
  }

  /**
   * Returns false when no insight with that id exists for the user.
   */
  async deleteInsight(userId: string, insightId: string): Promise<boolean> {
    return this.run('deleteInsight', async () => {
      const removed = await this.store.lrem(insightIdsKey(userId), 0, insightId);
      const deleted = await this.store.delete(insightKey(userId, insightId));
      return removed > 0 || deleted;
    });
  }

  async getInsightStats(userId: string): Promise<InsightStats> {
    return this.run('getInsightStats', async () => {
      const ids = await this.store.lrange(insightIdsKey(userId), 0, -1);
      const insights = await this.loadInsights(userId, ids);

      const byType: Record<InsightType, number> = {
        stressor: 0,
        breakthrough: 0,
        support_need: 0,
        milestone: 0,
        crisis: 0,
      };
      let lastInsightAt: string | null = null;

      for (const insight of insights) {
        byType[insight.type] += 1;
        if (lastInsightAt === null || insight.timestamp > lastInsightAt) {
          lastInsightAt = insight.timestamp;
        }
      }

      return { total: insights.length, byType, lastInsightAt };
    });
  }

  private async loadInsights(userId: string, ids: readonly string[]): Promise<Insight[]> {
    const insights: Insight[] = [];
    for (const id of ids) {
      const data = await this.store.get(insightKey(userId, id));
      if (data === null) continue;
      insights.push(this.parse(InsightSchema, data, 'loadInsights'));
    }
    return insights;
  }

  // ─────────────────────────────────────────────────────────────────────────────────
  // HELPERS
  // ─────────────────────────────────────────────────────────────────────────────────

  private parse<T>(schema: z.ZodType<T>, data: string, operation: string): T {
    let raw: unknown;
    try {
      raw = JSON.parse(data);
    } catch (error) {
      throw new StoreUnavailableError(`${operation}: unreadable document`, error);
    }

    const result = schema.safeParse(raw);
    if (!result.success) {
      throw new StoreUnavailableError(`${operation}: invalid document`, result.error);
    }
    return result.data;
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof StoreUnavailableError) {
        logger.error('Stored document rejected', error, { operation });
        throw error;
      }
      logger.error('Store operation failed', error, { operation });
      throw new StoreUnavailableError(operation, error);
    }
  }
}
