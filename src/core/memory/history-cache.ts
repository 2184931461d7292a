// ═══════════════════════════════════════════════════════════════════════════════
// CHAT HISTORY CACHE — Per-User, TTL-Bound Recent-Message Window
// ═══════════════════════════════════════════════════════════════════════════════
//
// Sits in front of the store's "last N messages" read. Entries are keyed by
// (userId, limit) and live for `ttlMs`.
//
// Write-then-invalidate: after a message is appended, invalidate(userId)
// drops every entry for that user and bumps the user's generation. A fetch
// that started under an older generation still returns its result to its
// own caller, but never writes it into the cache.
//
// A failed fetch writes nothing.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { CacheEntry, ChatMessage, HistoryCacheStats } from './types.js';
import { getLogger } from '../../logging/index.js';

const logger = getLogger({ component: 'history-cache' });

export const DEFAULT_HISTORY_TTL_MS = 5 * 60 * 1000;

export interface HistorySource {
  /** Most recent `limit` messages, oldest first. */
  getRecentMessages(userId: string, limit: number): Promise<ChatMessage[]>;
}

export interface ChatHistoryCacheOptions {
  ttlMs?: number;
  /** Milliseconds since epoch; injectable for tests */
  clock?: () => number;
}

interface InFlight {
  generation: number;
  promise: Promise<ChatMessage[]>;
}

export class ChatHistoryCache {
  private readonly ttlMs: number;
  private readonly clock: () => number;

  private readonly entries = new Map<string, Map<number, CacheEntry>>();
  private readonly inFlight = new Map<string, Map<number, InFlight>>();
  private readonly generations = new Map<string, number>();

  private hits = 0;
  private misses = 0;

  constructor(
    private readonly source: HistorySource,
    options: ChatHistoryCacheOptions = {}
  ) {
    this.ttlMs = options.ttlMs ?? DEFAULT_HISTORY_TTL_MS;
    this.clock = options.clock ?? Date.now;
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // READ PATH
  // ═══════════════════════════════════════════════════════════════════════════════

  async get(userId: string, limit: number): Promise<ChatMessage[]> {
    const now = this.clock();
    const userEntries = this.entries.get(userId);
    const entry = userEntries?.get(limit);

    if (entry && now - entry.storedAt < this.ttlMs) {
      this.hits++;
      return [...entry.messages];
    }

    if (entry && userEntries) {
      userEntries.delete(limit);
      if (userEntries.size === 0) this.entries.delete(userId);
    }

    this.misses++;
    const generation = this.generationOf(userId);

    // Concurrent misses for the same key share one fetch
    const pending = this.inFlight.get(userId)?.get(limit);
    if (pending && pending.generation === generation) {
      return [...(await pending.promise)];
    }

    const promise = this.source.getRecentMessages(userId, limit);
    const flight: InFlight = { generation, promise };
    this.trackInFlight(userId, limit, flight);

    try {
      const messages = await promise;

      if (this.generationOf(userId) === generation) {
        this.store(userId, limit, { messages: [...messages], storedAt: now });
      } else {
        logger.debug('Discarding history fetched before invalidation', { userId, limit });
      }

      return [...messages];
    } finally {
      this.untrackInFlight(userId, limit, flight);
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // INVALIDATION
  // ═══════════════════════════════════════════════════════════════════════════════

  /**
   * Drops every entry for the user, whatever its limit. Entries of other
   * users are untouched.
   */
  invalidate(userId: string): void {
    this.entries.delete(userId);
    this.inFlight.delete(userId);
    this.generations.set(userId, this.generationOf(userId) + 1);
  }

  clear(): void {
    for (const userId of this.inFlight.keys()) {
      this.generations.set(userId, this.generationOf(userId) + 1);
    }
    this.entries.clear();
    this.inFlight.clear();
    this.hits = 0;
    this.misses = 0;
  }

  stats(): HistoryCacheStats {
    let totalEntries = 0;
    for (const userEntries of this.entries.values()) {
      totalEntries += userEntries.size;
    }

    return {
      hits: this.hits,
      misses: this.misses,
      cachedUsers: this.entries.size,
      totalEntries,
      ttlMs: this.ttlMs,
      userIds: [...this.entries.keys()],
    };
  }

  // ─────────────────────────────────────────────────────────────────────────────────
  // INTERNALS
  // ─────────────────────────────────────────────────────────────────────────────────

  private generationOf(userId: string): number {
    return this.generations.get(userId) ?? 0;
  }

  private store(userId: string, limit: number, entry: CacheEntry): void {
    let userEntries = this.entries.get(userId);
    if (!userEntries) {
      userEntries = new Map();
      this.entries.set(userId, userEntries);
    }
    userEntries.set(limit, entry);
  }

  private trackInFlight(userId: string, limit: number, flight: InFlight): void {
    let userFlights = this.inFlight.get(userId);
    if (!userFlights) {
      userFlights = new Map();
      this.inFlight.set(userId, userFlights);
    }
    userFlights.set(limit, flight);
  }

  private untrackInFlight(userId: string, limit: number, flight: InFlight): void {
    const userFlights = this.inFlight.get(userId);
    if (userFlights?.get(limit) !== flight) return;

    userFlights.delete(limit);
    if (userFlights.size === 0) this.inFlight.delete(userId);
  }
}
