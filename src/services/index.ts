// ═══════════════════════════════════════════════════════════════════════════════
// SERVICES — Construction and Wiring
// ═══════════════════════════════════════════════════════════════════════════════
//
// The history cache is constructed once here and handed to every consumer;
// there is no module-level cache instance.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { loadConfig } from '../config/index.js';
import { getStore, type KeyValueStore } from '../storage/index.js';
import { WellnessStore } from '../core/memory/store.js';
import { ChatHistoryCache } from '../core/memory/history-cache.js';
import { ContextComposer } from '../core/context/builder.js';
import { createPersonaGenerator, type PersonaGenerator } from '../core/persona/generator.js';
import { createReplyGenerator, type ReplyGenerator } from '../providers/index.js';
import { ChatService } from './chat-service.js';

export { ChatService } from './chat-service.js';
export type {
  ChatServiceDeps,
  ChatTurnResult,
  SendMessageOptions,
  HistoryPage,
  InsightsPage,
} from './chat-service.js';
export { recommendTools } from './tool-recommender.js';
export { CRISIS_RESOURCES, type CrisisResource } from './crisis-resources.js';

export interface Services {
  kvStore: KeyValueStore;
  store: WellnessStore;
  historyCache: ChatHistoryCache;
  composer: ContextComposer;
  chatService: ChatService;
  replyGenerator: ReplyGenerator;
}

export interface ServiceOverrides {
  kvStore?: KeyValueStore;
  replyGenerator?: ReplyGenerator;
  personaGenerator?: PersonaGenerator;
  clock?: () => Date;
}

export function createServices(overrides: ServiceOverrides = {}): Services {
  const config = loadConfig();
  const clock = overrides.clock;

  const kvStore = overrides.kvStore ?? getStore();
  const store = new WellnessStore(kvStore);
  const historyCache = new ChatHistoryCache(store, {
    ttlMs: config.cache.historyTtlMs,
    clock: clock ? () => clock().getTime() : undefined,
  });
  const composer = new ContextComposer(store, historyCache, {}, clock);

  const replyGenerator = overrides.replyGenerator ?? createReplyGenerator(config.model);
  const chatService = new ChatService({
    store,
    historyCache,
    composer,
    replyGenerator,
    personaGenerator: overrides.personaGenerator ?? createPersonaGenerator(config.model),
    clock,
  });

  return { kvStore, store, historyCache, composer, chatService, replyGenerator };
}
