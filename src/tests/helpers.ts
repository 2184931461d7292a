// ═══════════════════════════════════════════════════════════════════════════════
// TEST HELPERS — Shared Fixtures
// ═══════════════════════════════════════════════════════════════════════════════

import { MemoryStore } from '../storage/memory.js';
import { createServices, type Services } from '../services/index.js';
import { MockReplyGenerator } from '../providers/mock.js';
import { RuleBasedPersonaGenerator } from '../core/persona/generator.js';
import type { ReplyGenerator } from '../providers/types.js';
import type { QuizResponses } from '../core/persona/types.js';

export const ALL_A: QuizResponses = {
  1: 'a', 2: 'a', 3: 'a', 4: 'a', 5: 'a', 6: 'a', 7: 'a', 8: 'a', 9: 'a', 10: 'a',
};

export const ALL_B: QuizResponses = {
  1: 'b', 2: 'b', 3: 'b', 4: 'b', 5: 'b', 6: 'b', 7: 'b', 8: 'b', 9: 'b', 10: 'b',
};

export interface TestClock {
  now: () => Date;
  advance(ms: number): void;
}

export function createTestClock(start = '2024-03-01T09:00:00.000Z'): TestClock {
  let current = Date.parse(start);
  return {
    now: () => new Date(current),
    advance(ms: number) {
      current += ms;
    },
  };
}

export interface TestServices extends Services {
  kv: MemoryStore;
  clock: TestClock;
}

export function createTestServices(
  replyGenerator: ReplyGenerator = new MockReplyGenerator(),
  kv: MemoryStore = new MemoryStore()
): TestServices {
  const clock = createTestClock();
  const services = createServices({
    kvStore: kv,
    replyGenerator,
    personaGenerator: new RuleBasedPersonaGenerator(clock.now),
    clock: clock.now,
  });
  return { ...services, kv, clock };
}
