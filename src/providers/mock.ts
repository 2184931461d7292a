// ═══════════════════════════════════════════════════════════════════════════════
// MOCK REPLY GENERATOR — Deterministic Replies for Development and Tests
// ═══════════════════════════════════════════════════════════════════════════════

import type { ReplyGenerator } from './types.js';
import type { ConversationContext } from '../core/context/builder.js';

export class MockReplyGenerator implements ReplyGenerator {
  readonly name = 'mock';
  readonly model = 'mock';

  async generateReply(context: ConversationContext, message: string): Promise<string> {
    const mood = context.liveState.currentMood;
    const remembered = context.insights[0];

    let reply = `I hear you. You said: "${message.trim()}".`;
    if (mood !== 'neutral') {
      reply += ` It sounds like you've been feeling ${mood} lately.`;
    }
    if (remembered) {
      reply += ` I remember: ${remembered.content}.`;
    }
    return `${reply} What would help most right now?`;
  }
}
