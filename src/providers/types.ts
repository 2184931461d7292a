// ═══════════════════════════════════════════════════════════════════════════════
// PROVIDER TYPES — Reply Generation Contract
// ═══════════════════════════════════════════════════════════════════════════════

import type { ConversationContext } from '../core/context/builder.js';

export interface ReplyGenerator {
  readonly name: string;
  /** Model identifier recorded on assistant messages */
  readonly model: string;

  /**
   * Produces the assistant reply. Rejects with GenerationFailureError when
   * the provider fails or returns nothing usable.
   */
  generateReply(context: ConversationContext, message: string): Promise<string>;
}
