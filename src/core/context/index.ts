// ═══════════════════════════════════════════════════════════════════════════════
// CONTEXT MODULE — Conversation Context Assembly
// ═══════════════════════════════════════════════════════════════════════════════

export {
  ContextComposer,
  formatContextForPrompt,
  type ConversationContext,
  type ContextBuildOptions,
  type FormatOptions,
} from './builder.js';
