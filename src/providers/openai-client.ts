// ═══════════════════════════════════════════════════════════════════════════════
// OPENAI CLIENT — Shared SDK Instance
// ═══════════════════════════════════════════════════════════════════════════════

import OpenAI from 'openai';

import type { ModelConfig } from '../config/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// CLIENT SURFACE
// ─────────────────────────────────────────────────────────────────────────────────

export type ChatCompletionRequest = OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming;

export interface ChatCompletionResult {
  choices: Array<{ message: { content: string | null } }>;
}

/**
 * The part of the SDK the generators call. `OpenAI` satisfies it; tests pass
 * a plain object.
 */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(body: ChatCompletionRequest): PromiseLike<ChatCompletionResult>;
    };
  };
}

let openaiClient: OpenAI | null = null;

/**
 * Get or create the OpenAI client singleton. Returns null when no API key
 * is configured.
 */
export function getOpenAIClient(config: ModelConfig): OpenAI | null {
  if (!openaiClient && config.apiKey) {
    openaiClient = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      timeout: config.requestTimeoutMs,
      maxRetries: 1,
    });
  }
  return openaiClient;
}

export function resetOpenAIClient(): void {
  openaiClient = null;
}

/**
 * Strips a markdown code fence if the model wrapped its JSON in one.
 */
export function stripCodeFence(content: string): string {
  if (!content.includes('```')) return content.trim();
  const match = content.match(/```(?:json)?\s*([\s\S]*?)```/);
  return match?.[1]?.trim() ?? content.trim();
}
