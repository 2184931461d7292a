// ═══════════════════════════════════════════════════════════════════════════════
// OPENAI REPLY GENERATOR — Chat Completions with Composed Context
// ═══════════════════════════════════════════════════════════════════════════════

import type OpenAI from 'openai';

import type { ReplyGenerator } from './types.js';
import type { ChatCompletionClient } from './openai-client.js';
import { formatContextForPrompt, type ConversationContext } from '../core/context/builder.js';
import { GenerationFailureError } from '../core/errors.js';
import { getLogger } from '../logging/index.js';

const logger = getLogger({ component: 'openai-reply' });

type ChatCompletionMessageParam = OpenAI.Chat.Completions.ChatCompletionMessageParam;

const COMPANION_PREAMBLE = `You are a calm, gentle, and deeply empathetic mental wellness companion for college students.

- Validate emotions before offering suggestions
- Use soft, non-pressuring language; avoid exclamation marks
- Reference recent stressors, coping successes and past moments gently when relevant
- Be extra gentle if the user is anxious, stressed or sad
- If the user mentions crisis or self-harm, respond with care and encourage them to reach out to crisis resources`;

export interface OpenAIReplyOptions {
  model: string;
  temperature: number;
  maxTokens: number;
}

export class OpenAIReplyGenerator implements ReplyGenerator {
  readonly name = 'openai';
  readonly model: string;

  constructor(
    private readonly client: ChatCompletionClient,
    private readonly options: OpenAIReplyOptions
  ) {
    this.model = options.model;
  }

  async generateReply(context: ConversationContext, message: string): Promise<string> {
    const systemPrompt = `${COMPANION_PREAMBLE}\n\n${formatContextForPrompt(context, { includeHistory: false })}`;

    const messages: ChatCompletionMessageParam[] = [
      { role: 'system', content: systemPrompt },
      ...context.recentHistory.map((m): ChatCompletionMessageParam =>
        m.role === 'user'
          ? { role: 'user', content: m.content }
          : { role: 'assistant', content: m.content }
      ),
      { role: 'user', content: message },
    ];

    let content: string;
    try {
      const response = await this.client.chat.completions.create({
        model: this.options.model,
        messages,
        temperature: this.options.temperature,
        max_tokens: this.options.maxTokens,
      });
      content = response.choices[0]?.message?.content?.trim() ?? '';
    } catch (error) {
      logger.error('Reply generation failed', error, { model: this.options.model });
      throw new GenerationFailureError('reply model request failed', error);
    }

    if (!content) {
      throw new GenerationFailureError('reply model returned no content');
    }

    return content;
  }
}
