// ═══════════════════════════════════════════════════════════════════════════════
// PROVIDERS — Reply Generator Selection
// ═══════════════════════════════════════════════════════════════════════════════

import type { ModelConfig } from '../config/index.js';
import type { ReplyGenerator } from './types.js';
import { OpenAIReplyGenerator } from './openai.js';
import { MockReplyGenerator } from './mock.js';
import { UnconfiguredReplyGenerator } from './unconfigured.js';
import { getOpenAIClient } from './openai-client.js';
import { getLogger } from '../logging/index.js';

export type { ReplyGenerator } from './types.js';
export { OpenAIReplyGenerator, type OpenAIReplyOptions } from './openai.js';
export { MockReplyGenerator } from './mock.js';
export { UnconfiguredReplyGenerator } from './unconfigured.js';
export {
  getOpenAIClient,
  resetOpenAIClient,
  stripCodeFence,
  type ChatCompletionClient,
  type ChatCompletionRequest,
  type ChatCompletionResult,
} from './openai-client.js';

const logger = getLogger({ component: 'providers' });

export function createReplyGenerator(config: ModelConfig): ReplyGenerator {
  if (config.useMockProvider) {
    logger.warn('Using mock reply generator');
    return new MockReplyGenerator();
  }

  const client = config.apiKey ? getOpenAIClient(config) : null;
  if (!client) {
    logger.error('OPENAI_API_KEY is not set; chat replies will fail until it is configured');
    return new UnconfiguredReplyGenerator();
  }

  return new OpenAIReplyGenerator(client, {
    model: config.chatModel,
    temperature: config.temperature,
    maxTokens: config.maxTokens,
  });
}
