// ═══════════════════════════════════════════════════════════════════════════════
// UNCONFIGURED REPLY GENERATOR — Stands In When No Model Is Available
// ═══════════════════════════════════════════════════════════════════════════════

import type { ReplyGenerator } from './types.js';
import { GenerationFailureError } from '../core/errors.js';

/**
 * Rejects every turn. Selected when no API key is set and the mock provider
 * was not asked for, so nothing canned is returned as a real reply.
 */
export class UnconfiguredReplyGenerator implements ReplyGenerator {
  readonly name = 'unconfigured';
  readonly model = 'none';

  async generateReply(): Promise<string> {
    throw new GenerationFailureError('reply model not configured');
  }
}
