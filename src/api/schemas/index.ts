// ═══════════════════════════════════════════════════════════════════════════════
// SCHEMAS INDEX — API Request Validation Schemas
// ═══════════════════════════════════════════════════════════════════════════════

export {
  IdSchema,
  UserIdSchema,
  UserIdParamSchema,
  InsightParamSchema,
  MoodSchema,
  createLimitSchema,
  type UserIdParam,
  type InsightParam,
} from './common.js';

export {
  GeneratePersonaSchema,
  LiveStateActionSchema,
  UpdateStateSchema,
  type GeneratePersonaRequest,
  type UpdateStateRequest,
} from './persona.js';

export {
  MAX_MESSAGE_LENGTH,
  SendMessageSchema,
  HistoryQuerySchema,
  InsightsQuerySchema,
  type SendMessageRequest,
  type HistoryQuery,
  type InsightsQuery,
} from './chat.js';
