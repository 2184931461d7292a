// ═══════════════════════════════════════════════════════════════════════════════
// ROUTES INDEX — API Route Registration
// ═══════════════════════════════════════════════════════════════════════════════
//
// Usage:
//   const services = createServices();
//   app.use('/api', createApiRouter(services));
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Router } from 'express';
import type { Services } from '../../services/index.js';
import { createPersonaRouter } from './persona.js';
import { createChatRouter } from './chat.js';
import { createInsightsRouter } from './insights.js';
import { createCacheRouter } from './cache.js';
import { createStatsRouter } from './stats.js';

export { createPersonaRouter } from './persona.js';
export { createChatRouter } from './chat.js';
export { createInsightsRouter } from './insights.js';
export { createCacheRouter } from './cache.js';
export { createStatsRouter } from './stats.js';
export { createHealthRouter, checkStorage, type HealthCheck, type HealthRouterOptions } from './health.js';

export function createApiRouter(services: Services): Router {
  const router = Router();

  router.use('/persona', createPersonaRouter(services.chatService));
  router.use('/chat', createChatRouter(services.chatService));
  router.use('/insights', createInsightsRouter(services.chatService));
  router.use('/cache', createCacheRouter(services.chatService));
  router.use('/stats', createStatsRouter(services.chatService));

  return router;
}
