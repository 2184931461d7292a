// ═══════════════════════════════════════════════════════════════════════════════
// CACHE ROUTES — History Cache Diagnostics
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';
import type { ChatService } from '../../services/chat-service.js';

export function createCacheRouter(chatService: ChatService): Router {
  const router = Router();

  router.get('/stats', (_req: Request, res: Response) => {
    const stats = chatService.getCacheStats();
    const lookups = stats.hits + stats.misses;

    res.json({
      ...stats,
      hitRate: lookups === 0 ? 0 : Math.round((stats.hits / lookups) * 1000) / 1000,
    });
  });

  return router;
}
