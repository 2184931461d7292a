// ═══════════════════════════════════════════════════════════════════════════════
// STATS ROUTES — Persona Generation Counts
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';
import type { ChatService } from '../../services/chat-service.js';
import { asyncHandler } from '../middleware/error-handler.js';

export function createStatsRouter(chatService: ChatService): Router {
  const router = Router();

  router.get('/', asyncHandler(async (_req: Request, res: Response) => {
    const stats = await chatService.getPersonaStats();
    res.json({ stats });
  }));

  return router;
}
