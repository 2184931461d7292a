// ═══════════════════════════════════════════════════════════════════════════════
// INSIGHT ROUTES — List and Delete Remembered Insights
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';
import type { ChatService } from '../../services/chat-service.js';
import { InsightParamSchema, InsightsQuerySchema, UserIdParamSchema } from '../schemas/index.js';
import { asyncHandler } from '../middleware/error-handler.js';

export function createInsightsRouter(chatService: ChatService): Router {
  const router = Router();

  router.get('/:userId', asyncHandler(async (req: Request, res: Response) => {
    const { userId } = UserIdParamSchema.parse(req.params);
    const { limit } = InsightsQuerySchema.parse(req.query);

    const { insights, stats } = await chatService.getInsights(userId, limit);

    res.json({ insights, stats, count: insights.length });
  }));

  router.delete('/:userId/:insightId', asyncHandler(async (req: Request, res: Response) => {
    const { userId, insightId } = InsightParamSchema.parse(req.params);
    await chatService.deleteInsight(userId, insightId);

    res.json({ deleted: true, insightId });
  }));

  return router;
}
