// ═══════════════════════════════════════════════════════════════════════════════
// CHAT ROUTES — Send Message, Read and Clear History
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';
import type { ChatService } from '../../services/chat-service.js';
import { HistoryQuerySchema, SendMessageSchema, UserIdParamSchema } from '../schemas/index.js';
import { asyncHandler } from '../middleware/error-handler.js';

export function createChatRouter(chatService: ChatService): Router {
  const router = Router();

  // ─── SEND MESSAGE ───
  router.post('/', asyncHandler(async (req: Request, res: Response) => {
    const body = SendMessageSchema.parse(req.body);

    const result = await chatService.sendMessage(body.userId, body.message, {
      mood: body.mood,
      includeHistory: body.includeHistory,
    });

    res.json(result);
  }));

  // ─── HISTORY ───
  router.get('/:userId/history', asyncHandler(async (req: Request, res: Response) => {
    const { userId } = UserIdParamSchema.parse(req.params);
    const { limit } = HistoryQuerySchema.parse(req.query);

    const page = await chatService.getHistory(userId, limit);

    res.json({ ...page, count: page.messages.length, limit });
  }));

  router.delete('/:userId/history', asyncHandler(async (req: Request, res: Response) => {
    const { userId } = UserIdParamSchema.parse(req.params);
    const removed = await chatService.clearHistory(userId);

    res.json({ cleared: true, removed });
  }));

  return router;
}
