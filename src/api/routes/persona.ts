// ═══════════════════════════════════════════════════════════════════════════════
// PERSONA ROUTES — Quiz Submission, Profile Lookup, Live-State Updates
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';
import type { ChatService } from '../../services/chat-service.js';
import { parseQuizResponses } from '../../core/persona/analyzer.js';
import { GeneratePersonaSchema, UpdateStateSchema, UserIdParamSchema } from '../schemas/index.js';
import { asyncHandler, ValidationError } from '../middleware/error-handler.js';
import { getLogger } from '../../logging/index.js';

const logger = getLogger({ component: 'persona-api' });

export function createPersonaRouter(chatService: ChatService): Router {
  const router = Router();

  // ─── GENERATE PERSONA ───
  router.post('/generate', asyncHandler(async (req: Request, res: Response) => {
    const body = GeneratePersonaSchema.parse(req.body);

    const parsed = parseQuizResponses(body.quizData);
    if (!parsed.ok) {
      throw new ValidationError(parsed.error);
    }

    const persona = await chatService.generatePersona(body.userId, parsed.value);
    logger.info('Persona generated via API', { userId: body.userId });

    res.status(201).json({ persona });
  }));

  // ─── UPDATE LIVE STATE ───
  // Registered before /:userId so the literal path wins
  router.post('/update-state', asyncHandler(async (req: Request, res: Response) => {
    const body = UpdateStateSchema.parse(req.body);
    const liveState = await chatService.updateLiveState(body.userId, body.action);

    res.json({ liveState });
  }));

  // ─── GET PERSONA ───
  router.get('/:userId', asyncHandler(async (req: Request, res: Response) => {
    const { userId } = UserIdParamSchema.parse(req.params);
    const persona = await chatService.getPersona(userId);

    res.json({ persona });
  }));

  return router;
}
