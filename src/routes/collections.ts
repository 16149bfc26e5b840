import express, { type NextFunction, type Request, type Response, type Router } from 'express';
import { HttpError } from '@/middleware/error.middleware';
import type { EventAssistant } from '@/services/event-assistant';
import { isCuratedIntent } from '@/types/core';

export function createCollectionsRouter(assistant: EventAssistant): Router {
  const router = express.Router();

  router.get('/:tag', async (req: Request, res: Response, next: NextFunction) => {
    const { tag } = req.params;
    if (!isCuratedIntent(tag)) {
      next(new HttpError(404, 'not_found', `Unknown collection: ${tag}`));
      return;
    }
    try {
      const results = await assistant.getCuratedCollection(tag);
      res.json({ tag, results });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
