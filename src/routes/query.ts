import express, { type NextFunction, type Request, type Response, type Router } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { ConversationSession } from '@/memory/sessionMemory';
import type { SessionStore } from '@/memory/SessionStore';
import type { EventAssistant } from '@/services/event-assistant';
import { QueryCancelledError } from '@/utils/errors';
import { logger } from '@/utils/logger';
import { correlationIdOf } from '@/middleware/correlation';

export interface QueryRouteDeps {
  assistant: EventAssistant;
  sessions: SessionStore;
  historyLimit: number;
}

export const QueryBody = z.object({
  query: z.string().trim().min(1, 'query is required').max(1000),
  sessionId: z.string().trim().min(1).max(128).optional(),
});

function resolveSession(deps: QueryRouteDeps, sessionId?: string): Promise<ConversationSession> {
  return deps.sessions.getOrCreate(sessionId ?? uuidv4(), (id) => new ConversationSession(id, deps.historyLimit));
}

export function createQueryRouter(deps: QueryRouteDeps): Router {
  const router = express.Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = QueryBody.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({
        success: false,
        message: parsed.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; '),
        code: 'invalid_request',
      });
      return;
    }

    // A client that disconnects cancels its in-flight query.
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) controller.abort();
    });

    try {
      const session = await resolveSession(deps, parsed.data.sessionId);
      const { intent, answer, results } = await deps.assistant.answerQuery(parsed.data.query, session, {
        signal: controller.signal,
      });
      // The query may have outlived part of the TTL window.
      await deps.sessions.refreshTTL(session.id);
      res.json({ sessionId: session.id, intent, answer, results });
    } catch (err) {
      if (err instanceof QueryCancelledError) {
        logger.info('query:cancelled', { correlationId: correlationIdOf(res) });
        return;
      }
      next(err);
    }
  });

  return router;
}
