import express, { type NextFunction, type Request, type Response, type Router } from 'express';
import type { SessionStore } from '@/memory/SessionStore';
import { HttpError } from '@/middleware/error.middleware';

/** Session inspection and teardown. Deleting an unknown session is not an error. */
export function createSessionsRouter(sessions: SessionStore): Router {
  const router = express.Router();

  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = await sessions.get(req.params.id);
      if (!session) {
        next(new HttpError(404, 'not_found', `Unknown session: ${req.params.id}`));
        return;
      }
      res.json({ sessionId: session.id, history: session.recent() });
    } catch (err) {
      next(err);
    }
  });

  router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await sessions.delete(req.params.id);
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  });

  return router;
}
