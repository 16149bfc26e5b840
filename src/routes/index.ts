/** Route aggregator. */
import express, { type Router } from 'express';
import { createCollectionsRouter } from './collections';
import { createQueryRouter, type QueryRouteDeps } from './query';
import { createSessionsRouter } from './sessions';

export function createApiRouter(deps: QueryRouteDeps): Router {
  const router = express.Router();
  router.use('/query', createQueryRouter(deps));
  router.use('/collections', createCollectionsRouter(deps.assistant));
  router.use('/sessions', createSessionsRouter(deps.sessions));
  return router;
}
