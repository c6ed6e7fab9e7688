// src/routes/index.ts
// What: Root router composition.
// How: Exposes /health, mounts /search and /similar, provides POST /index/rebuild (kick + status) and
//      GET /index/status backed by the rebuild scheduler.

import { Router, type Request, type Response } from 'express';
import type { AppContext } from '../context.js';
import { createSearchRouter } from './search.js';
import { createSimilarRouter } from './similar.js';

export function createRouter(ctx: AppContext): Router {
  const router = Router();

  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', index_ready: ctx.handle.isReady() });
  });

  router.post('/index/rebuild', (_req: Request, res: Response) => {
    // The attempt records its own outcome in the scheduler status; poll /index/status for the result.
    void ctx.scheduler.trigger();
    res.status(202).json(ctx.scheduler.status());
  });

  router.get('/index/status', (_req: Request, res: Response) => {
    res.json(ctx.scheduler.status());
  });

  router.use('/search', createSearchRouter(ctx));
  router.use('/similar', createSimilarRouter(ctx));

  return router;
}
