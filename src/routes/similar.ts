// src/routes/similar.ts
// What: POST /similar, the course metadata most similar to a piece of text.

import { Router, type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import type { AppContext } from '../context.js';
import { recordQuery } from '../db/queryLog.js';

const schema = z.object({
  text: z.string().min(1).max(2000),
  n: z.number().int().positive().max(50).optional().default(3),
});

export function createSimilarRouter(ctx: AppContext): Router {
  const router = Router();
  const logger = ctx.logger.child({ component: 'similar-route' });

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = schema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: { message: parsed.error.message, code: 'VALIDATION_ERROR' } });
        return;
      }
      const { text, n } = parsed.data;

      const matches = await ctx.similar.findSimilar(text, n);
      await recordQuery(
        ctx.queryLog,
        { kind: 'similar', queryText: text, topK: n, outcome: 'ok', matchCount: matches.length },
        logger,
      );
      res.json({ matches });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
