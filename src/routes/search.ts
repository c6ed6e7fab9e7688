// src/routes/search.ts
// What: POST /search, the presentation layer's single query call.
// How: Validates input with zod, runs the retrieval-augmented answerer and responds with
//      { "Search Result", "Similar Courses" }. Provider failures are already contained by the answerer;
//      an unpublished index reaches the error handler as NotInitializedError (503).

import { Router, type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import type { AppContext } from '../context.js';
import { recordQuery } from '../db/queryLog.js';
import { toSearchResponse } from '../services/answerer.js';

const schema = z.object({
  // Cap query length to avoid oversized embedding requests
  query: z.string().min(1).max(2000),
});

export function createSearchRouter(ctx: AppContext): Router {
  const router = Router();
  const logger = ctx.logger.child({ component: 'search-route' });

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = schema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: { message: parsed.error.message, code: 'VALIDATION_ERROR' } });
        return;
      }
      const { query } = parsed.data;

      const { result, outcome } = await ctx.answerer.answerWithOutcome(query);
      await recordQuery(
        ctx.queryLog,
        { kind: 'answer', queryText: query, topK: ctx.config.TOP_K, outcome, matchCount: result.matches.length },
        logger,
      );
      res.json(toSearchResponse(result));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
