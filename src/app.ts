// src/app.ts
// What: Express application factory.
// How: JSON body limit, mounts routes, and a centralized error handler returning
//      { error: { message, code? } } with the error's HTTP status.

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import type { AppContext } from './context.js';
import { CourseSearchError } from './errors.js';
import { createRouter } from './routes/index.js';

function statusOf(err: unknown): number {
  if (err instanceof CourseSearchError) return err.status;
  // body-parser attaches a status to malformed JSON and oversized bodies
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return 500;
}

export function createApp(ctx: AppContext): Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(express.json({ limit: '1mb' }));

  app.use('/', createRouter(ctx));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(err);
    const code = err instanceof CourseSearchError ? err.code : undefined;
    const message = err instanceof Error ? err.message : 'Internal Server Error';
    if (status >= 500) {
      ctx.logger.error({ err, status, code }, 'Unhandled error');
    } else {
      ctx.logger.warn({ err, status, code }, 'Request failed');
    }
    res.status(status).json({ error: { message, code } });
  });

  return app;
}
