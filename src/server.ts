// src/server.ts
// What: HTTP server entrypoint.
// How: Loads .env, validates configuration (failing fast on missing credentials), builds the context,
//      restores the persisted index, kicks a rebuild check (builds when there is no index or the course
//      data changed), starts the rebuild scheduler and listens on the configured port.

import 'dotenv/config';
import { createApp } from './app.js';
import { loadConfig } from './config/env.js';
import { createContext } from './context.js';
import { IncompatibleIndexError } from './errors.js';
import { createLogger } from './logging.js';
import { restoreIndex } from './services/indexer.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config);
  const ctx = createContext(config, logger);

  try {
    await restoreIndex(
      ctx.handle,
      config.INDEX_DIR,
      { model: ctx.embedder.model, dimension: config.EMBED_DIMENSIONS },
      logger,
    );
  } catch (err) {
    if (!(err instanceof IncompatibleIndexError)) throw err;
    logger.error({ err }, 'Persisted index is incompatible with the current configuration; it will be rebuilt');
  }

  ctx.scheduler.start();
  void ctx.scheduler.tick();

  const app = createApp(ctx);
  const server = app.listen(config.PORT, () => {
    logger.info({ port: config.PORT }, 'Server listening');
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    ctx.scheduler.stop();
    server.close(() => {
      if (!ctx.pool) return;
      ctx.pool.end().catch((err: unknown) => logger.error({ err }, 'Failed to close database pool'));
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  // The logger may not exist yet (configuration errors), so report on stderr.
  console.error(err);
  process.exit(1);
});
