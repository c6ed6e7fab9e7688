// scripts/build-index.ts
// What: Offline index build.
// How: Loads .env and configuration, then runs the full build (load → normalize → chunk → embed → persist)
//      against COURSES_FILE, replacing the index at INDEX_DIR. Exits non-zero on any build error, including
//      invalid records under INVALID_RECORD_POLICY=fail.

import 'dotenv/config';
import { loadConfig } from '../src/config/env.js';
import { createBuildDeps } from '../src/context.js';
import { createLogger } from '../src/logging.js';
import { OpenAIEmbeddingProvider } from '../src/services/embeddings.js';
import { IndexHandle } from '../src/services/indexHandle.js';
import { buildIndex } from '../src/services/indexer.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config);
  const deps = createBuildDeps(config, logger, new IndexHandle(), OpenAIEmbeddingProvider.fromConfig(config));

  const report = await buildIndex(deps);
  logger.info({ report }, 'Index build complete');
}

main().catch((err: unknown) => {
  console.error('[build-index] Index build failed:', err);
  process.exit(1);
});
