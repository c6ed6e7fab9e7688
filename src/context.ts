// src/context.ts
// What: Composition root for the query pipeline.
// How: Builds every service from an AppConfig and a logger and returns them as one explicitly passed
//      context object. Missing credentials fail here, at setup, through loadConfig/ConfigError.
//      Tests assemble the same shape with in-process fakes via createContext's overrides.

import type { Pool } from 'pg';
import type { AppConfig } from './config/env.js';
import { createPool } from './db/pool.js';
import { PgQueryLogRepository, type QueryLogRepository } from './db/queryLog.js';
import type { Logger } from './logging.js';
import { CourseAnswerer } from './services/answerer.js';
import { JsonFileCourseSource, type CourseSource } from './services/courseSource.js';
import { OpenAIEmbeddingProvider, createOpenAIClient, type EmbeddingProvider } from './services/embeddings.js';
import { OpenAIAnswerGenerator, type AnswerGenerator } from './services/generation.js';
import { IndexHandle } from './services/indexHandle.js';
import type { IndexBuildDeps } from './services/indexer.js';
import { IndexRebuildScheduler } from './services/rebuildScheduler.js';
import { SimilarCoursesFinder } from './services/similar.js';

export interface AppContext {
  config: AppConfig;
  logger: Logger;
  handle: IndexHandle;
  embedder: EmbeddingProvider;
  buildDeps: IndexBuildDeps;
  answerer: CourseAnswerer;
  similar: SimilarCoursesFinder;
  scheduler: IndexRebuildScheduler;
  queryLog?: QueryLogRepository;
  pool?: Pool;
}

export interface ContextOverrides {
  embedder?: EmbeddingProvider;
  generator?: AnswerGenerator;
  source?: CourseSource;
  queryLog?: QueryLogRepository;
}

export function createBuildDeps(
  config: AppConfig,
  logger: Logger,
  handle: IndexHandle,
  embedder: EmbeddingProvider,
  source: CourseSource = new JsonFileCourseSource(config.COURSES_FILE),
): IndexBuildDeps {
  return {
    source,
    embedder,
    handle,
    location: config.INDEX_DIR,
    chunking: { maxSize: config.CHUNK_SIZE, overlap: config.CHUNK_OVERLAP },
    records: { dedupe: config.DEDUPE_POLICY, invalidRecords: config.INVALID_RECORD_POLICY },
    batchSize: config.EMBED_BATCH_SIZE,
    concurrency: config.EMBED_CONCURRENCY,
    logger,
  };
}

export function createContext(config: AppConfig, logger: Logger, overrides: ContextOverrides = {}): AppContext {
  const handle = new IndexHandle();
  const openai = createOpenAIClient(config);

  const embedder = overrides.embedder ?? OpenAIEmbeddingProvider.fromConfig(config, openai);
  const generator = overrides.generator ?? OpenAIAnswerGenerator.fromConfig(config, openai);

  let pool: Pool | undefined;
  let queryLog = overrides.queryLog;
  if (!queryLog && config.DATABASE_URL) {
    pool = createPool(config.DATABASE_URL);
    queryLog = new PgQueryLogRepository(pool);
  }

  const buildDeps = createBuildDeps(config, logger, handle, embedder, overrides.source);
  return {
    config,
    logger,
    handle,
    embedder,
    buildDeps,
    answerer: new CourseAnswerer({ handle, embedder, generator, logger, topK: config.TOP_K }),
    similar: new SimilarCoursesFinder({ handle, embedder, logger }),
    scheduler: new IndexRebuildScheduler(buildDeps, config.REBUILD_INTERVAL_MS),
    queryLog,
    pool,
  };
}
