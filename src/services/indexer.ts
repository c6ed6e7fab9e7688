// src/services/indexer.ts
// What: Orchestrates load → validate/dedupe → normalize → chunk → embed → build → persist → publish.
// How: Chunks are embedded in batches of EMBED_BATCH_SIZE dispatched through p-limit; each batch keeps its
//      chunks beside its vectors, so completion order does not matter. The new index is written with an
//      atomic file replace and only then published to readers. Any failure aborts the whole build and
//      leaves both the persisted and the published index untouched.

import { randomBytes } from 'crypto';
import pLimit from 'p-limit';
import { EmbeddingError, NotFoundError } from '../errors.js';
import type { Logger } from '../logging.js';
import type { Chunk, IndexEntry } from '../models/types.js';
import { chunkDocuments, type ChunkOptions } from './chunking.js';
import { prepareRecords, type CourseSource, type PrepareOptions } from './courseSource.js';
import type { EmbeddingProvider } from './embeddings.js';
import type { IndexHandle } from './indexHandle.js';
import { loadIndex, persistIndex } from './indexStore.js';
import { normalize } from './normalizer.js';
import { VectorIndex } from './vectorIndex.js';

export interface IndexBuildDeps {
  source: CourseSource;
  embedder: EmbeddingProvider;
  handle: IndexHandle;
  location: string;
  chunking: ChunkOptions;
  records: PrepareOptions;
  batchSize: number;
  concurrency: number;
  logger: Logger;
}

export interface BuildReport {
  buildId: string;
  source: string;
  sourceHash: string;
  recordsRead: number;
  recordsIndexed: number;
  skippedInvalid: number;
  duplicatesDropped: number;
  chunks: number;
  dimension: number;
  location: string;
  durationMs: number;
}

export async function buildIndex(deps: IndexBuildDeps, buildId: string = newBuildId()): Promise<BuildReport> {
  const start = Date.now();
  const logger = deps.logger.child({ component: 'indexer', buildId });

  const snapshot = await deps.source.load();
  logger.info({ source: deps.source.describe(), records: snapshot.records.length }, 'Loaded course data');

  const prepared = prepareRecords(snapshot.records, deps.records, logger);
  const documents = prepared.records.map((record) => normalize(record));
  const chunks = chunkDocuments(documents, deps.chunking);
  logger.info({ documents: documents.length, chunks: chunks.length }, 'Split documents into chunks');

  const entries = await embedChunks(chunks, deps);
  const index = VectorIndex.build(entries, {
    model: deps.embedder.model,
    sourceHash: snapshot.contentHash,
    buildId,
  });

  const file = await persistIndex(index, deps.location);
  deps.handle.publish(index);
  logger.info({ file, entries: index.size, dimension: index.dimension }, 'Vector index built and persisted');

  return {
    buildId,
    source: deps.source.describe(),
    sourceHash: snapshot.contentHash,
    recordsRead: snapshot.records.length,
    recordsIndexed: prepared.records.length,
    skippedInvalid: prepared.skippedInvalid,
    duplicatesDropped: prepared.duplicatesDropped,
    chunks: chunks.length,
    dimension: index.dimension,
    location: deps.location,
    durationMs: Date.now() - start,
  };
}

async function embedChunks(
  chunks: Chunk[],
  deps: Pick<IndexBuildDeps, 'embedder' | 'batchSize' | 'concurrency'>,
): Promise<IndexEntry[]> {
  const limit = pLimit(deps.concurrency);
  const batches: Chunk[][] = [];
  for (let offset = 0; offset < chunks.length; offset += deps.batchSize) {
    batches.push(chunks.slice(offset, offset + deps.batchSize));
  }

  const embedded = await Promise.all(
    batches.map((batch) =>
      limit(async () => {
        const vectors = await deps.embedder.embedBatch(batch.map((c) => c.text));
        if (vectors.length !== batch.length) {
          throw new EmbeddingError(`Embedding provider returned ${vectors.length} vectors for ${batch.length} chunks`);
        }
        return batch.map((chunk, i) => ({ chunk, vector: vectors[i] }));
      }),
    ),
  );
  return embedded.flat();
}

/**
 * Publishes the persisted index at `location` if there is one.
 * Returns false when nothing has been persisted yet; any other load failure propagates.
 */
export async function restoreIndex(
  handle: IndexHandle,
  location: string,
  expect: { model: string; dimension?: number },
  logger: Logger,
): Promise<boolean> {
  try {
    const index = await loadIndex(location, expect);
    handle.publish(index);
    logger.info({ location, ...index.manifest }, 'Loaded persisted vector index');
    return true;
  } catch (err) {
    if (err instanceof NotFoundError) {
      logger.warn({ location }, 'No persisted vector index found');
      return false;
    }
    throw err;
  }
}

// Build ids double as correlation ids in logs.
export function newBuildId(): string {
  const ts = new Date().toISOString().replace(/[:.]/g, '');
  const rand = randomBytes(4).toString('hex');
  return `${ts}-${rand}`;
}
