// src/services/indexStore.ts
// What: Durable storage for the vector index in a directory.
// How: persistIndex writes `<dir>/index.json` to a uniquely named temp file in the same directory and renames
//      it over the previous file, so readers see either the old index or the new one. loadIndex validates
//      the self-describing manifest (format, version, dimension, model) with zod before rebuilding the
//      in-memory index from the stored entries.

import fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { IncompatibleIndexError, NotFoundError, ValidationError, errorMessage } from '../errors.js';
import { VectorIndex } from './vectorIndex.js';

export const INDEX_FILE = 'index.json';
export const INDEX_FORMAT = 'course-rag-index';
export const INDEX_FORMAT_VERSION = 1;

const headerSchema = z.object({
  format: z.string(),
  version: z.number(),
});

const metadataSchema = z.object({
  title: z.string(),
  url: z.string(),
  price: z.string(),
  instructor: z.string(),
});

const fileSchema = z.object({
  format: z.literal(INDEX_FORMAT),
  version: z.literal(INDEX_FORMAT_VERSION),
  buildId: z.string().min(1),
  createdAt: z.string(),
  model: z.string().min(1),
  dimension: z.number().int().nonnegative(),
  count: z.number().int().nonnegative(),
  sourceHash: z.string().optional(),
  entries: z.array(
    z.object({
      chunk: z.object({
        id: z.string(),
        text: z.string(),
        metadata: metadataSchema,
        sourceDocumentId: z.string(),
        index: z.number().int().nonnegative(),
      }),
      vector: z.array(z.number().finite()),
    }),
  ),
});

type IndexFile = z.infer<typeof fileSchema>;

export interface LoadExpectations {
  model?: string;
  dimension?: number;
}

export function indexFilePath(location: string): string {
  return path.join(location, INDEX_FILE);
}

export async function persistIndex(index: VectorIndex, location: string): Promise<string> {
  const { manifest } = index;
  const file: IndexFile = {
    format: INDEX_FORMAT,
    version: INDEX_FORMAT_VERSION,
    buildId: manifest.buildId,
    createdAt: manifest.createdAt,
    model: manifest.model,
    dimension: manifest.dimension,
    count: manifest.count,
    ...(manifest.sourceHash !== undefined ? { sourceHash: manifest.sourceHash } : {}),
    entries: index.toEntries(),
  };

  await fs.mkdir(location, { recursive: true });
  const target = indexFilePath(location);
  const tmp = path.join(location, `.${INDEX_FILE}.${uuidv4()}.tmp`);
  try {
    await fs.writeFile(tmp, JSON.stringify(file), 'utf8');
    await fs.rename(tmp, target);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw err;
  }
  return target;
}

export async function loadIndex(location: string, expect: LoadExpectations = {}): Promise<VectorIndex> {
  const target = indexFilePath(location);
  let raw: string;
  try {
    raw = await fs.readFile(target, 'utf8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new NotFoundError(`No index has been persisted at ${location}`);
    }
    throw err;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new IncompatibleIndexError(`Index file ${target} is not valid JSON: ${errorMessage(err)}`);
  }

  const header = headerSchema.safeParse(json);
  if (!header.success || header.data.format !== INDEX_FORMAT) {
    throw new IncompatibleIndexError(`Index file ${target} is not a ${INDEX_FORMAT} file`);
  }
  if (header.data.version !== INDEX_FORMAT_VERSION) {
    throw new IncompatibleIndexError(
      `Index format version ${header.data.version} is not supported (expected ${INDEX_FORMAT_VERSION})`,
    );
  }

  const parsed = fileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new IncompatibleIndexError(`Index file ${target} is malformed: ${issues}`, parsed.error.issues);
  }
  const file = parsed.data;

  if (file.entries.length !== file.count) {
    throw new IncompatibleIndexError(`Index declares ${file.count} entries but contains ${file.entries.length}`);
  }
  if (file.count > 0 && file.dimension === 0) {
    throw new IncompatibleIndexError(`Index declares ${file.count} entries with dimension 0`);
  }
  const badEntry = file.entries.findIndex((e) => e.vector.length !== file.dimension);
  if (badEntry !== -1) {
    throw new IncompatibleIndexError(
      `Entry ${badEntry} has dimension ${file.entries[badEntry].vector.length}; index declares ${file.dimension}`,
    );
  }
  if (expect.model !== undefined && expect.model !== file.model) {
    throw new IncompatibleIndexError(
      `Index was built with embedding model "${file.model}" but "${expect.model}" is configured`,
    );
  }
  // An empty index holds no vectors to compare, so any configured dimension can use it.
  if (expect.dimension !== undefined && file.count > 0 && expect.dimension !== file.dimension) {
    throw new IncompatibleIndexError(
      `Index dimension ${file.dimension} does not match the configured dimension ${expect.dimension}`,
    );
  }

  try {
    return VectorIndex.build(file.entries, {
      model: file.model,
      dimension: file.dimension,
      buildId: file.buildId,
      createdAt: file.createdAt,
      sourceHash: file.sourceHash,
    });
  } catch (err) {
    if (err instanceof ValidationError) {
      throw new IncompatibleIndexError(`Index file ${target} holds unusable entries: ${err.message}`, err.details);
    }
    throw err;
  }
}
