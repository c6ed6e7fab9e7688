// src/services/vectorIndex.ts
// What: Immutable in-memory vector index with exact k-nearest-neighbour search.
// How: build() validates and deep-freezes the entries, precomputing vector norms. search() scores every
//      entry by cosine similarity and sorts by descending score, breaking ties by insertion position,
//      so identical inputs always give identical result order. Rebuilding is the only update path.

import { v4 as uuidv4 } from 'uuid';
import { IncompatibleIndexError, ValidationError } from '../errors.js';
import type { Chunk, EmbeddingVector, IndexEntry, SearchHit } from '../models/types.js';
import { cosineWithNorms, norm } from '../util/vector.js';

export interface IndexManifest {
  buildId: string;
  createdAt: string; // ISO
  model: string;
  dimension: number;
  count: number;
  sourceHash?: string;
}

export interface BuildOptions {
  model: string;
  sourceHash?: string;
  /** Dimension to record when there are no entries to infer it from. */
  dimension?: number;
  buildId?: string;
  createdAt?: string;
}

interface StoredEntry {
  readonly vector: readonly number[];
  readonly norm: number;
  readonly chunk: Chunk;
}

function freezeChunk(chunk: Chunk): Chunk {
  return Object.freeze({
    id: chunk.id,
    text: chunk.text,
    metadata: Object.freeze({ ...chunk.metadata }),
    sourceDocumentId: chunk.sourceDocumentId,
    index: chunk.index,
  });
}

export class VectorIndex {
  private constructor(
    readonly manifest: Readonly<IndexManifest>,
    private readonly entries: readonly StoredEntry[],
  ) {}

  /**
   * Bulk-constructs an index. Either every entry is accepted or a ValidationError is thrown;
   * no partially built index is ever returned.
   */
  static build(entries: IndexEntry[], options: BuildOptions): VectorIndex {
    const dimension = entries.length > 0 ? entries[0].vector.length : (options.dimension ?? 0);
    if (entries.length > 0 && options.dimension !== undefined && options.dimension !== dimension) {
      throw new ValidationError(`Vector dimension ${dimension} does not match expected ${options.dimension}`);
    }

    const stored: StoredEntry[] = entries.map((entry, position) => {
      const { vector, chunk } = entry;
      if (vector.length === 0 || vector.length !== dimension) {
        throw new ValidationError(
          `Entry ${position} (${chunk.id}) has dimension ${vector.length}; expected ${dimension}`,
        );
      }
      if (!vector.every((x) => Number.isFinite(x))) {
        throw new ValidationError(`Entry ${position} (${chunk.id}) contains non-finite values`);
      }
      const copy = Object.freeze([...vector]);
      return Object.freeze({ vector: copy, norm: norm(copy), chunk: freezeChunk(chunk) });
    });

    const manifest: IndexManifest = {
      buildId: options.buildId ?? uuidv4(),
      createdAt: options.createdAt ?? new Date().toISOString(),
      model: options.model,
      dimension,
      count: stored.length,
      ...(options.sourceHash !== undefined ? { sourceHash: options.sourceHash } : {}),
    };
    return new VectorIndex(Object.freeze(manifest), Object.freeze(stored));
  }

  get size(): number {
    return this.entries.length;
  }

  get dimension(): number {
    return this.manifest.dimension;
  }

  /** Entries in insertion order, for persistence. */
  toEntries(): IndexEntry[] {
    return this.entries.map((e) => ({ vector: [...e.vector], chunk: e.chunk }));
  }

  search(queryVector: EmbeddingVector, k: number): SearchHit[] {
    if (this.entries.length === 0 || k <= 0) return [];
    if (queryVector.length !== this.dimension) {
      throw new IncompatibleIndexError(
        `Query vector has dimension ${queryVector.length}; index dimension is ${this.dimension}`,
      );
    }

    const qNorm = norm(queryVector);
    const scored = this.entries.map((e, position) => ({
      position,
      chunk: e.chunk,
      score: cosineWithNorms(queryVector, qNorm, e.vector, e.norm),
    }));
    scored.sort((a, b) => b.score - a.score || a.position - b.position);

    return scored.slice(0, Math.floor(k)).map(({ chunk, score }) => ({ chunk, score }));
  }
}
