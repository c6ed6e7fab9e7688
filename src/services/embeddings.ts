// src/services/embeddings.ts
// What: Embedding provider contract and its OpenAI implementation, plus the shared OpenAI client factory.
// How: OpenAIEmbeddingProvider calls embeddings.create with OPENAI_EMBED_MODEL (and `dimensions` when
//      EMBED_DIMENSIONS is set), restores input order from each item's `index`, and checks that every
//      vector has the same (expected) length. Any failure surfaces as EmbeddingError; nothing is retried.

import OpenAI from 'openai';
import type { AppConfig } from '../config/env.js';
import { EmbeddingError, errorMessage } from '../errors.js';
import type { EmbeddingVector } from '../models/types.js';

export interface EmbeddingProvider {
  /** Identifies the model; persisted with the index and checked on load. */
  readonly model: string;
  embed(text: string): Promise<EmbeddingVector>;
  /** One vector per input, in input order. */
  embedBatch(texts: string[]): Promise<EmbeddingVector[]>;
}

// The subset of the OpenAI SDK used here; lets tests substitute an in-process client.
export interface EmbeddingsClient {
  embeddings: {
    create(params: {
      model: string;
      input: string | string[];
      dimensions?: number;
    }): Promise<{ data: { embedding: number[]; index: number }[] }>;
  };
}

export function createOpenAIClient(
  config: Pick<AppConfig, 'OPENAI_API_KEY' | 'OPENAI_TIMEOUT_MS'>,
): OpenAI {
  return new OpenAI({
    apiKey: config.OPENAI_API_KEY,
    timeout: config.OPENAI_TIMEOUT_MS,
    maxRetries: 0,
  });
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  private readonly dimensions?: number;

  constructor(
    private readonly client: EmbeddingsClient,
    options: { model: string; dimensions?: number },
  ) {
    this.model = options.model;
    this.dimensions = options.dimensions;
  }

  static fromConfig(
    config: Pick<AppConfig, 'OPENAI_API_KEY' | 'OPENAI_TIMEOUT_MS' | 'OPENAI_EMBED_MODEL' | 'EMBED_DIMENSIONS'>,
    client: EmbeddingsClient = createOpenAIClient(config),
  ): OpenAIEmbeddingProvider {
    return new OpenAIEmbeddingProvider(client, {
      model: config.OPENAI_EMBED_MODEL,
      dimensions: config.EMBED_DIMENSIONS,
    });
  }

  async embed(text: string): Promise<EmbeddingVector> {
    const [vec] = await this.embedBatch([text]);
    return vec;
  }

  async embedBatch(texts: string[]): Promise<EmbeddingVector[]> {
    if (texts.length === 0) return [];

    let data: { embedding: number[]; index: number }[];
    try {
      const res = await this.client.embeddings.create({
        model: this.model,
        input: texts,
        ...(this.dimensions !== undefined ? { dimensions: this.dimensions } : {}),
      });
      data = res.data;
    } catch (err) {
      throw new EmbeddingError(`Embedding request failed: ${errorMessage(err)}`, err);
    }

    if (data.length !== texts.length) {
      throw new EmbeddingError(`Unexpected embedding count; expected ${texts.length}, got ${data.length}`);
    }
    const vectors = [...data].sort((a, b) => a.index - b.index).map((d) => d.embedding);

    const expected = this.dimensions ?? vectors[0].length;
    for (const v of vectors) {
      if (v.length !== expected || v.length === 0) {
        throw new EmbeddingError(`Unexpected embedding size; expected ${expected}, got ${v.length}`);
      }
    }
    return vectors;
  }
}
