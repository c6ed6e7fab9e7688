// src/services/answerer.ts
// What: Retrieval-augmented answering for a single query, and its presentation shape.
// How: Reject (keyword gate) → Retrieve (embed, top-k search) → Synthesize (one grounded generation call)
//      → Respond. Failures while retrieving or synthesizing are logged and turned into a fixed apology with
//      no matches, so callers always get a well-formed result. Asking before an index is published is a
//      contract violation and throws NotInitializedError.

import type { Logger } from '../logging.js';
import type { CourseMetadata, QueryResult, SearchResponse } from '../models/types.js';
import { isInDomain } from './classifier.js';
import type { EmbeddingProvider } from './embeddings.js';
import type { AnswerGenerator } from './generation.js';
import type { IndexHandle } from './indexHandle.js';

export const REJECTION_MESSAGE = 'Please enter a query related to courses.';
export const ERROR_MESSAGE = 'An error occurred while processing your query.';
export const DEFAULT_TOP_K = 3;

export type AnswerOutcome = 'answered' | 'rejected' | 'failed';

export interface AnswererDeps {
  handle: IndexHandle;
  embedder: EmbeddingProvider;
  generator: AnswerGenerator;
  logger: Logger;
  topK?: number;
}

export class CourseAnswerer {
  private readonly topK: number;
  private readonly logger: Logger;

  constructor(private readonly deps: AnswererDeps) {
    this.topK = deps.topK ?? DEFAULT_TOP_K;
    this.logger = deps.logger.child({ component: 'answerer' });
  }

  async answer(query: string): Promise<QueryResult> {
    const { result } = await this.answerWithOutcome(query);
    return result;
  }

  /** The query interface: answer, in the presentation shape. */
  async searchCourses(query: string): Promise<SearchResponse> {
    return toSearchResponse(await this.answer(query));
  }

  async answerWithOutcome(query: string): Promise<{ result: QueryResult; outcome: AnswerOutcome }> {
    const index = this.deps.handle.current();

    if (!isInDomain(query)) {
      this.logger.info({ query }, 'Query rejected as out of domain');
      return { result: { answer: REJECTION_MESSAGE, matches: [] }, outcome: 'rejected' };
    }

    try {
      const queryVector = await this.deps.embedder.embed(query);
      const hits = index.search(queryVector, this.topK);
      this.logger.debug({ query, hits: hits.map((h) => ({ id: h.chunk.id, score: h.score })) }, 'Retrieved chunks');

      const answer = await this.deps.generator.generate(
        query,
        hits.map((h) => h.chunk.text),
      );
      const matches: CourseMetadata[] = hits.map((h) => ({ ...h.chunk.metadata }));
      return { result: { answer, matches }, outcome: 'answered' };
    } catch (err) {
      this.logger.error({ err, query }, 'Error during search');
      return { result: { answer: ERROR_MESSAGE, matches: [] }, outcome: 'failed' };
    }
  }
}

export function toSearchResponse(result: QueryResult): SearchResponse {
  return {
    'Search Result': result.answer,
    'Similar Courses': result.matches,
  };
}
