// src/services/similar.ts
// What: Standalone similar-course lookup.
// How: Embeds the text, takes the top-n hits from the published index and returns each hit's course
//      metadata verbatim, in search order. No domain gate and no generation; errors propagate.

import type { Logger } from '../logging.js';
import type { CourseMetadata } from '../models/types.js';
import type { EmbeddingProvider } from './embeddings.js';
import type { IndexHandle } from './indexHandle.js';

export interface SimilarCoursesDeps {
  handle: IndexHandle;
  embedder: EmbeddingProvider;
  logger: Logger;
}

export class SimilarCoursesFinder {
  private readonly logger: Logger;

  constructor(private readonly deps: SimilarCoursesDeps) {
    this.logger = deps.logger.child({ component: 'similar-courses' });
  }

  async findSimilar(text: string, n = 3): Promise<CourseMetadata[]> {
    const index = this.deps.handle.current();
    this.logger.info({ text, n }, 'Finding similar courses');

    const vector = await this.deps.embedder.embed(text);
    return index.search(vector, n).map(({ chunk }) => ({
      title: chunk.metadata.title,
      url: chunk.metadata.url,
      price: chunk.metadata.price,
      instructor: chunk.metadata.instructor,
    }));
  }
}
