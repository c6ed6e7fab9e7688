// src/services/indexHandle.ts
// What: Reader-visible reference to the currently published vector index.
// How: Builds never mutate a published index; they construct a new one and publish() swaps the
//      reference in a single assignment, so concurrent readers see the old index or the new one.

import { NotInitializedError } from '../errors.js';
import type { VectorIndex } from './vectorIndex.js';

export class IndexHandle {
  private index: VectorIndex | null = null;

  publish(index: VectorIndex): void {
    this.index = index;
  }

  isReady(): boolean {
    return this.index !== null;
  }

  current(): VectorIndex {
    if (!this.index) {
      throw new NotInitializedError('No vector index has been loaded or built yet');
    }
    return this.index;
  }

  peek(): VectorIndex | null {
    return this.index;
  }
}
