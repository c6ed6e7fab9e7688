import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { NotInitializedError } from '../src/errors.js';
import { silentLogger } from '../src/logging.js';
import { IndexHandle } from '../src/services/indexHandle.js';
import { buildIndex } from '../src/services/indexer.js';
import { SimilarCoursesFinder } from '../src/services/similar.js';
import { DEEP_LEARNING_COURSE, HashingEmbedder, InMemoryCourseSource, PYTHON_COURSE } from './fakes.js';

describe('SimilarCoursesFinder', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'course-similar-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function buildFinder() {
    const handle = new IndexHandle();
    const embedder = new HashingEmbedder();
    await buildIndex({
      source: new InMemoryCourseSource([PYTHON_COURSE, DEEP_LEARNING_COURSE]),
      embedder,
      handle,
      location: dir,
      chunking: { maxSize: 500, overlap: 50 },
      records: { dedupe: 'keep-first', invalidRecords: 'fail' },
      batchSize: 8,
      concurrency: 2,
      logger: silentLogger(),
    });
    return new SimilarCoursesFinder({ handle, embedder, logger: silentLogger() });
  }

  it('finds the course whose title matches the text', async () => {
    const finder = await buildFinder();

    expect(await finder.findSimilar('Python for Data Science', 1)).toEqual([
      {
        title: 'Python for Data Science',
        url: 'https://courses.example.com/python-data-science',
        price: 'Free',
        instructor: 'Ada Lovelace',
      },
    ]);
  });

  it('orders results by similarity and defaults to three', async () => {
    const finder = await buildFinder();

    const titles = (await finder.findSimilar('Deep Learning Fundamentals')).map((c) => c.title);
    expect(titles).toEqual(['Deep Learning Fundamentals', 'Python for Data Science']);
  });

  it('does not apply the domain gate', async () => {
    const finder = await buildFinder();
    expect(await finder.findSimilar("what's for lunch", 2)).toHaveLength(2);
  });

  it('throws NotInitializedError before an index is published', async () => {
    const finder = new SimilarCoursesFinder({
      handle: new IndexHandle(),
      embedder: new HashingEmbedder(),
      logger: silentLogger(),
    });
    await expect(finder.findSimilar('Python')).rejects.toBeInstanceOf(NotInitializedError);
  });
});
