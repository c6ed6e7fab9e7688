import { describe, expect, it } from 'vitest';
import { GenerationError, NotInitializedError } from '../src/errors.js';
import { silentLogger } from '../src/logging.js';
import type { IndexEntry } from '../src/models/types.js';
import { CourseAnswerer, ERROR_MESSAGE, REJECTION_MESSAGE, toSearchResponse } from '../src/services/answerer.js';
import { chunkDocuments } from '../src/services/chunking.js';
import { IndexHandle } from '../src/services/indexHandle.js';
import { normalize } from '../src/services/normalizer.js';
import { VectorIndex } from '../src/services/vectorIndex.js';
import { DEEP_LEARNING_COURSE, FakeGenerator, HashingEmbedder, PYTHON_COURSE, hashingVector } from './fakes.js';

function setup(options: { publish?: boolean } = {}) {
  const handle = new IndexHandle();
  if (options.publish ?? true) {
    const chunks = chunkDocuments([normalize(PYTHON_COURSE), normalize(DEEP_LEARNING_COURSE)]);
    const entries: IndexEntry[] = chunks.map((chunk) => ({ chunk, vector: hashingVector(chunk.text) }));
    handle.publish(VectorIndex.build(entries, { model: 'fake-hashing-256' }));
  }
  const embedder = new HashingEmbedder();
  const generator = new FakeGenerator();
  const answerer = new CourseAnswerer({ handle, embedder, generator, logger: silentLogger(), topK: 3 });
  return { handle, embedder, generator, answerer };
}

describe('CourseAnswerer', () => {
  it('rejects out-of-domain queries without embedding or generating', async () => {
    const { answerer, embedder, generator } = setup();

    const result = await answerer.answer("what's for lunch");

    expect(toSearchResponse(result)).toEqual({ 'Search Result': REJECTION_MESSAGE, 'Similar Courses': [] });
    expect(embedder.calls).toEqual([]);
    expect(generator.calls).toEqual([]);
  });

  it('answers from the retrieved chunks and returns their courses', async () => {
    const { answerer, generator } = setup();

    const { result, outcome } = await answerer.answerWithOutcome('learn python');

    expect(outcome).toBe('answered');
    expect(result.answer).toBe('Answer from 2 chunks');
    expect(result.matches).toEqual([
      {
        title: 'Python for Data Science',
        url: 'https://courses.example.com/python-data-science',
        price: 'Free',
        instructor: 'Ada Lovelace',
      },
      {
        title: 'Deep Learning Fundamentals',
        url: 'https://courses.example.com/deep-learning',
        price: '$49',
        instructor: 'Alan Turing',
      },
    ]);
    expect(generator.calls).toHaveLength(1);
    expect(generator.calls[0].query).toBe('learn python');
    expect(generator.calls[0].contexts[0]).toBe(normalize(PYTHON_COURSE).text);
  });

  it('contains generation failures in a well-formed result', async () => {
    const { answerer, generator } = setup();
    generator.failWith = new GenerationError('backend unavailable');

    const { result, outcome } = await answerer.answerWithOutcome('learn python');

    expect(outcome).toBe('failed');
    expect(result).toEqual({ answer: ERROR_MESSAGE, matches: [] });
  });

  it('contains embedding failures in a well-formed result', async () => {
    const { answerer, embedder, generator } = setup();
    embedder.failWith = new Error('socket hang up');

    await expect(answerer.answer('python course')).resolves.toEqual({ answer: ERROR_MESSAGE, matches: [] });
    expect(generator.calls).toEqual([]);
  });

  it('throws NotInitializedError before an index is published', async () => {
    const { answerer } = setup({ publish: false });
    await expect(answerer.answer('learn python')).rejects.toBeInstanceOf(NotInitializedError);
  });

  it('returns the presentation shape from searchCourses', async () => {
    const { answerer } = setup();

    expect(await answerer.searchCourses('learn python')).toEqual({
      'Search Result': 'Answer from 2 chunks',
      'Similar Courses': [
        {
          title: 'Python for Data Science',
          url: 'https://courses.example.com/python-data-science',
          price: 'Free',
          instructor: 'Ada Lovelace',
        },
        {
          title: 'Deep Learning Fundamentals',
          url: 'https://courses.example.com/deep-learning',
          price: '$49',
          instructor: 'Alan Turing',
        },
      ],
    });
    expect(await answerer.searchCourses('what is for lunch')).toEqual({
      'Search Result': REJECTION_MESSAGE,
      'Similar Courses': [],
    });
  });
});
