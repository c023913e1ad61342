import { describe, it, expect } from 'vitest';
import { createRetriever, selectMatches } from '../src/retrieval/search.js';
import { InvalidConfigurationError, RetrievalUnavailableError } from '../src/errors.js';
import { SimilarityIndex } from '../src/types.js';
import { makeChunk, staticIndex } from './fakes.js';

const defaults = { topK: 3, scoreThreshold: 0.5, candidateMultiplier: 2, timeoutMs: 1000 };

describe('selectMatches', () => {
  const match = (id: string, score: number) => ({ chunk: makeChunk(id, id), similarity_score: score });

  it('filters by threshold before truncating to top_k', () => {
    const selected = selectMatches([match('a', 0.4), match('b', 0.45), match('c', 0.9)], 2, 0.5);
    expect(selected.map((m) => m.chunk.id)).toEqual(['c']);
  });

  it('keeps scores equal to the threshold and orders highest first', () => {
    const selected = selectMatches([match('a', 0.5), match('b', 0.7), match('c', 0.49)], 5, 0.5);
    expect(selected.map((m) => m.chunk.id)).toEqual(['b', 'a']);
  });

  it('keeps the incoming order for equal scores', () => {
    const selected = selectMatches([match('x', 0.6), match('y', 0.8), match('z', 0.6)], 5, 0);
    expect(selected.map((m) => m.chunk.id)).toEqual(['y', 'x', 'z']);
  });
});

describe('createRetriever', () => {
  it('asks the index for top_k times the candidate multiplier', async () => {
    const index = staticIndex([0.9, 0.3, 0.8, 0.55, 0.7, 0.6]);
    const retriever = createRetriever(index, defaults);

    const matches = await retriever.retrieve([1, 0, 0]);

    expect(index.queries).toEqual([{ topK: 6, collection: undefined }]);
    expect(matches.map((m) => m.similarity_score)).toEqual([0.9, 0.8, 0.7]);
  });

  it('applies per-call overrides and passes the collection through', async () => {
    const index = staticIndex([0.9, 0.8, 0.2]);
    const retriever = createRetriever(index, defaults);

    const matches = await retriever.retrieve([1, 0, 0], { topK: 5, scoreThreshold: 0.1, collection: 'pets' });

    expect(index.queries).toEqual([{ topK: 10, collection: 'pets' }]);
    expect(matches).toHaveLength(3);
  });

  it('returns nothing when every candidate is below the threshold', async () => {
    const retriever = createRetriever(staticIndex([0.2, 0.1]), defaults);
    await expect(retriever.retrieve([1, 0, 0])).resolves.toEqual([]);
  });

  it('rejects invalid settings at construction and per call', async () => {
    expect(() => createRetriever(staticIndex([]), { ...defaults, topK: 0 })).toThrow(InvalidConfigurationError);
    expect(() => createRetriever(staticIndex([]), { ...defaults, candidateMultiplier: 0 })).toThrow(
      InvalidConfigurationError
    );
    const retriever = createRetriever(staticIndex([]), defaults);
    await expect(retriever.retrieve([1], { topK: 1.5 })).rejects.toBeInstanceOf(InvalidConfigurationError);
    await expect(retriever.retrieve([1], { scoreThreshold: Number.NaN })).rejects.toBeInstanceOf(
      InvalidConfigurationError
    );
  });

  it('surfaces index failures as RetrievalUnavailable', async () => {
    const index: SimilarityIndex = {
      ...staticIndex([]),
      async query() {
        throw new Error('disk I/O error');
      }
    };
    const retriever = createRetriever(index, defaults);

    const error = await retriever.retrieve([1, 0, 0]).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(RetrievalUnavailableError);
    expect(error).toMatchObject({
      kind: 'RetrievalUnavailable',
      phase: 'retrieval',
      message: 'Similarity index unavailable: disk I/O error'
    });
  });

  it('fails with RetrievalUnavailable when the index does not answer in time', async () => {
    const index: SimilarityIndex = {
      ...staticIndex([]),
      query: () => new Promise(() => undefined)
    };
    const retriever = createRetriever(index, { ...defaults, timeoutMs: 20 });

    await expect(retriever.retrieve([1, 0, 0])).rejects.toThrow(
      'Similarity index unavailable: similarity index query timed out after 20ms'
    );
  });
});
