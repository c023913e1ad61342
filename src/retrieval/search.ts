import { RetrievalConfig, validateRetrievalConfig, validateScoreThreshold, validateTopK, validateTimeout } from '../config.js';
import { RetrievalUnavailableError } from '../errors.js';
import { RetrievedMatch, SimilarityIndex } from '../types.js';
import { withTimeout } from '../utils/timeout.js';

export interface RetrieverOptions extends RetrievalConfig {
  timeoutMs: number;
}

export interface RetrieveOptions {
  topK?: number;
  scoreThreshold?: number;
  collection?: string;
  signal?: AbortSignal;
}

export interface Retriever {
  readonly defaults: Readonly<RetrieverOptions>;
  retrieve(queryVector: number[], options?: RetrieveOptions): Promise<RetrievedMatch[]>;
}

/**
 * Keeps candidates at or above the threshold, highest score first, at most
 * `topK` of them. Filtering runs before truncation; the sort is stable so
 * equal scores keep the index's order.
 */
export function selectMatches(candidates: RetrievedMatch[], topK: number, scoreThreshold: number): RetrievedMatch[] {
  return candidates
    .filter((m) => m.similarity_score >= scoreThreshold)
    .sort((a, b) => b.similarity_score - a.similarity_score)
    .slice(0, topK);
}

export function createRetriever(index: SimilarityIndex, options: RetrieverOptions): Retriever {
  const defaults: RetrieverOptions = {
    ...validateRetrievalConfig(options),
    timeoutMs: validateTimeout('retrieval', options.timeoutMs)
  };

  return {
    defaults,
    async retrieve(queryVector, opts = {}) {
      const topK = validateTopK(opts.topK ?? defaults.topK);
      const scoreThreshold = validateScoreThreshold(opts.scoreThreshold ?? defaults.scoreThreshold);
      const candidateCount = topK * defaults.candidateMultiplier;

      let candidates: RetrievedMatch[];
      try {
        const raw = await withTimeout(
          'similarity index query',
          defaults.timeoutMs,
          (signal) => index.query(queryVector, candidateCount, { collection: opts.collection, signal }),
          opts.signal
        );
        candidates = raw.map((m) => ({ chunk: m.chunk, similarity_score: m.score }));
      } catch (error) {
        if (error instanceof RetrievalUnavailableError) throw error;
        throw new RetrievalUnavailableError(
          `Similarity index unavailable: ${error instanceof Error ? error.message : String(error)}`,
          error
        );
      }

      return selectMatches(candidates, topK, scoreThreshold);
    }
  };
}
