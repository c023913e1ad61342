import { vi } from 'vitest';
import { loadConfig, KBConfig } from '../src/config.js';
import { initDB } from '../src/db/client.js';
import { createServices, CapabilityOverrides, KBServices } from '../src/services.js';
import { Chunk, EmbeddingGateway, GenerationGateway, IndexMatch, SimilarityIndex } from '../src/types.js';

/** Three-dimensional embedder: [mentions cat, mentions dog, neither]. */
export function keywordEmbedder() {
  const embed = vi.fn(async (texts: string[]) =>
    texts.map((text) => {
      const lower = text.toLowerCase();
      const cat = lower.includes('cat') ? 1 : 0;
      const dog = lower.includes('dog') ? 1 : 0;
      return [cat, dog, cat || dog ? 0 : 1];
    })
  );
  return { name: 'keyword', dimensions: 3, embed } satisfies EmbeddingGateway;
}

export function recordingGenerator(answer = 'generated answer'): GenerationGateway & {
  calls: Array<{ question: string; context: string }>;
} {
  const calls: Array<{ question: string; context: string }> = [];
  return {
    name: 'recording',
    calls,
    async generate(question, context) {
      calls.push({ question, context });
      return answer;
    }
  };
}

export function testConfig(env: Record<string, string> = {}): KBConfig {
  return loadConfig({ KB_DB_PATH: ':memory:', ...env });
}

export function testServices(overrides: CapabilityOverrides = {}, env: Record<string, string> = {}): KBServices {
  const config = testConfig(env);
  return createServices(initDB(':memory:'), config, {
    embedder: keywordEmbedder(),
    generator: recordingGenerator(),
    ...overrides
  });
}

export function makeChunk(id: string, text: string, documentId = 'doc_test'): Chunk {
  return {
    id,
    document_id: documentId,
    chunk_index: 0,
    text,
    token_count: text.split(/\s+/).filter(Boolean).length,
    metadata: {
      filename: 'notes.txt',
      file_type: 'txt',
      collection: 'default',
      char_start: 0,
      char_end: text.length,
      total_chunks: 1,
      ingested_at: '2024-01-01T00:00:00.000Z',
      section_title: null
    }
  };
}

/** Index that returns fixed candidates, best first, and records every query. */
export function staticIndex(scores: number[]): SimilarityIndex & { queries: Array<{ topK: number; collection?: string }> } {
  const queries: Array<{ topK: number; collection?: string }> = [];
  const matches: IndexMatch[] = scores.map((score, i) => ({ id: `c${i}`, score, chunk: makeChunk(`c${i}`, `chunk ${i}`) }));
  return {
    queries,
    async upsert(entries) {
      return { upserted: entries.length, replaced: 0 };
    },
    async delete() {
      return 0;
    },
    async query(_vector, topK, options) {
      queries.push({ topK, collection: options?.collection });
      return [...matches].sort((a, b) => b.score - a.score).slice(0, topK);
    },
    async listDocuments() {
      return [];
    },
    async stats() {
      return { documents: 0, chunks: 0, dimensions: null, collections: [] };
    }
  };
}
