import { EmbeddingProviderConfig } from '../config.js';
import { EmbeddingUnavailableError } from '../errors.js';
import { CallOptions, EmbeddingGateway } from '../types.js';

// the embeddings endpoint accepts at most 2048 inputs per request
const MAX_INPUTS_PER_REQUEST = 2048;

function hashToken(token: string): number {
  let hash = 2166136261;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash *= 16777619;
  }
  return Math.abs(hash >>> 0);
}

function normalize(v: number[]): number[] {
  const norm = Math.sqrt(v.reduce((acc, x) => acc + x * x, 0));
  if (!norm) return v;
  return v.map((x) => x / norm);
}

function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter(Boolean);
}

export function localEmbedding(text: string, dimensions: number): number[] {
  const vec: number[] = new Array(dimensions).fill(0);
  for (const token of tokenize(text)) {
    vec[hashToken(token) % dimensions] += 1;
  }
  return normalize(vec);
}

/** Feature-hashing bag of words. Deterministic, offline. */
export function createLocalEmbedder(dimensions: number): EmbeddingGateway {
  return {
    name: 'local-hash',
    dimensions,
    async embed(texts) {
      return texts.map((text) => localEmbedding(text, dimensions));
    }
  };
}

interface EmbeddingsResponse {
  data?: Array<{ index: number; embedding: number[] }>;
}

export function createOpenAIEmbedder(config: EmbeddingProviderConfig & { apiKey: string }): EmbeddingGateway {
  const url = `${config.baseUrl.replace(/\/$/, '')}/embeddings`;

  async function request(input: string[], options?: CallOptions): Promise<number[][]> {
    let res: Response;
    try {
      res = await fetch(url, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${config.apiKey}`,
          'Content-Type': 'application/json'
        },
        body: JSON.stringify({ model: config.model, input, dimensions: config.dimensions }),
        signal: options?.signal
      });
    } catch (error) {
      throw new EmbeddingUnavailableError(`Embedding request failed: ${error instanceof Error ? error.message : String(error)}`, error);
    }

    if (!res.ok) {
      const detail = await res.text().catch(() => '');
      throw new EmbeddingUnavailableError(`Embedding request failed: ${res.status} ${res.statusText} ${detail}`.trim());
    }

    const json = (await res.json()) as EmbeddingsResponse;
    const data = Array.isArray(json.data) ? [...json.data].sort((a, b) => a.index - b.index) : [];
    if (data.length !== input.length) {
      throw new EmbeddingUnavailableError(`Embedding response had ${data.length} vectors for ${input.length} inputs`);
    }
    return data.map((d) => d.embedding);
  }

  return {
    name: `openai:${config.model}`,
    dimensions: config.dimensions,
    async embed(texts, options) {
      const vectors: number[][] = [];
      for (let i = 0; i < texts.length; i += MAX_INPUTS_PER_REQUEST) {
        vectors.push(...(await request(texts.slice(i, i + MAX_INPUTS_PER_REQUEST), options)));
      }
      return vectors;
    }
  };
}

export function createEmbeddingGateway(config: EmbeddingProviderConfig): EmbeddingGateway {
  const { apiKey } = config;
  if (!apiKey) return createLocalEmbedder(config.dimensions);
  return createOpenAIEmbedder({ ...config, apiKey });
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  return denom ? dot / denom : 0;
}
