import path from 'node:path';
import { InvalidConfigurationError } from './errors.js';

export type EmptyContextPolicy = 'answer_directly' | 'proceed';

export const EMPTY_CONTEXT_POLICIES: EmptyContextPolicy[] = ['answer_directly', 'proceed'];

export interface ChunkingConfig {
  chunkSize: number;
  overlap: number;
  lookback: number;
}

export interface RetrievalConfig {
  topK: number;
  scoreThreshold: number;
  candidateMultiplier: number;
}

export interface TimeoutConfig {
  embeddingMs: number;
  retrievalMs: number;
  generationMs: number;
}

export interface EmbeddingProviderConfig {
  dimensions: number;
  apiKey: string | null;
  model: string;
  baseUrl: string;
}

export interface GenerationProviderConfig {
  apiKey: string | null;
  baseUrl: string;
  model: string;
  temperature: number;
  maxTokens: number;
}

export interface KBConfig {
  dbPath: string;
  chunking: ChunkingConfig;
  retrieval: RetrievalConfig;
  contextMaxChars: number;
  contextDelimiter: string;
  emptyContextPolicy: EmptyContextPolicy;
  noContextAnswer: string;
  maxFileSizeMb: number;
  timeouts: TimeoutConfig;
  embedding: EmbeddingProviderConfig;
  generation: GenerationProviderConfig;
}

/** Runtime-adjustable settings, persisted in the settings table. */
export interface KBSettings {
  topK: number;
  scoreThreshold: number;
  emptyContextPolicy: EmptyContextPolicy;
  autoSummaryPostEnabled: boolean;
  summaryChannelId: string | null;
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new InvalidConfigurationError(`${key} must be a number, got "${raw}"`);
  }
  return parsed;
}

function readString(env: Env, key: string, fallback: string): string {
  const raw = env[key]?.trim();
  return raw ? raw : fallback;
}

function readOptional(env: Env, ...keys: string[]): string | null {
  for (const key of keys) {
    const raw = env[key]?.trim();
    if (raw) return raw;
  }
  return null;
}

export function isEmptyContextPolicy(value: string): value is EmptyContextPolicy {
  return EMPTY_CONTEXT_POLICIES.some((policy) => policy === value);
}

function readPolicy(env: Env): EmptyContextPolicy {
  const raw = readString(env, 'KB_EMPTY_CONTEXT_POLICY', 'proceed').toLowerCase();
  if (!isEmptyContextPolicy(raw)) {
    throw new InvalidConfigurationError(
      `KB_EMPTY_CONTEXT_POLICY must be one of ${EMPTY_CONTEXT_POLICIES.join(', ')}, got "${raw}"`
    );
  }
  return raw;
}

export function validateChunkingConfig(config: ChunkingConfig): ChunkingConfig {
  const { chunkSize, overlap, lookback } = config;
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new InvalidConfigurationError(`chunk size must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new InvalidConfigurationError(`overlap must be a non-negative integer, got ${overlap}`);
  }
  if (overlap >= chunkSize) {
    throw new InvalidConfigurationError(`overlap (${overlap}) must be smaller than chunk size (${chunkSize})`);
  }
  if (!Number.isInteger(lookback) || lookback < 0) {
    throw new InvalidConfigurationError(`boundary lookback must be a non-negative integer, got ${lookback}`);
  }
  return config;
}

export function validateTopK(topK: number): number {
  if (!Number.isInteger(topK) || topK <= 0) {
    throw new InvalidConfigurationError(`top_k must be a positive integer, got ${topK}`);
  }
  return topK;
}

export function validateScoreThreshold(threshold: number): number {
  if (!Number.isFinite(threshold)) {
    throw new InvalidConfigurationError(`score threshold must be a finite number, got ${threshold}`);
  }
  return threshold;
}

export function validateRetrievalConfig(config: RetrievalConfig): RetrievalConfig {
  validateTopK(config.topK);
  validateScoreThreshold(config.scoreThreshold);
  if (!Number.isInteger(config.candidateMultiplier) || config.candidateMultiplier < 1) {
    throw new InvalidConfigurationError(
      `candidate multiplier must be an integer >= 1, got ${config.candidateMultiplier}`
    );
  }
  return config;
}

export function validateTimeout(name: string, ms: number): number {
  if (!Number.isFinite(ms) || ms <= 0) {
    throw new InvalidConfigurationError(`${name} timeout must be a positive number of milliseconds, got ${ms}`);
  }
  return ms;
}

export function loadConfig(env: Env = process.env): KBConfig {
  const chunking = validateChunkingConfig({
    chunkSize: readNumber(env, 'KB_CHUNK_SIZE', 1000),
    overlap: readNumber(env, 'KB_CHUNK_OVERLAP', 200),
    lookback: readNumber(env, 'KB_BOUNDARY_LOOKBACK', 100)
  });

  const retrieval = validateRetrievalConfig({
    topK: readNumber(env, 'KB_TOP_K', 5),
    scoreThreshold: readNumber(env, 'KB_SCORE_THRESHOLD', 0.5),
    candidateMultiplier: readNumber(env, 'KB_CANDIDATE_MULTIPLIER', 2)
  });

  const contextMaxChars = readNumber(env, 'KB_CONTEXT_MAX_CHARS', 12000);
  if (!Number.isInteger(contextMaxChars) || contextMaxChars < chunking.chunkSize) {
    throw new InvalidConfigurationError(
      `KB_CONTEXT_MAX_CHARS (${contextMaxChars}) must be an integer no smaller than the chunk size (${chunking.chunkSize})`
    );
  }

  const maxFileSizeMb = readNumber(env, 'KB_MAX_FILE_SIZE_MB', 10);
  if (maxFileSizeMb <= 0) {
    throw new InvalidConfigurationError(`KB_MAX_FILE_SIZE_MB must be positive, got ${maxFileSizeMb}`);
  }

  const timeouts: TimeoutConfig = {
    embeddingMs: validateTimeout('embedding', readNumber(env, 'KB_EMBEDDING_TIMEOUT_MS', 30000)),
    retrievalMs: validateTimeout('retrieval', readNumber(env, 'KB_RETRIEVAL_TIMEOUT_MS', 10000)),
    generationMs: validateTimeout('generation', readNumber(env, 'KB_GENERATION_TIMEOUT_MS', 60000))
  };

  const dimensions = readNumber(env, 'EMBEDDING_DIMS', 384);
  if (!Number.isInteger(dimensions) || dimensions <= 0) {
    throw new InvalidConfigurationError(`EMBEDDING_DIMS must be a positive integer, got ${dimensions}`);
  }

  return {
    dbPath: readString(env, 'KB_DB_PATH', path.resolve(process.cwd(), 'data', 'kb.sqlite')),
    chunking,
    retrieval,
    contextMaxChars,
    contextDelimiter: '\n\n---\n\n',
    emptyContextPolicy: readPolicy(env),
    noContextAnswer: readString(
      env,
      'KB_NO_CONTEXT_ANSWER',
      'I could not find relevant information in the uploaded documents to answer that question.'
    ),
    maxFileSizeMb,
    timeouts,
    embedding: {
      dimensions,
      apiKey: readOptional(env, 'OPENAI_API_KEY'),
      model: readString(env, 'OPENAI_EMBEDDING_MODEL', 'text-embedding-3-small'),
      baseUrl: readString(env, 'OPENAI_BASE_URL', 'https://api.openai.com/v1')
    },
    generation: {
      apiKey: readOptional(env, 'LLM_API_KEY', 'GROQ_API_KEY'),
      baseUrl: readString(env, 'LLM_BASE_URL', 'https://api.groq.com/openai/v1'),
      model: readString(env, 'LLM_MODEL', 'llama-3.1-8b-instant'),
      temperature: readNumber(env, 'LLM_TEMPERATURE', 0.7),
      maxTokens: readNumber(env, 'LLM_MAX_TOKENS', 1024)
    }
  };
}

export function defaultSettings(config: KBConfig, env: Env = process.env): KBSettings {
  return {
    topK: config.retrieval.topK,
    scoreThreshold: config.retrieval.scoreThreshold,
    emptyContextPolicy: config.emptyContextPolicy,
    autoSummaryPostEnabled: (env.KB_AUTO_SUMMARY_POST_ENABLED || 'false').toLowerCase() === 'true',
    summaryChannelId: env.KB_SUMMARY_CHANNEL_ID || null
  };
}

export function validateSettings(settings: KBSettings): KBSettings {
  validateTopK(settings.topK);
  validateScoreThreshold(settings.scoreThreshold);
  if (!isEmptyContextPolicy(settings.emptyContextPolicy)) {
    throw new InvalidConfigurationError(`Unknown empty-context policy: ${String(settings.emptyContextPolicy)}`);
  }
  return settings;
}

export const SETTING_KEYS = ['topK', 'scoreThreshold', 'emptyContextPolicy', 'autoSummaryPostEnabled', 'summaryChannelId'] as const;
export type SettingKey = (typeof SETTING_KEYS)[number];

export function isSettingKey(key: string): key is SettingKey {
  return SETTING_KEYS.some((known) => known === key);
}

/** Parses a textual `key value` pair from the CLI or chat into a settings patch. */
export function parseSettingValue(key: string, value: string): Partial<KBSettings> {
  const raw = value.trim();
  if (!isSettingKey(key)) {
    throw new InvalidConfigurationError(`Unknown config key: ${key}. Known keys: ${SETTING_KEYS.join(', ')}`);
  }
  switch (key) {
    case 'topK':
      return { topK: validateTopK(Number(raw)) };
    case 'scoreThreshold':
      return { scoreThreshold: validateScoreThreshold(raw === '' ? Number.NaN : Number(raw)) };
    case 'emptyContextPolicy': {
      const policy = raw.toLowerCase();
      if (!isEmptyContextPolicy(policy)) {
        throw new InvalidConfigurationError(
          `emptyContextPolicy must be one of ${EMPTY_CONTEXT_POLICIES.join(', ')}, got "${raw}"`
        );
      }
      return { emptyContextPolicy: policy };
    }
    case 'autoSummaryPostEnabled':
      return { autoSummaryPostEnabled: raw.toLowerCase() === 'true' || raw.toLowerCase() === 'on' };
    case 'summaryChannelId':
      return { summaryChannelId: raw === '' || raw === 'null' ? null : raw.replace(/[<#>]/g, '') };
  }
}
