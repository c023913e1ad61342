import { DBContext } from './db/client.js';
import { getSettings, updateSettings } from './db/settings.js';
import { createSqliteIndex } from './db/vectors.js';
import { defaultSettings, KBConfig, KBSettings } from './config.js';
import { createEmbeddingGateway } from './retrieval/embeddings.js';
import { createGenerationGateway } from './retrieval/generation.js';
import { createRetriever, Retriever } from './retrieval/search.js';
import { EmbeddingGateway, GenerationGateway, SimilarityIndex } from './types.js';
import { createSegmenter, Segmenter } from './utils/chunking.js';

export interface KBServices {
  ctx: DBContext;
  config: KBConfig;
  segmenter: Segmenter;
  embedder: EmbeddingGateway;
  index: SimilarityIndex;
  retriever: Retriever;
  generator: GenerationGateway;
}

export type CapabilityOverrides = Partial<Pick<KBServices, 'embedder' | 'index' | 'generator'>>;

/**
 * Builds the pipeline around one database. Configuration is validated here,
 * once; capabilities can be swapped for other implementations.
 */
export function createServices(ctx: DBContext, config: KBConfig, overrides: CapabilityOverrides = {}): KBServices {
  const index = overrides.index ?? createSqliteIndex(ctx);
  return {
    ctx,
    config,
    segmenter: createSegmenter(config.chunking),
    embedder: overrides.embedder ?? createEmbeddingGateway(config.embedding),
    index,
    retriever: createRetriever(index, { ...config.retrieval, timeoutMs: config.timeouts.retrievalMs }),
    generator: overrides.generator ?? createGenerationGateway(config.generation)
  };
}

export function currentSettings(services: KBServices): KBSettings {
  return getSettings(services.ctx, defaultSettings(services.config));
}

export function changeSettings(services: KBServices, patch: Partial<KBSettings>): KBSettings {
  return updateSettings(services.ctx, defaultSettings(services.config), patch);
}
