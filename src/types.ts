export type FileType = 'pdf' | 'txt' | 'md' | 'html';

export interface ChunkMetadata {
  filename: string;
  file_type: FileType;
  collection: string;
  char_start: number;
  char_end: number;
  total_chunks: number;
  ingested_at: string;
  section_title: string | null;
}

export interface Chunk {
  id: string;
  document_id: string;
  chunk_index: number;
  text: string;
  token_count: number;
  metadata: ChunkMetadata;
}

export interface RetrievedMatch {
  chunk: Chunk;
  similarity_score: number;
}

export interface DocumentRecord {
  id: string;
  filename: string;
  file_type: FileType;
  collection: string;
  chunk_count: number;
  char_count: number;
  ingested_at: string;
}

export interface QueryRequest {
  question: string;
  top_k?: number;
  score_threshold?: number;
  collection?: string;
}

export type QueryState = 'RECEIVED' | 'EMBEDDING' | 'RETRIEVING' | 'ASSEMBLING' | 'GENERATING' | 'COMPLETE' | 'FAILED';

export interface QueryTiming {
  embedding_ms: number;
  retrieval_ms: number;
  assembly_ms: number;
  generation_ms: number;
  total_ms: number;
}

export interface QueryResult {
  answer: string;
  sources: RetrievedMatch[];
  timing: QueryTiming;
  state_history: QueryState[];
  /** True when generation was skipped because no chunk passed the threshold. */
  answered_without_context: boolean;
  /** Matches returned by retrieval, before the context budget dropped any. */
  chunks_retrieved: number;
}

export interface ChunkSource {
  chunk_text: string;
  document_id: string;
  similarity_score: number;
  metadata: Record<string, unknown>;
}

export interface QueryMetadata {
  embedding_time_ms: number;
  retrieval_time_ms: number;
  generation_time_ms: number;
  total_time_ms: number;
  chunks_retrieved: number;
}

export interface QueryResponse {
  answer: string;
  sources: ChunkSource[];
  metadata: QueryMetadata;
}

export interface IngestResult {
  documentId: string;
  filename: string;
  chunksProcessed: number;
  replacedChunks: number;
  processingTimeMs: number;
}

/* ------------------------------------------------------------------ */
/*  External capabilities                                              */
/* ------------------------------------------------------------------ */

export interface CallOptions {
  signal?: AbortSignal;
}

export interface GenerateOptions extends CallOptions {
  /** The chunk texts joined into `context`, in rank order; `[n]` citations refer to these. */
  passages?: string[];
}

export interface EmbeddingGateway {
  readonly name: string;
  readonly dimensions: number;
  /** One call for the whole batch; returns vectors in input order. */
  embed(texts: string[], options?: CallOptions): Promise<number[][]>;
}

export interface IndexEntry {
  vector: number[];
  chunk: Chunk;
}

export interface IndexMatch {
  id: string;
  score: number;
  chunk: Chunk;
}

export type DeleteTarget =
  | { ids: string[] }
  | { documentId: string }
  | { all: true; collection?: string };

export interface IndexQueryOptions extends CallOptions {
  collection?: string;
}

export interface IndexStats {
  documents: number;
  chunks: number;
  dimensions: number | null;
  collections: Array<{ collection: string; documents: number; chunks: number }>;
}

export interface SimilarityIndex {
  /** Replaces every document present in `entries` atomically. */
  upsert(entries: IndexEntry[]): Promise<{ upserted: number; replaced: number }>;
  /** Returns the number of chunks removed. */
  delete(target: DeleteTarget): Promise<number>;
  /** Ranked by score, highest first. */
  query(vector: number[], topK: number, options?: IndexQueryOptions): Promise<IndexMatch[]>;
  listDocuments(collection?: string): Promise<DocumentRecord[]>;
  stats(): Promise<IndexStats>;
}

export interface GenerationGateway {
  readonly name: string;
  generate(question: string, context: string, options?: GenerateOptions): Promise<string>;
}
