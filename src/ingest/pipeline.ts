import { createHash, randomUUID } from 'node:crypto';
import path from 'node:path';
import { performance } from 'node:perf_hooks';
import {
  DocumentNotFoundError,
  EmbeddingUnavailableError,
  EmptyDocumentError,
  getErrorMessage,
  isPipelineError
} from '../errors.js';
import { logIngestEvent, recordJobMetric } from '../observability.js';
import { KBServices } from '../services.js';
import { DocumentRecord, FileType, IndexEntry, IngestResult } from '../types.js';
import { withTimeout } from '../utils/timeout.js';
import { extractFromBuffer, extractFromFile, ExtractedContent } from './extractors.js';
import { buildIngestionSummary } from './summary.js';

export const DEFAULT_COLLECTION = 'default';

export interface IngestDocumentInput {
  text: string;
  filename: string;
  fileType: FileType;
  documentId?: string;
  collection?: string;
  title?: string;
}

export interface IngestOptions {
  documentId?: string;
  collection?: string;
  onIngested?: (event: { documentId: string; filename: string; summary: string }) => Promise<void>;
}

export function newDocumentId(): string {
  return `doc_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}

/** Stable id for a file on disk: ingesting the same path again replaces it. */
export function documentIdForPath(filePath: string): string {
  const digest = createHash('sha256').update(path.resolve(filePath)).digest('hex');
  return `doc_${digest.slice(0, 12)}`;
}

function elapsed(startedAt: number): number {
  return Math.round((performance.now() - startedAt) * 100) / 100;
}

async function runIngestJob(
  services: KBServices,
  payload: Record<string, unknown>,
  work: (jobId: number) => Promise<IngestResult>
): Promise<IngestResult> {
  const { ctx } = services;
  const job = ctx.db
    .prepare('INSERT INTO jobs (job_type, status, payload_json) VALUES (?, ?, ?)')
    .run('ingest', 'running', JSON.stringify(payload));
  const jobId = Number(job.lastInsertRowid);
  const started = performance.now();

  try {
    logIngestEvent(ctx, { jobId, eventType: 'job_started', event: payload });
    const result = await work(jobId);
    ctx.db.prepare('UPDATE jobs SET status = ?, updated_at = CURRENT_TIMESTAMP WHERE id = ?').run('done', jobId);
    recordJobMetric(ctx, { jobId, metricName: 'job_duration_ms', metricValue: elapsed(started) });
    logIngestEvent(ctx, {
      jobId,
      documentId: result.documentId,
      filename: result.filename,
      eventType: 'job_completed',
      event: { chunks: result.chunksProcessed, replacedChunks: result.replacedChunks }
    });
    return { ...result, processingTimeMs: elapsed(started) };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    ctx.db
      .prepare('UPDATE jobs SET status = ?, error_text = ?, updated_at = CURRENT_TIMESTAMP WHERE id = ?')
      .run('failed', message, jobId);
    logIngestEvent(ctx, {
      jobId,
      level: 'error',
      eventType: 'job_failed',
      event: isPipelineError(error) ? { message, kind: error.kind, phase: error.phase } : { message }
    });
    throw error;
  }
}

/**
 * Segment → embed (one gateway call) → upsert (one atomic index call).
 * Nothing reaches the index unless every chunk has a vector.
 */
async function indexDocument(services: KBServices, input: IngestDocumentInput, jobId: number): Promise<IngestResult> {
  const { ctx, config, segmenter, embedder, index } = services;
  const documentId = input.documentId?.trim() || newDocumentId();
  const collection = input.collection?.trim() || DEFAULT_COLLECTION;

  const segmentStartedAt = performance.now();
  const chunks = segmenter.segment(input.text, {
    documentId,
    filename: input.filename,
    fileType: input.fileType,
    collection,
    ingestedAt: new Date().toISOString()
  });
  recordJobMetric(ctx, { jobId, metricName: 'segment_ms', metricValue: elapsed(segmentStartedAt), labels: { documentId } });

  if (chunks.length === 0) {
    throw new EmptyDocumentError(documentId);
  }

  const embedStartedAt = performance.now();
  let vectors: number[][];
  try {
    vectors = await withTimeout(
      `embedding (${embedder.name})`,
      config.timeouts.embeddingMs,
      (signal) => embedder.embed(chunks.map((c) => c.text), { signal })
    );
  } catch (error) {
    if (isPipelineError(error)) throw error;
    throw new EmbeddingUnavailableError(
      `Embedding failed: ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }
  if (vectors.length !== chunks.length) {
    throw new EmbeddingUnavailableError(`Embedder returned ${vectors.length} vectors for ${chunks.length} chunks`);
  }
  const badVector = vectors.findIndex((v) => v.length !== embedder.dimensions);
  if (badVector !== -1) {
    throw new EmbeddingUnavailableError(
      `Vector ${badVector} has ${vectors[badVector].length} dimensions, expected ${embedder.dimensions}`
    );
  }
  recordJobMetric(ctx, {
    jobId,
    metricName: 'embed_ms',
    metricValue: elapsed(embedStartedAt),
    labels: { documentId, embedder: embedder.name }
  });

  const entries: IndexEntry[] = chunks.map((chunk, i) => ({ chunk, vector: vectors[i] }));
  const indexStartedAt = performance.now();
  const { upserted, replaced } = await index.upsert(entries);
  recordJobMetric(ctx, { jobId, metricName: 'index_ms', metricValue: elapsed(indexStartedAt), labels: { documentId } });
  recordJobMetric(ctx, { jobId, metricName: 'chunks_created', metricValue: upserted, labels: { documentId } });

  logIngestEvent(ctx, {
    jobId,
    documentId,
    filename: input.filename,
    eventType: replaced > 0 ? 'document_replaced' : 'document_indexed',
    event: { collection, chunks: upserted, replacedChunks: replaced, fileType: input.fileType }
  });

  return {
    documentId,
    filename: input.filename,
    chunksProcessed: upserted,
    replacedChunks: replaced,
    processingTimeMs: 0
  };
}

/** The document is already committed, so a failing hook is logged and the ingest still succeeds. */
async function notifyIngested(
  services: KBServices,
  options: IngestOptions,
  result: IngestResult,
  content: Pick<ExtractedContent, 'filename' | 'fileType' | 'title' | 'text'>
): Promise<void> {
  if (!options.onIngested) return;
  try {
    await options.onIngested({
      documentId: result.documentId,
      filename: result.filename,
      summary: buildIngestionSummary(result, content)
    });
  } catch (error) {
    logIngestEvent(services.ctx, {
      documentId: result.documentId,
      filename: result.filename,
      level: 'warn',
      eventType: 'summary_post_failed',
      event: { message: getErrorMessage(error) }
    });
  }
}

export async function ingestDocument(
  services: KBServices,
  input: IngestDocumentInput,
  options: Omit<IngestOptions, 'documentId' | 'collection'> = {}
): Promise<IngestResult> {
  const result = await runIngestJob(services, { filename: input.filename, documentId: input.documentId }, (jobId) =>
    indexDocument(services, input, jobId)
  );
  await notifyIngested(services, options, result, input);
  return result;
}

async function ingestExtracted(
  services: KBServices,
  payload: Record<string, unknown>,
  extract: () => Promise<ExtractedContent>,
  options: IngestOptions,
  defaultDocumentId?: string
): Promise<IngestResult> {
  const extracted: { content?: ExtractedContent } = {};
  const result = await runIngestJob(services, payload, async (jobId) => {
    const content = await extract();
    extracted.content = content;
    logIngestEvent(services.ctx, {
      jobId,
      filename: content.filename,
      eventType: 'text_extracted',
      event: { fileType: content.fileType, chars: content.text.length, ...content.metadata }
    });
    return indexDocument(
      services,
      {
        text: content.text,
        filename: content.filename,
        fileType: content.fileType,
        title: content.title,
        documentId: options.documentId ?? defaultDocumentId,
        collection: options.collection
      },
      jobId
    );
  });
  if (extracted.content) await notifyIngested(services, options, result, extracted.content);
  return result;
}

export function ingestFile(services: KBServices, filePath: string, options: IngestOptions = {}): Promise<IngestResult> {
  return ingestExtracted(
    services,
    { path: filePath, collection: options.collection },
    () => extractFromFile(filePath, { maxFileSizeMb: services.config.maxFileSizeMb }),
    options,
    documentIdForPath(filePath)
  );
}

/** Uploaded bytes (chat attachments); a fresh document id unless one is given. */
export function ingestBuffer(
  services: KBServices,
  buffer: Buffer,
  filename: string,
  options: IngestOptions = {}
): Promise<IngestResult> {
  return ingestExtracted(
    services,
    { filename, collection: options.collection },
    () => extractFromBuffer(buffer, filename, { maxFileSizeMb: services.config.maxFileSizeMb }),
    options
  );
}

/* ------------------------------------------------------------------ */
/*  Document lifecycle                                                 */
/* ------------------------------------------------------------------ */

export async function deleteDocument(services: KBServices, documentId: string): Promise<number> {
  const removed = await services.index.delete({ documentId });
  if (removed === 0) {
    throw new DocumentNotFoundError(documentId);
  }
  logIngestEvent(services.ctx, { documentId, eventType: 'document_deleted', event: { chunksDeleted: removed } });
  return removed;
}

export async function deleteAllDocuments(services: KBServices, collection?: string): Promise<number> {
  const removed = await services.index.delete({ all: true, collection });
  logIngestEvent(services.ctx, {
    level: 'warn',
    eventType: 'documents_cleared',
    event: { collection: collection ?? null, chunksDeleted: removed }
  });
  return removed;
}

export function listDocuments(services: KBServices, collection?: string): Promise<DocumentRecord[]> {
  return services.index.listDocuments(collection);
}
