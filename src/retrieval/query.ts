import { performance } from 'node:perf_hooks';
import { validateScoreThreshold, validateTopK } from '../config.js';
import {
  EmbeddingUnavailableError,
  EmptyContextError,
  GenerationUnavailableError,
  InvalidConfigurationError,
  isPipelineError,
  PipelineError,
  PipelinePhase,
  QueryCancelledError,
  RetrievalUnavailableError
} from '../errors.js';
import { recordQuery } from '../observability.js';
import { currentSettings, KBServices } from '../services.js';
import { QueryRequest, QueryResponse, QueryResult, QueryState, QueryTiming, RetrievedMatch } from '../types.js';
import { withTimeout } from '../utils/timeout.js';
import { assembleContext } from './context.js';

export const MAX_QUESTION_LENGTH = 1000;
export const SOURCE_PREVIEW_CHARS = 500;

const TRANSITIONS: Record<QueryState, QueryState[]> = {
  RECEIVED: ['EMBEDDING', 'FAILED'],
  EMBEDDING: ['RETRIEVING', 'FAILED'],
  RETRIEVING: ['ASSEMBLING', 'FAILED'],
  ASSEMBLING: ['GENERATING', 'COMPLETE', 'FAILED'],
  GENERATING: ['COMPLETE', 'FAILED'],
  COMPLETE: [],
  FAILED: []
};

const PHASE_OF: Record<QueryState, PipelinePhase> = {
  RECEIVED: 'setup',
  EMBEDDING: 'embedding',
  RETRIEVING: 'retrieval',
  ASSEMBLING: 'assembly',
  GENERATING: 'generation',
  COMPLETE: 'generation',
  FAILED: 'setup'
};

/** Linear per-query state machine; a state is never entered twice. */
export class QueryStateTracker {
  private readonly history: QueryState[] = ['RECEIVED'];

  constructor(private readonly onStateChange?: (state: QueryState) => void) {
    onStateChange?.('RECEIVED');
  }

  get current(): QueryState {
    return this.history[this.history.length - 1];
  }

  get states(): QueryState[] {
    return [...this.history];
  }

  get isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  transition(next: QueryState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal query state transition ${this.current} -> ${next}`);
    }
    this.history.push(next);
    this.onStateChange?.(next);
  }
}

export interface AnswerOptions {
  signal?: AbortSignal;
  onStateChange?: (state: QueryState) => void;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function toPhaseError(error: unknown, phase: PipelinePhase, signal?: AbortSignal): unknown {
  if (error instanceof QueryCancelledError) return error;
  if (signal?.aborted) return new QueryCancelledError(phase, error);
  if (isPipelineError(error)) return error;
  switch (phase) {
    case 'embedding':
      return new EmbeddingUnavailableError(`Embedding failed: ${describe(error)}`, error);
    case 'retrieval':
      return new RetrievalUnavailableError(`Retrieval failed: ${describe(error)}`, error);
    case 'generation':
      return new GenerationUnavailableError(`Generation failed: ${describe(error)}`, error);
    default:
      return error;
  }
}

export function validateQuestion(question: string): string {
  const trimmed = (question || '').trim();
  if (!trimmed) {
    throw new InvalidConfigurationError('question must not be empty');
  }
  if (trimmed.length > MAX_QUESTION_LENGTH) {
    throw new InvalidConfigurationError(
      `question is ${trimmed.length} characters; the limit is ${MAX_QUESTION_LENGTH}`
    );
  }
  return trimmed;
}

/**
 * question → embed → retrieve → assemble → generate.
 * Each phase is timed on its own; an aborted signal fails the query with
 * `QueryCancelled` for whichever phase was running and discards its output.
 */
export async function answerQuestion(
  services: KBServices,
  request: QueryRequest,
  options: AnswerOptions = {}
): Promise<QueryResult> {
  const { config, embedder, retriever, generator } = services;
  const { signal } = options;
  const startedAt = performance.now();
  const tracker = new QueryStateTracker(options.onStateChange);
  const timing: QueryTiming = { embedding_ms: 0, retrieval_ms: 0, assembly_ms: 0, generation_ms: 0, total_ms: 0 };
  let chunksRetrieved = 0;

  const runPhase = async <T>(state: QueryState, work: () => Promise<T> | T, record: (ms: number) => void): Promise<T> => {
    tracker.transition(state);
    const phase = PHASE_OF[state];
    const phaseStartedAt = performance.now();
    try {
      if (signal?.aborted) throw new QueryCancelledError(phase);
      const value = await work();
      if (signal?.aborted) throw new QueryCancelledError(phase);
      return value;
    } catch (error) {
      throw toPhaseError(error, phase, signal);
    } finally {
      record(performance.now() - phaseStartedAt);
    }
  };

  let answer: string;
  let sources: RetrievedMatch[];
  let answeredWithoutContext = false;

  try {
    const question = validateQuestion(request.question);
    const settings = currentSettings(services);
    const topK = validateTopK(request.top_k ?? settings.topK);
    const scoreThreshold = validateScoreThreshold(request.score_threshold ?? settings.scoreThreshold);
    if (signal?.aborted) throw new QueryCancelledError('setup');

    const queryVector = await runPhase(
      'EMBEDDING',
      async () => {
        const vectors = await withTimeout(
          `embedding (${embedder.name})`,
          config.timeouts.embeddingMs,
          (s) => embedder.embed([question], { signal: s }),
          signal
        );
        if (vectors.length !== 1 || vectors[0].length !== embedder.dimensions) {
          throw new EmbeddingUnavailableError(
            `Expected one ${embedder.dimensions}-dimensional query vector, got ${vectors.length}`
          );
        }
        return vectors[0];
      },
      (ms) => (timing.embedding_ms = ms)
    );

    const matches = await runPhase(
      'RETRIEVING',
      () => retriever.retrieve(queryVector, { topK, scoreThreshold, collection: request.collection, signal }),
      (ms) => (timing.retrieval_ms = ms)
    );
    chunksRetrieved = matches.length;

    const assembled = await runPhase(
      'ASSEMBLING',
      () => {
        try {
          return assembleContext(matches, {
            maxChars: config.contextMaxChars,
            delimiter: config.contextDelimiter,
            emptyContextPolicy: settings.emptyContextPolicy
          });
        } catch (error) {
          if (error instanceof EmptyContextError) return null;
          throw error;
        }
      },
      (ms) => (timing.assembly_ms = ms)
    );

    if (assembled === null) {
      answer = config.noContextAnswer;
      sources = [];
      answeredWithoutContext = true;
    } else {
      answer = await runPhase(
        'GENERATING',
        () =>
          withTimeout(
            `generation (${generator.name})`,
            config.timeouts.generationMs,
            (s) =>
              generator.generate(question, assembled.context, {
                signal: s,
                passages: assembled.used.map((m) => m.chunk.text)
              }),
            signal
          ),
        (ms) => (timing.generation_ms = ms)
      );
      sources = assembled.used;
    }
  } catch (error) {
    const failure = toPhaseError(error, PHASE_OF[tracker.current], signal);
    if (!tracker.isTerminal) tracker.transition('FAILED');
    timing.total_ms = performance.now() - startedAt;
    recordQuery(services.ctx, {
      question: request.question,
      finalState: 'FAILED',
      timing,
      chunksRetrieved,
      errorKind: failure instanceof PipelineError ? failure.kind : undefined,
      errorPhase: failure instanceof PipelineError ? failure.phase : undefined
    });
    throw failure;
  }

  tracker.transition('COMPLETE');
  timing.total_ms = performance.now() - startedAt;
  recordQuery(services.ctx, { question: request.question, finalState: 'COMPLETE', timing, chunksRetrieved });

  return {
    answer,
    sources,
    timing,
    state_history: tracker.states,
    answered_without_context: answeredWithoutContext,
    chunks_retrieved: chunksRetrieved
  };
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function toQueryResponse(result: QueryResult): QueryResponse {
  return {
    answer: result.answer,
    sources: result.sources.map((m) => ({
      chunk_text:
        m.chunk.text.length > SOURCE_PREVIEW_CHARS ? `${m.chunk.text.slice(0, SOURCE_PREVIEW_CHARS)}...` : m.chunk.text,
      document_id: m.chunk.document_id,
      similarity_score: round(m.similarity_score, 4),
      metadata: { ...m.chunk.metadata, chunk_id: m.chunk.id, chunk_index: m.chunk.chunk_index }
    })),
    metadata: {
      embedding_time_ms: round(result.timing.embedding_ms, 2),
      retrieval_time_ms: round(result.timing.retrieval_ms, 2),
      generation_time_ms: round(result.timing.generation_ms, 2),
      total_time_ms: round(result.timing.total_ms, 2),
      chunks_retrieved: result.chunks_retrieved
    }
  };
}

/** Plain-text rendering for the CLI and chat replies. */
export function formatAnswer(result: QueryResult): string {
  const lines = [result.answer];
  if (result.sources.length) {
    lines.push('', 'Sources:');
    result.sources.forEach((m, i) => {
      const section = m.chunk.metadata.section_title ? ` · ${m.chunk.metadata.section_title}` : '';
      lines.push(
        `[${i + 1}] ${m.chunk.metadata.filename} (${m.chunk.id}${section}) score ${m.similarity_score.toFixed(4)}`
      );
    });
  }
  lines.push(
    '',
    `⏱ embed ${result.timing.embedding_ms.toFixed(1)}ms · retrieve ${result.timing.retrieval_ms.toFixed(1)}ms · ` +
      `generate ${result.timing.generation_ms.toFixed(1)}ms · total ${result.timing.total_ms.toFixed(1)}ms`
  );
  return lines.join('\n');
}
