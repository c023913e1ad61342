export type PipelinePhase =
  | 'setup'
  | 'extraction'
  | 'segmentation'
  | 'embedding'
  | 'indexing'
  | 'retrieval'
  | 'assembly'
  | 'generation';

export type PipelineErrorKind =
  | 'InvalidConfiguration'
  | 'DocumentRejected'
  | 'EmptyDocument'
  | 'EmbeddingUnavailable'
  | 'IndexWriteFailed'
  | 'RetrievalUnavailable'
  | 'EmptyContext'
  | 'GenerationUnavailable'
  | 'QueryCancelled'
  | 'DocumentNotFound';

/**
 * Base class for every failure the ingestion and query pipelines raise.
 * `kind` says what went wrong, `phase` says which stage raised it.
 */
export class PipelineError extends Error {
  constructor(
    public readonly kind: PipelineErrorKind,
    public readonly phase: PipelinePhase,
    message: string,
    cause?: unknown
  ) {
    super(message);
    this.name = 'PipelineError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export class InvalidConfigurationError extends PipelineError {
  constructor(message: string) {
    super('InvalidConfiguration', 'setup', message);
    this.name = 'InvalidConfigurationError';
  }
}

export class DocumentRejectedError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super('DocumentRejected', 'extraction', message, cause);
    this.name = 'DocumentRejectedError';
  }
}

export class EmptyDocumentError extends PipelineError {
  constructor(documentId: string) {
    super('EmptyDocument', 'segmentation', `Document ${documentId} produced no chunks; refusing to index an empty document.`);
    this.name = 'EmptyDocumentError';
  }
}

export class EmbeddingUnavailableError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super('EmbeddingUnavailable', 'embedding', message, cause);
    this.name = 'EmbeddingUnavailableError';
  }
}

export class IndexWriteFailedError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super('IndexWriteFailed', 'indexing', message, cause);
    this.name = 'IndexWriteFailedError';
  }
}

export class RetrievalUnavailableError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super('RetrievalUnavailable', 'retrieval', message, cause);
    this.name = 'RetrievalUnavailableError';
  }
}

export class EmptyContextError extends PipelineError {
  constructor(message = 'No retrieved chunk passed the score threshold.') {
    super('EmptyContext', 'assembly', message);
    this.name = 'EmptyContextError';
  }
}

export class GenerationUnavailableError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super('GenerationUnavailable', 'generation', message, cause);
    this.name = 'GenerationUnavailableError';
  }
}

export class QueryCancelledError extends PipelineError {
  constructor(phase: PipelinePhase, cause?: unknown) {
    super('QueryCancelled', phase, `Query cancelled during ${phase}.`, cause);
    this.name = 'QueryCancelledError';
  }
}

export class DocumentNotFoundError extends PipelineError {
  constructor(documentId: string) {
    super('DocumentNotFound', 'indexing', `Document ${documentId} not found`);
    this.name = 'DocumentNotFoundError';
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/** Message suitable for a CLI line or a chat reply. */
export function getErrorMessage(error: unknown): string {
  if (error instanceof PipelineError) {
    return `[${error.kind} @ ${error.phase}] ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
