export type KnowledgeErrorCode =
  | 'INVALID_CONFIG'
  | 'INVALID_QUERY'
  | 'EMBEDDING_UNAVAILABLE'
  | 'EMBEDDING_MALFORMED'
  | 'STORE_UNAVAILABLE'
  | 'DIMENSION_MISMATCH'
  | 'STALE_VERSION'
  | 'INGESTION_FAILED'
  | 'DOCUMENT_NOT_FOUND'
  | 'UNSUPPORTED_FORMAT'
  | 'EXTRACTION_FAILED'
  | 'INVALID_SIGNATURE'
  | 'OPERATION_ABORTED';

interface KnowledgeErrorOptions {
  status: number;
  retryable?: boolean;
  cause?: unknown;
}

/**
 * Base class for every failure the retrieval engine surfaces. `status` is the
 * HTTP status the API answers with; `retryable` tells callers whether backing
 * off and trying again can succeed.
 */
export class KnowledgeBaseError extends Error {
  public readonly code: KnowledgeErrorCode;
  public readonly status: number;
  public readonly retryable: boolean;

  constructor(
    code: KnowledgeErrorCode,
    message: string,
    options: KnowledgeErrorOptions,
  ) {
    super(
      message,
      options.cause === undefined ? undefined : { cause: options.cause },
    );
    this.code = code;
    this.status = options.status;
    this.retryable = options.retryable ?? false;
    this.name = 'KnowledgeBaseError';
  }
}

export class InvalidConfigError extends KnowledgeBaseError {
  constructor(message: string) {
    super('INVALID_CONFIG', message, { status: 400 });
    this.name = 'InvalidConfigError';
  }
}

export class InvalidQueryError extends KnowledgeBaseError {
  constructor(message: string) {
    super('INVALID_QUERY', message, { status: 400 });
    this.name = 'InvalidQueryError';
  }
}

export class EmbeddingUnavailableError extends KnowledgeBaseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('EMBEDDING_UNAVAILABLE', message, {
      status: 503,
      retryable: true,
      cause: options?.cause,
    });
    this.name = 'EmbeddingUnavailableError';
  }
}

export class EmbeddingMalformedError extends KnowledgeBaseError {
  constructor(message: string) {
    super('EMBEDDING_MALFORMED', message, { status: 502, retryable: true });
    this.name = 'EmbeddingMalformedError';
  }
}

export class StoreUnavailableError extends KnowledgeBaseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STORE_UNAVAILABLE', message, { status: 503, cause: options?.cause });
    this.name = 'StoreUnavailableError';
  }
}

export class DimensionMismatchError extends KnowledgeBaseError {
  constructor(
    public readonly expected: number,
    public readonly actual: number,
  ) {
    super(
      'DIMENSION_MISMATCH',
      `vector has ${actual} dimensions, index expects ${expected}`,
      { status: 500 },
    );
    this.name = 'DimensionMismatchError';
  }
}

export class StaleVersionError extends KnowledgeBaseError {
  constructor(
    public readonly documentId: string,
    public readonly attemptedVersion: number,
    public readonly currentVersion: number,
  ) {
    super(
      'STALE_VERSION',
      `document ${documentId} is already at version ${currentVersion}; write for version ${attemptedVersion} discarded`,
      { status: 409 },
    );
    this.name = 'StaleVersionError';
  }
}

export class IngestionFailedError extends KnowledgeBaseError {
  constructor(
    public readonly documentId: string,
    cause: unknown,
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('INGESTION_FAILED', `ingestion of ${documentId} failed: ${detail}`, {
      status: cause instanceof KnowledgeBaseError ? cause.status : 500,
      retryable: cause instanceof KnowledgeBaseError ? cause.retryable : false,
      cause,
    });
    this.name = 'IngestionFailedError';
  }
}

export class DocumentNotFoundError extends KnowledgeBaseError {
  constructor(public readonly documentId: string) {
    super('DOCUMENT_NOT_FOUND', `document ${documentId} not found`, {
      status: 404,
    });
    this.name = 'DocumentNotFoundError';
  }
}

export class UnsupportedFormatError extends KnowledgeBaseError {
  constructor(public readonly mimeType: string) {
    super('UNSUPPORTED_FORMAT', `no text extractor for ${mimeType}`, {
      status: 415,
    });
    this.name = 'UnsupportedFormatError';
  }
}

export class ExtractionFailedError extends KnowledgeBaseError {
  constructor(
    public readonly mimeType: string,
    cause: unknown,
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('EXTRACTION_FAILED', `could not read ${mimeType} content: ${detail}`, {
      status: 422,
      cause,
    });
    this.name = 'ExtractionFailedError';
  }
}

export class InvalidSignatureError extends KnowledgeBaseError {
  constructor() {
    super('INVALID_SIGNATURE', 'webhook signature verification failed', {
      status: 401,
    });
    this.name = 'InvalidSignatureError';
  }
}

export class OperationAbortedError extends KnowledgeBaseError {
  constructor(message = 'operation aborted by caller') {
    super('OPERATION_ABORTED', message, { status: 499 });
    this.name = 'OperationAbortedError';
  }
}

export const isRetryable = (error: unknown): boolean =>
  error instanceof KnowledgeBaseError && error.retryable;

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
