export type RecommenderErrorCode =
  | 'EMPTY_QUERY'
  | 'INDEX_NOT_READY'
  | 'RETRIEVAL_UNAVAILABLE'
  | 'INVALID_FILTER'
  | 'INVALID_TOP_K'
  | 'INDEX_CONFIGURATION'
  | 'CATALOG_INVALID';

/**
 * Base class for every failure the recommender surfaces to its callers.
 * `statusCode` is the HTTP status the API answers with.
 */
export class RecommenderError extends Error {
  constructor(
    public readonly code: RecommenderErrorCode,
    public readonly statusCode: number,
    message: string,
    cause?: unknown
  ) {
    super(message);
    this.name = 'RecommenderError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export class EmptyQueryError extends RecommenderError {
  constructor() {
    super('EMPTY_QUERY', 400, 'Query must contain at least one non-whitespace character');
    this.name = 'EmptyQueryError';
  }
}

export class IndexNotReadyError extends RecommenderError {
  constructor(state: string) {
    super('INDEX_NOT_READY', 503, `Recommender index is not ready (state: ${state})`);
    this.name = 'IndexNotReadyError';
  }
}

export class RetrievalUnavailableError extends RecommenderError {
  constructor(message: string, cause?: unknown) {
    super('RETRIEVAL_UNAVAILABLE', 503, message, cause);
    this.name = 'RetrievalUnavailableError';
  }
}

export class InvalidFilterError extends RecommenderError {
  constructor(field: string) {
    super('INVALID_FILTER', 400, `Unknown filter field: ${field}`);
    this.name = 'InvalidFilterError';
  }
}

export class InvalidTopKError extends RecommenderError {
  constructor(topK: number) {
    super('INVALID_TOP_K', 400, `topK must be a positive integer (got ${topK})`);
    this.name = 'InvalidTopKError';
  }
}

export class IndexConfigurationError extends RecommenderError {
  constructor(message: string) {
    super('INDEX_CONFIGURATION', 500, message);
    this.name = 'IndexConfigurationError';
  }
}

export class CatalogValidationError extends RecommenderError {
  constructor(message: string, cause?: unknown) {
    super('CATALOG_INVALID', 500, `Catalog validation failed: ${message}`, cause);
    this.name = 'CatalogValidationError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
