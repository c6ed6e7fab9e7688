// src/errors.ts
// What: Error taxonomy shared by the indexing pipeline, query path and HTTP layer.
// How: Every error carries a stable `code` and an HTTP `status` so the centralized Express
//      handler can map it to { error: { message, code } } without inspecting types.

export class CourseSearchError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly status: number,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'CourseSearchError';
  }
}

/** A course record or request payload is malformed. */
export class ValidationError extends CourseSearchError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, details);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends CourseSearchError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIG_ERROR', 500, details);
    this.name = 'ConfigError';
  }
}

export class EmbeddingError extends CourseSearchError {
  constructor(message: string, details?: unknown) {
    super(message, 'EMBEDDING_ERROR', 502, details);
    this.name = 'EmbeddingError';
  }
}

export class GenerationError extends CourseSearchError {
  constructor(message: string, details?: unknown) {
    super(message, 'GENERATION_ERROR', 502, details);
    this.name = 'GenerationError';
  }
}

export class NotFoundError extends CourseSearchError {
  constructor(message: string, details?: unknown) {
    super(message, 'NOT_FOUND', 404, details);
    this.name = 'NotFoundError';
  }
}

/** A persisted index cannot be used with the current format, model or dimensionality. */
export class IncompatibleIndexError extends CourseSearchError {
  constructor(message: string, details?: unknown) {
    super(message, 'INCOMPATIBLE_INDEX', 500, details);
    this.name = 'IncompatibleIndexError';
  }
}

/** A query operation was called before an index was published. */
export class NotInitializedError extends CourseSearchError {
  constructor(message: string, details?: unknown) {
    super(message, 'NOT_INITIALIZED', 503, details);
    this.name = 'NotInitializedError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
