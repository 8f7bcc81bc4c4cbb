export type PipelineErrorCode =
  | 'VALIDATION_ERROR'
  | 'PARSE_ERROR'
  | 'DOWNLOAD_ERROR'
  | 'EXTRACTION_ERROR'
  | 'AI_SERVICE_ERROR'
  | 'NOT_FOUND'
  | 'STORE_ERROR'
  | 'TASK_CONFLICT';

/**
 * Base class for every error the pipeline raises on purpose.
 * `retryable` drives the stage retry policy, `statusCode` the HTTP mapping.
 */
export class PipelineError extends Error {
  public readonly retryable: boolean;
  public readonly statusCode: number;

  constructor(
    public readonly code: PipelineErrorCode,
    message: string,
    options: { retryable?: boolean; statusCode?: number; cause?: unknown } = {}
  ) {
    super(message);
    this.name = 'PipelineError';
    this.retryable = options.retryable ?? false;
    this.statusCode = options.statusCode ?? 500;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class ValidationError extends PipelineError {
  constructor(message: string) {
    super('VALIDATION_ERROR', message, { statusCode: 400 });
    this.name = 'ValidationError';
  }
}

export class ParseError extends PipelineError {
  constructor(message: string, options: { retryable?: boolean; cause?: unknown } = {}) {
    super('PARSE_ERROR', message, { ...options, statusCode: 502 });
    this.name = 'ParseError';
  }
}

export class DownloadError extends PipelineError {
  constructor(message: string, options: { retryable?: boolean; cause?: unknown } = {}) {
    super('DOWNLOAD_ERROR', message, { ...options, statusCode: 502 });
    this.name = 'DownloadError';
  }
}

export class ExtractionError extends PipelineError {
  constructor(message: string, options: { retryable?: boolean; cause?: unknown } = {}) {
    super('EXTRACTION_ERROR', message, options);
    this.name = 'ExtractionError';
  }
}

export class AIServiceError extends PipelineError {
  constructor(message: string, options: { retryable?: boolean; cause?: unknown } = {}) {
    super('AI_SERVICE_ERROR', message, { ...options, statusCode: 502 });
    this.name = 'AIServiceError';
  }
}

export class TaskPersistenceError extends PipelineError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super('STORE_ERROR', message, options);
    this.name = 'TaskPersistenceError';
  }
}

export class NotFoundError extends PipelineError {
  constructor(message = 'Task not found') {
    super('NOT_FOUND', message, { statusCode: 404 });
    this.name = 'NotFoundError';
  }
}

export class TaskConflictError extends PipelineError {
  constructor(message: string) {
    super('TASK_CONFLICT', message, { statusCode: 409 });
    this.name = 'TaskConflictError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
