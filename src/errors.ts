export type ErrorCode =
  | 'UNSUPPORTED_FORMAT'
  | 'EXTRACTION_FAILED'
  | 'UNREACHABLE'
  | 'TIMEOUT'
  | 'GENERATION_FAILED'
  | 'IO_ERROR'
  | 'VALIDATION_ERROR'
  | 'INTERNAL_ERROR';

export type Stage =
  | 'received'
  | 'uploading_cv'
  | 'fetching_company'
  | 'cv_lookup'
  | 'summarizing'
  | 'generating'
  | 'persisting'
  | 'completed'
  | 'failed';

/**
 * Base class for every failure that can end a request. `status` is the HTTP
 * status the API answers with; `stage` is filled in by the orchestrator.
 */
export class AppError extends Error {
  readonly code: ErrorCode;
  readonly status: number;
  stage: Stage | null = null;

  constructor(code: ErrorCode, status: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
    this.code = code;
    this.status = status;
  }

  atStage(stage: Stage): this {
    if (this.stage === null) this.stage = stage;
    return this;
  }
}

export class UnsupportedFormatError extends AppError {
  constructor(message: string) {
    super('UNSUPPORTED_FORMAT', 400, message);
    this.name = 'UnsupportedFormatError';
  }
}

export class ExtractionError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('EXTRACTION_FAILED', 400, message, options);
    this.name = 'ExtractionError';
  }
}

export class UnreachableError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('UNREACHABLE', 502, message, options);
    this.name = 'UnreachableError';
  }
}

export class TimeoutError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TIMEOUT', 502, message, options);
    this.name = 'TimeoutError';
  }
}

export class GenerationError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('GENERATION_FAILED', 502, message, options);
    this.name = 'GenerationError';
  }
}

export class IOError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('IO_ERROR', 500, message, options);
    this.name = 'IOError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super('VALIDATION_ERROR', 422, message);
    this.name = 'ValidationError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Tags `err` with the stage it happened in, wrapping anything that is not an AppError. */
export function toStageError(err: unknown, stage: Stage): AppError {
  if (err instanceof AppError) return err.atStage(stage);
  return new AppError('INTERNAL_ERROR', 500, errorMessage(err), { cause: err }).atStage(stage);
}
