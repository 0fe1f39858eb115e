import { ErrorCode, type ErrorEnvelope } from '@tickwatch/shared';

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }

  toEnvelope(requestId: string): ErrorEnvelope {
    return {
      status: 'error',
      message: this.message,
      results: 0,
      data: {
        code: this.code,
        requestId,
        ...(this.details && { details: this.details }),
      },
    };
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.VALIDATION_ERROR, message, 400, details);
    this.name = 'ValidationError';
  }
}

export class UnknownCategoryError extends ValidationError {
  constructor(field: string, value: string, allowed: readonly string[]) {
    super(`Unknown ${field}: ${value}. Allowed: ${allowed.join(', ')}`, {
      reason: 'unknown-category',
      field,
      value,
      allowed: [...allowed],
    });
    this.name = 'UnknownCategoryError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id: string) {
    super(ErrorCode.NOT_FOUND, `${resource} not found: ${id}`, 404);
    this.name = 'NotFoundError';
  }
}

export class EmptyStoreError extends AppError {
  constructor() {
    super(ErrorCode.NOT_FOUND, 'No data in database. Please import data first.', 404);
    this.name = 'EmptyStoreError';
  }
}

export type ForecastFailureReason = 'insufficient-data';

export class ForecastError extends AppError {
  constructor(
    public readonly reason: ForecastFailureReason,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(ErrorCode.INSUFFICIENT_DATA, message, 422, { reason, ...details });
    this.name = 'ForecastError';
  }
}

export type IngestionFailureReason =
  | 'source-not-found'
  | 'unsupported-format'
  | 'unreadable-source'
  | 'no-valid-rows';

const INGESTION_FAILURES: Record<IngestionFailureReason, { code: ErrorCode; statusCode: number }> = {
  'source-not-found': { code: ErrorCode.SOURCE_NOT_FOUND, statusCode: 404 },
  'unsupported-format': { code: ErrorCode.UNSUPPORTED_FORMAT, statusCode: 400 },
  'unreadable-source': { code: ErrorCode.UNREADABLE_SOURCE, statusCode: 422 },
  'no-valid-rows': { code: ErrorCode.NO_VALID_ROWS, statusCode: 422 },
};

export class IngestionError extends AppError {
  constructor(
    public readonly reason: IngestionFailureReason,
    message: string,
    details?: Record<string, unknown>
  ) {
    const { code, statusCode } = INGESTION_FAILURES[reason];
    super(code, message, statusCode, details);
    this.name = 'IngestionError';
  }
}

// Internal detail stays in `cause` for logging; the message is fixed
export class StorageError extends AppError {
  constructor(operation: string, cause?: unknown) {
    super(ErrorCode.STORAGE_ERROR, 'A storage error occurred', 500, { operation });
    this.name = 'StorageError';
    this.cause = cause;
  }

  override toEnvelope(requestId: string): ErrorEnvelope {
    return {
      status: 'error',
      message: this.message,
      results: 0,
      data: { code: this.code, requestId },
    };
  }
}

export class TimeoutError extends AppError {
  constructor(budgetMs: number, stage: string) {
    super(ErrorCode.TIMEOUT, `Computation exceeded budget of ${budgetMs} ms`, 503, { stage });
    this.name = 'TimeoutError';
  }
}
