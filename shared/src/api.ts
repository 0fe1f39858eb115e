// Common API types

// Uniform response envelope
export interface Envelope<T> {
  status: 'success' | 'error';
  message?: string;
  results: number;
  data: T;
}

export interface ErrorEnvelopeData {
  code: ErrorCode;
  requestId: string;
  details?: Record<string, unknown>;
}

export type ErrorEnvelope = Envelope<ErrorEnvelopeData>;

// Error codes
export const ErrorCode = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  INSUFFICIENT_DATA: 'INSUFFICIENT_DATA',
  SOURCE_NOT_FOUND: 'SOURCE_NOT_FOUND',
  UNSUPPORTED_FORMAT: 'UNSUPPORTED_FORMAT',
  UNREADABLE_SOURCE: 'UNREADABLE_SOURCE',
  NO_VALID_ROWS: 'NO_VALID_ROWS',
  STORAGE_ERROR: 'STORAGE_ERROR',
  TIMEOUT: 'TIMEOUT',
} as const;
export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

// Health check response
export interface HealthResponse {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  version: string;
}
