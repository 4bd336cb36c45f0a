/**
 * Operation-level errors for the import pipeline.
 * Row-level problems never become errors; they are reported in the ImportReport.
 */

// ============================================================================
// ERROR CODES
// ============================================================================

export const ErrorCodes = {
  // Input errors
  NO_FILE: 'NO_FILE',
  INVALID_FILE_TYPE: 'INVALID_FILE_TYPE',
  ENCODING_ERROR: 'ENCODING_ERROR',

  // Dependency errors
  OBJECT_NOT_FOUND: 'OBJECT_NOT_FOUND',
  STORAGE_UNAVAILABLE: 'STORAGE_UNAVAILABLE',
  STORE_UNAVAILABLE: 'STORE_UNAVAILABLE',
  TIMEOUT: 'TIMEOUT',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

// ============================================================================
// ERROR CLASSES
// ============================================================================

export class IngestError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    statusCode: number = 400,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'IngestError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }

  /** Transient failures that a redelivered notification may get past. */
  get retryable(): boolean {
    return this.code === ErrorCodes.STORAGE_UNAVAILABLE
      || this.code === ErrorCodes.STORE_UNAVAILABLE
      || this.code === ErrorCodes.TIMEOUT;
  }

  toJSON() {
    return {
      error: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export function isIngestError(error: unknown): error is IngestError {
  return error instanceof IngestError;
}

// ============================================================================
// ERROR FACTORY FUNCTIONS
// ============================================================================

export function noFileError(): IngestError {
  return new IngestError(ErrorCodes.NO_FILE, 'No file uploaded', 400);
}

export function invalidFileTypeError(filename: string): IngestError {
  return new IngestError(
    ErrorCodes.INVALID_FILE_TYPE,
    'Please upload a .csv file',
    400,
    { filename }
  );
}

export function encodingError(cause?: unknown): IngestError {
  return new IngestError(
    ErrorCodes.ENCODING_ERROR,
    'File is not valid UTF-8 text',
    422,
    undefined,
    { cause }
  );
}

export function objectNotFoundError(bucket: string, key: string): IngestError {
  return new IngestError(
    ErrorCodes.OBJECT_NOT_FOUND,
    `Object '${key}' not found in bucket '${bucket}'`,
    404,
    { bucket, key }
  );
}

export function storageUnavailableError(operation: string, cause?: unknown): IngestError {
  return new IngestError(
    ErrorCodes.STORAGE_UNAVAILABLE,
    `Object storage unavailable during ${operation}: ${errorMessage(cause)}`,
    503,
    { operation },
    { cause }
  );
}

export function storeConnectivityError(cause?: unknown): IngestError {
  return new IngestError(
    ErrorCodes.STORE_UNAVAILABLE,
    `Database unavailable: ${errorMessage(cause)}`,
    503,
    undefined,
    { cause }
  );
}

export function timeoutError(operation: string, timeoutMs: number): IngestError {
  return new IngestError(
    ErrorCodes.TIMEOUT,
    `${operation} timed out after ${timeoutMs}ms`,
    504,
    { operation, timeout_ms: timeoutMs }
  );
}

// ============================================================================
// HELPERS
// ============================================================================

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
