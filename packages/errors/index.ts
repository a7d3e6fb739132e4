/**
* Unified Error Handling Package
*
* Standardized error classes, error codes and helpers shared by the web
* layer and the analysis domain.
*
* Standard Error Format:
* {
*   error: string;       // Human-readable error message
*   code: string;        // Machine-readable error code
*   details?: unknown;   // Additional error details (validation issues, etc.)
*   requestId?: string;  // Request ID for tracing
* }
*/

// ============================================================================
// Error Code Constants
// ============================================================================

export const ErrorCodes = {
  // Validation Errors
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_PARAMS: 'INVALID_PARAMS',
  INVALID_URL: 'INVALID_URL',
  INVALID_ANALYSIS_TYPE: 'INVALID_ANALYSIS_TYPE',
  REQUIRED_FIELD: 'REQUIRED_FIELD',

  // Resource Errors
  NOT_FOUND: 'NOT_FOUND',
  REPORT_NOT_FOUND: 'REPORT_NOT_FOUND',

  // Storage Errors
  DATABASE_ERROR: 'DATABASE_ERROR',
  STORAGE_ERROR: 'STORAGE_ERROR',

  // Service Errors
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
  TIMEOUT_ERROR: 'TIMEOUT_ERROR',

  // External API Errors
  EXTERNAL_API_ERROR: 'EXTERNAL_API_ERROR',
  ANALYSIS_FAILED: 'ANALYSIS_FAILED',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

// ============================================================================
// Error Response Interface
// ============================================================================

/**
 * Error response shape returned by all JSON endpoints.
 */
export interface ErrorResponse {
  /** Human-readable error message */
  error: string;
  /** Machine-readable error code from ErrorCodes */
  code: string;
  /** Additional error details - hidden outside development */
  details?: unknown;
  /** Request ID for tracing */
  requestId?: string;
}

// ============================================================================
// Base Application Error Class
// ============================================================================

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: unknown;
  public readonly statusCode: number;

  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.INTERNAL_ERROR,
    statusCode: number = 500,
    details?: unknown,
    options?: { cause?: Error }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): ErrorResponse {
    return {
      error: this.message,
      code: this.code,
      ...(this.details !== undefined && { details: this.details }),
    };
  }

  /**
  * Sanitized version for client exposure: details only in development.
  */
  toClientJSON(requestId?: string): ErrorResponse {
    return {
      error: this.message,
      code: this.code,
      ...(shouldExposeErrorDetails() && this.details !== undefined && { details: this.details }),
      ...(requestId !== undefined && { requestId }),
    };
  }
}

// ============================================================================
// Specific Error Classes
// ============================================================================

export class ValidationError extends AppError {
  constructor(
    message: string = 'Validation failed',
    code: ErrorCode = ErrorCodes.VALIDATION_ERROR,
    details?: unknown
  ) {
    super(message, code, 400, details);
  }
}

export class NotFoundError extends AppError {
  constructor(
    resource: string = 'Resource',
    code: ErrorCode = ErrorCodes.NOT_FOUND
  ) {
    super(`${resource} not found`, code, 404);
  }

  static report(): NotFoundError {
    return new NotFoundError('Report', ErrorCodes.REPORT_NOT_FOUND);
  }
}

export class ServiceUnavailableError extends AppError {
  constructor(message: string = 'Service temporarily unavailable') {
    super(message, ErrorCodes.SERVICE_UNAVAILABLE, 503);
  }
}

export class StorageError extends AppError {
  constructor(message: string, code: ErrorCode = ErrorCodes.STORAGE_ERROR, cause?: Error) {
    super(message, code, 500, undefined, cause ? { cause } : undefined);
  }
}

/**
* Failure of the external analysis service: unreachable, timed out, non-2xx
* or a body that is not a JSON object.
*/
export class AnalyzerError extends AppError {
  constructor(
    message: string,
    public readonly upstreamStatus?: number,
    code: ErrorCode = ErrorCodes.EXTERNAL_API_ERROR,
    cause?: Error
  ) {
    super(message, code, code === ErrorCodes.TIMEOUT_ERROR ? 504 : 502, undefined, cause ? { cause } : undefined);
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function shouldExposeErrorDetails(): boolean {
  return process.env['NODE_ENV'] === 'development';
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
* Normalize anything thrown into an Error for logging
*/
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
* Convert any thrown value into the client-facing response body and status.
* Non-AppErrors never expose their message.
*/
export function sanitizeErrorForClient(error: unknown, requestId?: string): { statusCode: number; body: ErrorResponse } {
  if (error instanceof AppError) {
    return { statusCode: error.statusCode, body: error.toClientJSON(requestId) };
  }
  return {
    statusCode: 500,
    body: {
      error: 'An error occurred processing your request',
      code: ErrorCodes.INTERNAL_ERROR,
      ...(requestId !== undefined && { requestId }),
    },
  };
}
