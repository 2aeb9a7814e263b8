/**
 * Centralized error type definitions for the resume pipeline
 * Provides a consistent error hierarchy and error codes
 */

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  // Client errors
  BAD_REQUEST = 'BAD_REQUEST',
  NOT_FOUND = 'NOT_FOUND',
  DECODE_ERROR = 'DECODE_ERROR',
  UNSUPPORTED_FORMAT = 'UNSUPPORTED_FORMAT',
  EMPTY_CONTENT = 'EMPTY_CONTENT',
  PAYLOAD_TOO_LARGE = 'PAYLOAD_TOO_LARGE',

  // Server errors
  INTERNAL_SERVER_ERROR = 'INTERNAL_SERVER_ERROR',
  UPSTREAM_UNAVAILABLE = 'UPSTREAM_UNAVAILABLE',
  MALFORMED_RESPONSE = 'MALFORMED_RESPONSE',
  EMPTY_RESPONSE = 'EMPTY_RESPONSE',
  MISSING_REWRITE = 'MISSING_REWRITE',
}

export class BadRequestError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.BAD_REQUEST, 400, true, context);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, context?: Record<string, unknown>) {
    super(`${resource} not found`, ErrorCode.NOT_FOUND, 404, true, { resource, ...context });
  }
}

// ── Extraction ──────────────────────────────────────────────

/**
 * Text upload is not valid UTF-8
 */
export class DecodeError extends AppError {
  constructor(message: string = 'Text file is not valid UTF-8', context?: Record<string, unknown>) {
    super(message, ErrorCode.DECODE_ERROR, 400, true, context);
  }
}

/**
 * Upload kind is not supported, or a PDF cannot be parsed / has no text layer
 */
export class UnsupportedFormatError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.UNSUPPORTED_FORMAT, 400, true, context);
  }
}

export class EmptyContentError extends AppError {
  constructor(message: string = 'Document contains no text', context?: Record<string, unknown>) {
    super(message, ErrorCode.EMPTY_CONTENT, 400, true, context);
  }
}

export class PayloadTooLargeError extends AppError {
  constructor(byteLength: number, maxBytes: number) {
    const maxMb = maxBytes / (1024 * 1024);
    const receivedMb = byteLength / (1024 * 1024);
    super(
      `File exceeds the ${maxMb} MB limit. Received ${receivedMb.toFixed(2)} MB.`,
      ErrorCode.PAYLOAD_TOO_LARGE,
      413,
      true,
      { byteLength, maxBytes }
    );
  }
}

// ── Analysis webhook ────────────────────────────────────────

export type UpstreamFailureReason = 'timeout' | 'connection' | 'status';

/**
 * Webhook unreachable, timed out, or answered with a non-2xx status.
 * Kept distinct from the malformed-content errors below.
 */
export class UpstreamUnavailableError extends AppError {
  public readonly reason: UpstreamFailureReason;

  constructor(reason: UpstreamFailureReason, message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.UPSTREAM_UNAVAILABLE, 500, true, { reason, ...context });
    this.reason = reason;
  }
}

export class MalformedResponseError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.MALFORMED_RESPONSE, 500, true, context);
  }
}

export class EmptyResponseError extends AppError {
  constructor(message: string = 'Analysis service returned an empty array', context?: Record<string, unknown>) {
    super(message, ErrorCode.EMPTY_RESPONSE, 500, true, context);
  }
}

// ── Orchestration ───────────────────────────────────────────

export class MissingRewriteError extends AppError {
  constructor(message: string = 'Analysis service returned no rewritten resume', context?: Record<string, unknown>) {
    super(message, ErrorCode.MISSING_REWRITE, 500, true, context);
  }
}

/**
 * Standardized error response format
 */
export interface ErrorResponse {
  error: string;
  code: string;
  message: string;
  statusCode: number;
  timestamp: string;
  path?: string;
  stack?: string; // Only in development
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Convert any error to AppError
 */
export function toAppError(error: unknown, defaultMessage: string = 'An unexpected error occurred'): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(error.message, ErrorCode.INTERNAL_SERVER_ERROR, 500, false);
  }

  return new AppError(defaultMessage, ErrorCode.INTERNAL_SERVER_ERROR, 500, false);
}
