/**
 * Error transformation utilities
 * Converts various error types to standardized formats
 */
import { STATUS_CODES } from 'http';
import type { Request } from 'express';
import {
  AppError,
  BadRequestError,
  ErrorCode,
  PayloadTooLargeError,
  toAppError,
} from '../types/errors.js';
import type { ErrorResponse } from '../types/errors.js';

/**
 * Errors raised by body-parser (express.raw) carry an HTTP status and a `type`
 */
interface BodyParserError extends Error {
  status: number;
  type?: string;
  length?: number;
  limit?: number;
}

function isBodyParserError(error: unknown): error is BodyParserError {
  return error instanceof Error && 'status' in error && typeof error.status === 'number';
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

/**
 * Map framework errors onto the application's error hierarchy
 */
export function normalizeError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (isBodyParserError(error)) {
    if (error.type === 'entity.too.large') {
      const length = optionalNumber(error.length);
      const limit = optionalNumber(error.limit);
      if (length !== undefined && limit !== undefined) {
        return new PayloadTooLargeError(length, limit);
      }
      return new AppError(error.message, ErrorCode.PAYLOAD_TOO_LARGE, 413);
    }
    if (error.status >= 400 && error.status < 500) {
      return new BadRequestError(error.message, { type: error.type });
    }
  }

  return toAppError(error);
}

/**
 * Transform error to standardized error response
 *
 * Messages of non-operational errors are replaced outside development,
 * since they may carry internals.
 */
export function transformErrorToResponse(
  error: unknown,
  req: Pick<Request, 'path'>,
  includeStack = false
): ErrorResponse {
  const appError = normalizeError(error);
  const message =
    appError.isOperational || includeStack ? appError.message : 'An unexpected error occurred';

  return {
    error: STATUS_CODES[appError.statusCode] ?? 'Error',
    code: appError.code,
    message,
    statusCode: appError.statusCode,
    timestamp: new Date().toISOString(),
    path: req.path,
    ...(includeStack && appError.stack ? { stack: appError.stack } : {}),
  };
}
