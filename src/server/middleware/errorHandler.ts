import type { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger.js';
import { transformErrorToResponse } from '../utils/errorTransformation.js';
import { NotFoundError } from '../types/errors.js';

/**
 * Fallback for unmatched routes
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
    next(new NotFoundError(`Route ${req.method} ${req.path}`));
}

/**
 * Centralized error handling middleware
 * Must be registered LAST in Express app
 *
 * This middleware:
 * - Transforms all errors to standardized ErrorResponse format
 * - Logs client errors at warn and server errors at error level
 * - Returns consistent error responses to clients
 */
export function errorHandler(
    err: unknown,
    req: Request,
    res: Response,
    _next: NextFunction
): void {
    const includeStack = process.env.NODE_ENV === 'development';
    const errorResponse = transformErrorToResponse(err, req, includeStack);

    const logContext = {
        error: err,
        code: errorResponse.code,
        statusCode: errorResponse.statusCode,
        path: req.path,
        method: req.method,
        query: req.query,
    };

    if (errorResponse.statusCode >= 500) {
        logger.error(logContext, 'Request failed');
    } else {
        logger.warn(logContext, 'Request rejected');
    }

    // Client has already received (part of) a response
    if (res.headersSent) {
        logger.debug({ path: req.path }, 'Headers already sent, not writing error response');
        return;
    }

    res.status(errorResponse.statusCode).json(errorResponse);
}
