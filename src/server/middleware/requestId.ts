import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { requestContext, logger } from '../utils/logger.js';

/**
 * Middleware to generate and attach request ID to each request
 * Also sets up async context for logging
 */
export function requestIdMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  // Reuse the caller's request ID when it sends one
  const incoming = req.headers['x-request-id'];
  const requestId = typeof incoming === 'string' && incoming.trim() ? incoming.trim() : randomUUID();

  res.setHeader('X-Request-ID', requestId);

  const context: Record<string, unknown> = {
    requestId,
    method: req.method,
    path: req.path,
  };

  requestContext.run(context, () => {
    logger.info({
      query: req.query,
      ip: req.ip,
      contentType: req.headers['content-type'],
      contentLength: req.headers['content-length'],
    }, 'Incoming request');

    next();
  });
}
