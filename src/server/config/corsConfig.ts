/**
 * CORS Configuration
 *
 * Configures CORS (Cross-Origin Resource Sharing) for the Express application.
 */
import type { CorsOptions } from 'cors';
import { logger } from '../utils/logger.js';
import type { Env } from './env.js';

export const ALLOW_ALL_ORIGINS = '*';

/**
 * Check if an origin is allowed
 */
export function isOriginAllowed(origin: string | undefined, allowedOrigins: readonly string[]): boolean {
  // Allow requests with no origin (curl, server-to-server)
  if (!origin) {
    return true;
  }

  if (allowedOrigins.includes(ALLOW_ALL_ORIGINS)) {
    return true;
  }

  return allowedOrigins.includes(origin);
}

/**
 * Get CORS configuration options
 */
export function getCorsOptions(env: Pick<Env, 'ALLOWED_ORIGINS' | 'NODE_ENV'>): CorsOptions {
  const allowedOrigins = env.ALLOWED_ORIGINS;

  logger.info({ allowedOrigins }, 'CORS: Configured allowed origins');

  return {
    origin: (origin, callback) => {
      if (isOriginAllowed(origin, allowedOrigins)) {
        callback(null, true);
        return;
      }

      // Log rejected origins for debugging (only in development to avoid log spam)
      if (env.NODE_ENV === 'development') {
        logger.warn({ origin, allowedOrigins }, 'CORS: Origin not allowed');
      }
      callback(null, false);
    },
    optionsSuccessStatus: 200,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Request-ID'],
    exposedHeaders: ['X-Request-ID', 'Content-Disposition'],
  };
}
