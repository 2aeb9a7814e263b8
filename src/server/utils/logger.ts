import pino from 'pino';
import type { Logger } from 'pino';
import { AsyncLocalStorage } from 'async_hooks';

/**
 * AsyncLocalStorage for request context (request ID, method, path)
 */
export const requestContext = new AsyncLocalStorage<Record<string, unknown>>();

/**
 * Get current request context
 */
export function getRequestContext(): Record<string, unknown> {
  return requestContext.getStore() || {};
}

function resolveLogLevel(nodeEnv: string): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  if (nodeEnv === 'test') {
    return 'silent';
  }
  return nodeEnv === 'production' ? 'info' : 'debug';
}

/**
 * Create logger instance based on environment
 *
 * Reads process.env directly: the logger must exist before env validation runs,
 * since validation failures are themselves logged.
 */
function createLogger(): Logger {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const pretty = process.env.LOG_PRETTY
    ? process.env.LOG_PRETTY === 'true'
    : nodeEnv === 'development';

  return pino({
    level: resolveLogLevel(nodeEnv),
    base: {
      env: nodeEnv,
      service: 'resume-review-service',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    // Every line logged inside a request carries its requestId
    mixin: () => getRequestContext(),
    ...(pretty && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    }),
  });
}

/**
 * Main logger instance
 */
export const logger = createLogger();
