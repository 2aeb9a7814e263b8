import { createServer } from 'http';
import { createApp } from './app.js';
import { getEnv, validateEnv } from './config/env.js';
import { loadPipelineConfig } from './config/pipelineConfig.js';
import { createResumeProcessingPipeline } from './services/resume/ResumeProcessingPipeline.js';
import { logger } from './utils/logger.js';

// Validate environment variables early - fail fast if config is invalid
try {
  validateEnv();
  logger.info('Environment variables validated successfully');
} catch (error) {
  logger.fatal({ error }, 'Environment variable validation failed');
  process.exit(1);
}

const env = getEnv();
const PORT = env.PORT;
const config = loadPipelineConfig(env);

const app = createApp({
  env,
  pipeline: createResumeProcessingPipeline(config),
  maxUploadBytes: config.maxUploadBytes,
});
const httpServer = createServer(app);

httpServer.on('error', (error: NodeJS.ErrnoException) => {
  if (error.code === 'EADDRINUSE') {
    logger.fatal({ port: PORT, error: error.message }, 'Port already in use');
    process.exit(1);
  } else {
    logger.error({ error }, 'HTTP server error');
  }
});

httpServer.on('listening', () => {
  logger.info({
    port: PORT,
    webhookUrl: config.analysis.webhookUrl,
    timeoutMs: config.analysis.timeoutMs,
    maxUploadBytes: config.maxUploadBytes,
  }, 'Server started successfully and listening');
});

logger.info({ port: PORT }, 'Starting Express server');
httpServer.listen(PORT, '0.0.0.0');

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason: unknown) => {
  logger.error({
    reason: reason instanceof Error ? reason : { reason: String(reason) },
  }, 'Unhandled promise rejection');
});

process.on('uncaughtException', (error: Error) => {
  logger.fatal({ error }, 'Uncaught exception - shutting down');
  process.exit(1);
});

function gracefulShutdown(signal: string): void {
  logger.info({ signal }, 'Shutting down');
  httpServer.close((error) => {
    if (error) {
      logger.error({ error }, 'Error while closing HTTP server');
      process.exit(1);
    }
    process.exit(0);
  });
  // In-flight analysis calls can take minutes; do not wait for them forever
  setTimeout(() => {
    logger.warn({ signal }, 'Shutdown timed out, forcing exit');
    process.exit(1);
  }, 10000).unref();
}

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));
