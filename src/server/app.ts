/**
 * Express application factory
 *
 * Kept separate from the entrypoint so tests can mount the app with a
 * stand-in pipeline and no listening socket.
 */
import express from 'express';
import type { Express, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { getCorsOptions } from './config/corsConfig.js';
import type { Env } from './config/env.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { requestIdMiddleware } from './middleware/requestId.js';
import { createResumeRoutes } from './routes/resumeRoutes.js';
import type { ResumeProcessingPipeline } from './services/resume/ResumeProcessingPipeline.js';

export interface AppDependencies {
  env: Pick<Env, 'ALLOWED_ORIGINS' | 'NODE_ENV'>;
  pipeline: Pick<ResumeProcessingPipeline, 'process'>;
  maxUploadBytes: number;
}

export function createApp({ env, pipeline, maxUploadBytes }: AppDependencies): Express {
  const app = express();

  app.disable('x-powered-by');

  // Middleware
  app.use(requestIdMiddleware); // Request ID and logging context - must be first
  app.use(helmet());
  app.use(cors(getCorsOptions(env)));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  app.use('/resume', createResumeRoutes(pipeline, maxUploadBytes));

  app.use(notFoundHandler);
  app.use(errorHandler); // must be last

  return app;
}
