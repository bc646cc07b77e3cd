/**
 * Express application setup for the listing experiments service.
 *
 * This module:
 * - Creates and configures the Express 5 app instance.
 * - Registers global middleware (JSON parsing, correlation ids, request logging).
 * - Exposes a healthcheck endpoint for monitoring.
 * - Mounts the experiment routes when their dependencies are supplied.
 */
import express from 'express';
import type { Application, NextFunction, Request, Response } from 'express';

import { correlationIdMiddleware } from './http/middleware/correlationId';
import { errorHandler } from './http/middleware/errorHandler';
import { notFound } from './http/middleware/notFound';
import { createExperimentRoutes } from './http/routes/experimentRoutes';
import type { ExperimentRouteDeps } from './http/routes/experimentRoutes';
import { logger } from './shared/logging/Logger';

export type AppDeps = {
  experiments?: ExperimentRouteDeps;
};

export function createApp(deps: AppDeps = {}): Application {
  const app = express();

  // Parse JSON bodies
  app.use(express.json());
  app.use(correlationIdMiddleware);

  // Simple request logging for visibility in development
  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.debug(
      { method: req.method, path: req.path, correlationId: req.correlationId },
      'Incoming request',
    );
    next();
  });

  // Basic healthcheck endpoint used by monitors
  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'ok',
      service: 'listing-experiments',
      timestamp: new Date().toISOString(),
    });
  });

  if (deps.experiments) {
    app.use(createExperimentRoutes(deps.experiments));
  }

  app.use(notFound);

  // Global error handler (keeps errors in one place)
  app.use(errorHandler);

  return app;
}
