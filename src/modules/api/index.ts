/**
 * API Module
 *
 * HTTP surface of the `serve` daemon.
 *
 * Endpoints:
 * - GET  /health        - Store health
 * - GET  /api/status    - Scheduler state, credential status, latest attempts
 * - GET  /api/attempts  - Posting log (?limit=)
 * - POST /api/runs      - Start a run in the background
 */

import express, { Router } from 'express';
import cors from 'cors';
import { createAttemptsRouter } from './attempts.js';
import { createHealthRouter } from './health.js';
import { createRunsRouter } from './runs.js';
import { createStatusRouter } from './status.js';
import { createErrorHandler, notFoundHandler, requestLogger } from './middleware.js';
import type { ApiDependencies } from './types.js';

export * from './types.js';

export { createErrorHandler, notFoundHandler, requestLogger } from './middleware.js';

/**
 * Creates the API router with all routes.
 */
export function createApiRouter(deps: ApiDependencies): Router {
  const router = Router();

  router.use('/status', createStatusRouter(deps));
  router.use('/attempts', createAttemptsRouter(deps));
  router.use('/runs', createRunsRouter(deps));

  return router;
}

/**
 * Creates and configures the Express application with all middleware.
 */
export function createApp(
  deps: ApiDependencies,
  options: { enableCors?: boolean; enableLogging?: boolean; exposeErrorDetails?: boolean } = {}
): express.Application {
  const { enableCors = true, enableLogging = true, exposeErrorDetails = true } = options;

  const app = express();

  // Parse JSON request bodies
  app.use(express.json());

  if (enableCors) {
    app.use(cors());
  }

  if (enableLogging) {
    app.use(requestLogger);
  }

  app.use('/health', createHealthRouter(deps));
  app.use('/api', createApiRouter(deps));

  // 404 handler for unmatched routes
  app.use(notFoundHandler);

  // Global error handler (must be last)
  app.use(createErrorHandler({ exposeDetails: exposeErrorDetails }));

  return app;
}

export default createApp;
