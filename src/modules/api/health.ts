import { Router } from 'express';
import { asyncHandler, type ApiDependencies, type HealthResponse } from './types.js';

/**
 * GET /health
 *
 * Health check for process supervisors and load balancers.
 * Returns:
 * - 200 OK if the store is reachable
 * - 503 Service Unavailable if it is not
 */
export function createHealthRouter(deps: Pick<ApiDependencies, 'checkHealth'>): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (_req, res) => {
      const isHealthy = await deps.checkHealth();

      const response: HealthResponse = {
        status: isHealthy ? 'healthy' : 'unhealthy',
        database: isHealthy ? 'connected' : 'disconnected',
      };

      res.status(isHealthy ? 200 : 503).json(response);
    })
  );

  return router;
}
