import { Router } from 'express';
import {
  asyncHandler,
  attemptsQuerySchema,
  formatZodIssues,
  toAttemptResponse,
  BadRequestError,
  type ApiDependencies,
  type AttemptsListResponse,
} from './types.js';

/**
 * GET /api/attempts?limit=20
 *
 * The posting log, newest first.
 */
export function createAttemptsRouter(deps: Pick<ApiDependencies, 'store'>): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const parseResult = attemptsQuerySchema.safeParse(req.query);
      if (!parseResult.success) {
        throw new BadRequestError(formatZodIssues(parseResult.error));
      }

      const attempts = await deps.store.recentAttempts(parseResult.data.limit);
      const response: AttemptsListResponse = { attempts: attempts.map(toAttemptResponse) };

      res.json(response);
    })
  );

  return router;
}
