import { Router } from 'express';
import {
  asyncHandler,
  formatZodIssues,
  runRequestBodySchema,
  BadRequestError,
  ConflictError,
  type ApiDependencies,
} from './types.js';

/**
 * POST /api/runs
 *
 * Starts a run in the background and returns immediately.
 * Request body: { dryRun?: boolean, itemId?: string }
 * Responds 409 while a run started by this process is active.
 */
export function createRunsRouter(deps: Pick<ApiDependencies, 'scheduler'>): Router {
  const router = Router();

  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const parseResult = runRequestBodySchema.safeParse(req.body ?? {});
      if (!parseResult.success) {
        throw new BadRequestError(formatZodIssues(parseResult.error));
      }

      if (deps.scheduler.getState().isRunActive) {
        throw new ConflictError('A run is already in progress');
      }

      const { dryRun, itemId } = parseResult.data;

      // Runs in the background; the outcome lands in the run log and /api/status
      deps.scheduler
        .triggerManually({ dryRun, forcedItemId: itemId })
        .then((result) => {
          if (result) {
            console.log(`[API] Run ${result.runId} finished: ${result.status}`);
          }
        })
        .catch((error: unknown) => {
          console.error('[API] Run execution error:', error);
        });

      res.status(202).json({
        message: 'Run started',
        status: 'running',
      });
    })
  );

  return router;
}
