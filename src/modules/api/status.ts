import { Router } from 'express';
import {
  asyncHandler,
  toAttemptResponse,
  type ApiDependencies,
  type StatusResponse,
} from './types.js';

const RECENT_ATTEMPTS = 5;

/**
 * GET /api/status
 *
 * Scheduler counters, credential state (read-only, never refreshes) and
 * the latest attempts.
 */
export function createStatusRouter(
  deps: Pick<ApiDependencies, 'scheduler' | 'credentials' | 'store'>
): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (_req, res) => {
      const state = deps.scheduler.getState();
      const credentials = await deps.credentials.inspect();
      const attempts = await deps.store.recentAttempts(RECENT_ATTEMPTS);

      const response: StatusResponse = {
        scheduler: {
          isRunning: state.isRunning,
          isRunActive: state.isRunActive,
          nextRunTime: state.nextRunTime?.toISOString() ?? null,
          totalRuns: state.totalRuns,
          successfulRuns: state.successfulRuns,
          failedRuns: state.failedRuns,
          lastRun: state.lastRun
            ? {
                runId: state.lastRun.runId,
                status: state.lastRun.status,
                reason: state.lastRun.reason ?? null,
                itemId: state.lastRun.itemId ?? null,
                completedAt: state.lastRun.completedAt.toISOString(),
              }
            : null,
        },
        credentials: {
          state: credentials.state,
          expiresAt: credentials.expiresAt?.toISOString() ?? null,
          accountId: credentials.accountId,
          reason: credentials.reason ?? null,
        },
        recentAttempts: attempts.map(toAttemptResponse),
      };

      res.json(response);
    })
  );

  return router;
}
