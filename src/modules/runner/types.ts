/**
 * Runner Module Types
 */

import type { FailureReason, FinalizedAttempt } from '../catalog/types.js';
import type { DryRunPreview } from '../publisher/types.js';

// =============================================================================
// RUN OPTIONS
// =============================================================================

export interface RunOptions {
  /** Exercise selection, captions and logging without remote mutation */
  dryRun?: boolean;
  /** Bypass rotation and target this item */
  forcedItemId?: string;
}

export interface RunnerConfig {
  /** Wall-clock budget for one run */
  timeoutMs: number;
}

export const DEFAULT_RUNNER_CONFIG: RunnerConfig = {
  timeoutMs: 10 * 60 * 1000,
};

// =============================================================================
// RUN RESULT
// =============================================================================

export type RunStatus = 'published' | 'failed' | 'skipped' | 'dry_run';

export type RunReason =
  | 'already_running'
  | 'no_active_items'
  | 'item_not_found'
  | 'item_inactive'
  | FailureReason;

/**
 * The single structured outcome every run produces
 */
export interface RunResult {
  runId: string;
  status: RunStatus;
  reason?: RunReason;
  itemId?: string;
  attempt?: FinalizedAttempt;
  preview?: DryRunPreview;
  reconciled: boolean;
  dryRun: boolean;
  startedAt: Date;
  completedAt: Date;
  durationMs: number;
  message?: string;
}

/**
 * Process exit code for a run result
 */
export function exitCodeFor(result: Pick<RunResult, 'status' | 'reason'>): number {
  if (result.reason === 'credential_error') return 2;
  if (result.status === 'failed') return 1;
  return 0;
}
