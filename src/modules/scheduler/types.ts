/**
 * Scheduler Module Types
 */

import type { RunOptions, RunResult } from '../runner/types.js';

// =============================================================================
// SCHEDULER CONFIGURATION
// =============================================================================

export interface SchedulerConfig {
  /** Cron expression for scheduled runs (default: 08:00, 14:00 and 20:00) */
  cronExpression: string;
  timezone: string;
  /** Can be disabled to serve the API without scheduled runs */
  enabled: boolean;
}

export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  cronExpression: '0 8,14,20 * * *',
  timezone: 'UTC',
  enabled: true,
};

/**
 * What the scheduler triggers
 */
export interface RunTrigger {
  runOnce(options?: RunOptions): Promise<RunResult>;
}

// =============================================================================
// SCHEDULER STATE
// =============================================================================

export interface SchedulerState {
  /** Whether the cron job is registered */
  isRunning: boolean;
  /** Whether a run started by this process is executing */
  isRunActive: boolean;
  lastRun?: RunResult;
  nextRunTime?: Date;
  totalRuns: number;
  /** Runs that ended published, dry_run or skipped */
  successfulRuns: number;
  failedRuns: number;
}
