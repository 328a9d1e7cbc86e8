/**
 * Job Scheduler
 *
 * Invokes the run coordinator on a cron schedule using node-cron.
 *
 * Features:
 * - Runs at 08:00, 14:00 and 20:00 UTC by default (configurable)
 * - Prevents overlapping runs within this process; the run lock still
 *   guards against other processes
 * - Graceful shutdown support
 */

import cron from 'node-cron';
import type { RunOptions, RunResult } from '../runner/types.js';
import {
  type RunTrigger,
  type SchedulerConfig,
  type SchedulerState,
  DEFAULT_SCHEDULER_CONFIG,
} from './types.js';

function parseField(field: string, min: number, max: number): number[] | undefined {
  if (field === '*') {
    return Array.from({ length: max - min + 1 }, (_, i) => min + i);
  }

  const step = field.match(/^\*\/(\d+)$/);
  if (step) {
    const every = parseInt(step[1], 10);
    if (every <= 0) return undefined;
    return Array.from({ length: max - min + 1 }, (_, i) => min + i).filter((v) => (v - min) % every === 0);
  }

  const values = field.split(',').map((part) => Number(part));
  if (values.some((v) => !Number.isInteger(v) || v < min || v > max)) return undefined;
  return [...new Set(values)].sort((a, b) => a - b);
}

/**
 * Next UTC fire time for daily minute/hour expressions. Expressions that
 * restrict day, month or weekday return undefined.
 */
export function nextDailyRun(expression: string, after: Date): Date | undefined {
  const fields = expression.trim().split(/\s+/);
  if (fields.length !== 5) return undefined;

  const [minuteField, hourField, dom, month, dow] = fields;
  if (dom !== '*' || month !== '*' || dow !== '*') return undefined;

  const minutes = parseField(minuteField, 0, 59);
  const hours = parseField(hourField, 0, 23);
  if (!minutes || !hours) return undefined;

  for (let dayOffset = 0; dayOffset <= 1; dayOffset++) {
    for (const hour of hours) {
      for (const minute of minutes) {
        const candidate = new Date(
          Date.UTC(after.getUTCFullYear(), after.getUTCMonth(), after.getUTCDate() + dayOffset, hour, minute)
        );
        if (candidate > after) return candidate;
      }
    }
  }
  return undefined;
}

/**
 * JobScheduler manages the cron-based execution of runs
 */
export class JobScheduler {
  private config: SchedulerConfig;
  private cronJob: cron.ScheduledTask | null = null;
  private state: SchedulerState;

  constructor(
    private readonly runner: RunTrigger,
    config: Partial<SchedulerConfig> = {},
    private readonly clock: () => Date = () => new Date()
  ) {
    this.config = { ...DEFAULT_SCHEDULER_CONFIG, ...config };
    this.state = {
      isRunning: false,
      isRunActive: false,
      totalRuns: 0,
      successfulRuns: 0,
      failedRuns: 0,
    };
  }

  /**
   * Start the scheduler
   */
  start(): void {
    if (!this.config.enabled) {
      console.log('[Scheduler] Scheduler is disabled');
      return;
    }

    if (this.state.isRunning) {
      console.log('[Scheduler] Scheduler is already running');
      return;
    }

    if (!cron.validate(this.config.cronExpression)) {
      throw new Error(`Invalid cron expression: ${this.config.cronExpression}`);
    }

    console.log('\n--- Starting Job Scheduler ---');
    console.log(`Cron expression: ${this.config.cronExpression}`);
    console.log(`Timezone: ${this.config.timezone}`);

    this.cronJob = cron.schedule(
      this.config.cronExpression,
      () => {
        console.log('\n[Scheduler] Cron triggered - starting run');
        this.executeRun().catch((error: unknown) => {
          console.error('[Scheduler] Run execution error:', error);
        });
      },
      {
        timezone: this.config.timezone,
      }
    );

    this.state.isRunning = true;
    this.updateNextRunTime();

    console.log(`Next scheduled run: ${this.state.nextRunTime?.toISOString() ?? 'unknown'}`);
  }

  /**
   * Stop the scheduler. A run in progress finishes on its own and releases
   * its lock.
   */
  stop(): void {
    console.log('\n--- Stopping Job Scheduler ---');

    if (this.cronJob) {
      this.cronJob.stop();
      this.cronJob = null;
    }

    this.state.isRunning = false;
    this.state.nextRunTime = undefined;

    console.log('Scheduler stopped');
  }

  /**
   * Execute a run unless one started by this process is still active
   */
  private async executeRun(options: RunOptions = {}): Promise<RunResult | null> {
    if (this.state.isRunActive) {
      console.log('[Scheduler] Run already active, skipping');
      return null;
    }

    this.state.isRunActive = true;
    this.state.totalRuns++;

    try {
      const result = await this.runner.runOnce(options);
      this.state.lastRun = result;

      if (result.status === 'failed') {
        this.state.failedRuns++;
      } else {
        this.state.successfulRuns++;
      }

      return result;
    } catch (error) {
      this.state.failedRuns++;
      throw error;
    } finally {
      this.state.isRunActive = false;
      this.updateNextRunTime();
    }
  }

  private updateNextRunTime(): void {
    if (!this.cronJob || this.config.timezone !== 'UTC') {
      this.state.nextRunTime = undefined;
      return;
    }
    this.state.nextRunTime = nextDailyRun(this.config.cronExpression, this.clock());
  }

  /**
   * Trigger a run outside the schedule. Resolves to null when a run is
   * already active.
   */
  async triggerManually(options: RunOptions = {}): Promise<RunResult | null> {
    console.log('\n[Scheduler] Manual trigger requested');
    return this.executeRun(options);
  }

  getState(): SchedulerState {
    return { ...this.state };
  }
}
