/**
 * Scheduler Module
 *
 * Time-based triggering of the run coordinator for the `serve` daemon.
 */

export {
  type SchedulerConfig,
  type SchedulerState,
  type RunTrigger,
  DEFAULT_SCHEDULER_CONFIG,
} from './types.js';

export { JobScheduler, nextDailyRun } from './scheduler.js';
