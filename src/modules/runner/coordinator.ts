/**
 * Run Coordinator
 *
 * The single "run once" entry point an external scheduler invokes:
 *
 * 1. Acquire the run lock (contention → skipped, nothing touched)
 * 2. Resolve the target item (forced id or rotation)
 * 3. Make sure the credentials are usable
 * 4. Drive the item through the publish pipeline
 * 5. Release the lock, append the run log, return one RunResult
 *
 * Every run yields exactly one result and one run-log line; per-run
 * failures are reported in the result, never thrown.
 */

import { randomUUID } from 'node:crypto';
import { CredentialError, LockContentionError, TimeoutError, errorMessage } from '../errors/index.js';
import { selectNext } from '../rotation/index.js';
import type { CatalogItem, CatalogStore } from '../catalog/types.js';
import type { CredentialStatus } from '../credentials/types.js';
import type { PipelineOutcome, ExecuteOptions } from '../publisher/types.js';
import type { LockHandle, RunLock } from './lock.js';
import type { RunLog } from './runLog.js';
import {
  DEFAULT_RUNNER_CONFIG,
  type RunOptions,
  type RunReason,
  type RunResult,
  type RunStatus,
  type RunnerConfig,
} from './types.js';

export interface CredentialGate {
  /** Called once per run, after the lock is held */
  beginRun(): void;
  ensureValid(signal?: AbortSignal): Promise<string>;
  /** Side-effect-free status, used by dry runs */
  inspect(): Promise<CredentialStatus>;
}

export interface ItemPipeline {
  execute(item: CatalogItem, options?: ExecuteOptions): Promise<PipelineOutcome>;
}

export interface CoordinatorDependencies {
  store: CatalogStore;
  credentials: CredentialGate;
  pipeline: ItemPipeline;
  lock: RunLock;
  runLog: RunLog;
}

export interface CoordinatorOptions {
  clock?: () => Date;
  newRunId?: () => string;
}

type TargetResolution =
  | { ok: true; item: CatalogItem }
  | { ok: false; status: RunStatus; reason: RunReason; message: string };

interface RunFields {
  status: RunStatus;
  reason?: RunReason;
  itemId?: string;
  message?: string;
}

export class RunCoordinator {
  private readonly config: RunnerConfig;
  private readonly clock: () => Date;
  private readonly newRunId: () => string;

  constructor(
    private readonly deps: CoordinatorDependencies,
    config: Partial<RunnerConfig> = {},
    options: CoordinatorOptions = {}
  ) {
    this.config = { ...DEFAULT_RUNNER_CONFIG, ...config };
    this.clock = options.clock ?? (() => new Date());
    this.newRunId = options.newRunId ?? randomUUID;
  }

  async runOnce(options: RunOptions = {}): Promise<RunResult> {
    const runId = this.newRunId();
    const startedAt = this.clock();
    const dryRun = options.dryRun ?? false;

    console.log('\n' + '='.repeat(60));
    console.log(`RUN STARTED${dryRun ? ' (dry run)' : ''}`);
    console.log(`Run ID: ${runId}`);
    console.log(`Started: ${startedAt.toISOString()}`);
    console.log('='.repeat(60) + '\n');

    let result: RunResult;

    try {
      const handle = await this.deps.lock.acquire(runId);
      try {
        result = await this.runLocked(runId, startedAt, options);
      } catch (error) {
        console.error('[Run] Unexpected error:', error);
        result = this.buildResult(runId, startedAt, dryRun, {
          status: 'failed',
          reason: 'unexpected_error',
          itemId: options.forcedItemId,
          message: errorMessage(error),
        });
      } finally {
        await this.release(handle);
      }
    } catch (error) {
      if (!(error instanceof LockContentionError)) throw error;
      console.log(`[Run] ${error.message}, skipping`);
      result = this.buildResult(runId, startedAt, dryRun, {
        status: 'skipped',
        reason: 'already_running',
        message: 'Another run holds the lock',
      });
    }

    await this.appendRunLog(result);

    console.log('\n' + '='.repeat(60));
    console.log(`RUN ${result.status.toUpperCase()}${result.reason ? ` [${result.reason}]` : ''}`);
    console.log(`Item: ${result.itemId ?? '-'}`);
    console.log(`Duration: ${(result.durationMs / 1000).toFixed(1)}s`);
    console.log('='.repeat(60) + '\n');

    return result;
  }

  /**
   * Release failures are logged only; a lock left behind is taken over
   * once it goes stale
   */
  private async release(handle: LockHandle): Promise<void> {
    try {
      await handle.release();
    } catch (error) {
      console.error(`[Run] Failed to release the run lock: ${errorMessage(error)}`);
    }
  }

  private async runLocked(runId: string, startedAt: Date, options: RunOptions): Promise<RunResult> {
    const dryRun = options.dryRun ?? false;
    this.deps.credentials.beginRun();
    const target = await this.resolveTarget(options.forcedItemId);
    if (!target.ok) {
      console.log(`[Run] ${target.message}`);
      return this.buildResult(runId, startedAt, dryRun, {
        status: target.status,
        reason: target.reason,
        itemId: options.forcedItemId,
        message: target.message,
      });
    }

    const { item } = target;
    console.log(`[Run] Target item: ${item.itemId} (${item.name}, posted ${item.postCount}x)`);

    if (dryRun) {
      return this.dryRun(runId, startedAt, item);
    }

    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(new TimeoutError(`Run exceeded its ${this.config.timeoutMs}ms budget`));
    }, this.config.timeoutMs);

    try {
      try {
        await this.deps.credentials.ensureValid(controller.signal);
      } catch (error) {
        if (error instanceof TimeoutError) {
          return this.buildResult(runId, startedAt, false, {
            status: 'failed',
            reason: 'timeout',
            itemId: item.itemId,
            message: error.message,
          });
        }
        if (!(error instanceof CredentialError)) throw error;
        return this.buildResult(runId, startedAt, false, {
          status: 'failed',
          reason: 'credential_error',
          itemId: item.itemId,
          message: error.message,
        });
      }

      const outcome = await this.deps.pipeline.execute(item, { runId, signal: controller.signal });
      if (outcome.kind !== 'recorded') {
        throw new Error(`Pipeline returned a preview for live run ${runId}`);
      }

      const { attempt } = outcome;
      return {
        ...this.buildResult(runId, startedAt, false, {
          status: attempt.status,
          reason: attempt.failureReason ?? undefined,
          itemId: item.itemId,
          message: attempt.errorMessage ?? undefined,
        }),
        attempt,
        reconciled: attempt.reconciled,
      };
    } finally {
      clearTimeout(timer);
    }
  }

  private async dryRun(runId: string, startedAt: Date, item: CatalogItem): Promise<RunResult> {
    const credentials = await this.deps.credentials.inspect();
    console.log(
      `[Run] Credentials: ${credentials.state}` +
        (credentials.expiresAt ? ` (expires ${credentials.expiresAt.toISOString()})` : '')
    );

    const outcome = await this.deps.pipeline.execute(item, { dryRun: true });
    const preview = outcome.kind === 'dry_run' ? outcome.preview : undefined;

    return {
      ...this.buildResult(runId, startedAt, true, {
        status: 'dry_run',
        itemId: item.itemId,
        message: `Would publish ${item.itemId}; credentials ${credentials.state}`,
      }),
      preview,
    };
  }

  private async resolveTarget(forcedItemId?: string): Promise<TargetResolution> {
    if (forcedItemId !== undefined) {
      const item = await this.deps.store.getItem(forcedItemId);
      if (!item) {
        return { ok: false, status: 'failed', reason: 'item_not_found', message: `Item ${forcedItemId} does not exist` };
      }
      if (!item.active) {
        return { ok: false, status: 'failed', reason: 'item_inactive', message: `Item ${forcedItemId} is inactive` };
      }
      return { ok: true, item };
    }

    const item = selectNext(await this.deps.store.listActiveItems());
    if (!item) {
      return { ok: false, status: 'skipped', reason: 'no_active_items', message: 'No active catalog items' };
    }
    return { ok: true, item };
  }

  private buildResult(runId: string, startedAt: Date, dryRun: boolean, fields: RunFields): RunResult {
    const completedAt = this.clock();
    return {
      runId,
      ...fields,
      reconciled: false,
      dryRun,
      startedAt,
      completedAt,
      durationMs: completedAt.getTime() - startedAt.getTime(),
    };
  }

  private async appendRunLog(result: RunResult): Promise<void> {
    try {
      await this.deps.runLog.append(result);
    } catch (error) {
      // The result itself is still returned to the caller
      console.error(`[Run] Failed to append run log: ${errorMessage(error)}`);
    }
  }
}
