/**
 * Publish Pipeline
 *
 * Drives one catalog item to a terminal PostAttempt:
 *
 *   pending → uploading → awaiting_confirmation → published
 *                 any non-terminal state → failed
 *
 * The attempt lives in memory while the stages run and is written once, at
 * its terminal status, together with the item's rotation stats. A crash
 * mid-run therefore leaves the store as it was before the run.
 *
 * Expected failures come back from each stage as StageOutcome values;
 * anything unclassified becomes `unexpected_error`.
 */

import { randomUUID } from 'node:crypto';
import {
  CredentialError,
  HostingError,
  RemoteError,
  TimeoutError,
  errorMessage,
} from '../errors/index.js';
import { abortable, backoffDelay, retryWithBackoff, sleep as defaultSleep } from '../retry/index.js';
import type {
  CatalogItem,
  CatalogStore,
  FailureReason,
  FinalizedAttempt,
  PostAttempt,
  PostAttemptStatus,
} from '../catalog/types.js';
import type {
  AccessTokenSource,
  Caption,
  CaptionWriter,
  ContentPublisher,
  ExecuteOptions,
  MediaHost,
  PipelineConfig,
  PipelineOutcome,
  StageOutcome,
} from './types.js';

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  hosting: { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 30000 },
  publishInit: { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 30000 },
  confirmation: { maxPolls: 24, pollIntervalMs: 5000, maxDelayMs: 30000 },
  reconcileWindowMs: 24 * 60 * 60 * 1000,
  privacyLevel: 'SELF_ONLY',
};

export interface PipelineDependencies {
  store: CatalogStore;
  credentials: AccessTokenSource;
  mediaHost: MediaHost;
  publisher: ContentPublisher;
  captions: CaptionWriter;
}

export interface PipelineOptions {
  clock?: () => Date;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  newId?: () => string;
}

// =============================================================================
// HELPERS
// =============================================================================

type Failure = Extract<StageOutcome<never>, { ok: false }>;

function ok<T>(value: T): StageOutcome<T> {
  return { ok: true, value };
}

function fail(reason: FailureReason, error: string): Failure {
  return { ok: false, reason, error };
}

/**
 * Classify a thrown error. `expected` names the failure a stage owns for
 * the error types it anticipates.
 */
function classify(
  error: unknown,
  signal: AbortSignal | undefined,
  expected?: { reason: FailureReason; matches: (error: unknown) => boolean }
): Failure {
  if (signal?.aborted || error instanceof TimeoutError) {
    return fail('timeout', errorMessage(error));
  }
  if (error instanceof CredentialError) {
    return fail('credential_error', errorMessage(error));
  }
  if (expected?.matches(error)) {
    return fail(expected.reason, errorMessage(error));
  }
  return fail('unexpected_error', errorMessage(error));
}

/**
 * When the remote first accepted an attempt's publish id. Rows written
 * before the column existed fall back to the attempt's creation time.
 */
export function publishStartedAt(attempt: PostAttempt): Date {
  return attempt.publishInitiatedAt ?? attempt.createdAt;
}

/**
 * Whether an earlier attempt may have published remotely without us seeing it.
 * The window runs from the original publish, so repeated reconciliations of
 * the same publish id do not extend it.
 */
export function needsReconciliation(
  previous: PostAttempt | undefined,
  now: Date,
  windowMs: number
): previous is PostAttempt & { publishId: string } {
  if (!previous) return false;
  if (previous.status !== 'failed' || previous.failureReason !== 'confirmation_timeout') return false;
  if (!previous.publishId) return false;
  return now.getTime() - publishStartedAt(previous).getTime() < windowMs;
}

// =============================================================================
// PIPELINE
// =============================================================================

export class PublishPipeline {
  private readonly config: PipelineConfig;
  private readonly clock: () => Date;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly newId: () => string;
  private readonly inFlight = new Set<string>();

  constructor(
    private readonly deps: PipelineDependencies,
    config: Partial<PipelineConfig> = {},
    options: PipelineOptions = {}
  ) {
    this.config = { ...DEFAULT_PIPELINE_CONFIG, ...config };
    this.clock = options.clock ?? (() => new Date());
    this.sleep = options.sleep ?? defaultSleep;
    this.newId = options.newId ?? randomUUID;
  }

  /**
   * Run one item to a terminal status. Per-item failures never throw; only
   * a failure to persist the outcome does.
   */
  async execute(item: CatalogItem, options: ExecuteOptions = {}): Promise<PipelineOutcome> {
    if (options.dryRun) {
      return this.preview(item);
    }

    const attempt = this.newAttempt(item, options.runId ?? null);

    if (this.inFlight.has(item.itemId)) {
      console.warn(`[Pipeline] ${item.itemId} already has an attempt in progress`);
      const outcome = fail('already_in_progress', `Item ${item.itemId} is already being published`);
      return { kind: 'recorded', attempt: await this.finalize(attempt, outcome) };
    }

    this.inFlight.add(item.itemId);
    try {
      const outcome = await this.run(item, attempt, options.signal);
      return { kind: 'recorded', attempt: await this.finalize(attempt, outcome) };
    } finally {
      this.inFlight.delete(item.itemId);
    }
  }

  private async preview(item: CatalogItem): Promise<PipelineOutcome> {
    const caption = await this.deps.captions.write(item);
    console.log(`[Pipeline] Dry run for ${item.itemId}, nothing will be published`);
    return {
      kind: 'dry_run',
      preview: { itemId: item.itemId, text: caption.fullText, mediaSource: item.mediaUrl },
    };
  }

  private async run(
    item: CatalogItem,
    attempt: PostAttempt,
    signal?: AbortSignal
  ): Promise<StageOutcome<void>> {
    try {
      const previous = await this.deps.store.latestAttempt(item.itemId);
      if (needsReconciliation(previous, this.clock(), this.config.reconcileWindowMs)) {
        const settled = await this.reconcile(previous, attempt, signal);
        if (settled) return settled;
      }

      const caption = await this.writeCaption(item, signal);
      if (!caption.ok) return caption;
      attempt.postText = caption.value.fullText;

      const hosted = await this.hostMedia(item, signal);
      if (!hosted.ok) return hosted;
      attempt.hostedMediaUrl = hosted.value;
      this.transition(attempt, 'uploading');

      const publishId = await this.initPublish(caption.value.fullText, hosted.value, signal);
      if (!publishId.ok) return publishId;
      attempt.publishId = publishId.value;
      attempt.publishInitiatedAt = this.clock();
      this.transition(attempt, 'awaiting_confirmation');

      return await this.confirm(publishId.value, signal);
    } catch (error) {
      return classify(error, signal);
    }
  }

  // ===========================================================================
  // STAGES
  // ===========================================================================

  /**
   * Check an earlier unconfirmed publish before posting the item again.
   * Returns null when a fresh publish should go ahead: the remote rejected
   * the earlier one, or no longer knows its publish id.
   */
  private async reconcile(
    previous: PostAttempt & { publishId: string },
    attempt: PostAttempt,
    signal?: AbortSignal
  ): Promise<StageOutcome<void> | null> {
    console.log(`[Pipeline] Checking earlier unconfirmed publish ${previous.publishId}`);

    attempt.publishId = previous.publishId;
    attempt.publishInitiatedAt = publishStartedAt(previous);
    attempt.postText = previous.postText;
    attempt.hostedMediaUrl = previous.hostedMediaUrl;

    const startFresh = (): null => {
      attempt.publishId = null;
      attempt.publishInitiatedAt = null;
      attempt.postText = null;
      attempt.hostedMediaUrl = null;
      return null;
    };

    try {
      const token = await this.deps.credentials.ensureValid(signal);
      const report = await abortable(
        this.deps.publisher.confirmStatus(previous.publishId, token, signal),
        signal
      );

      if (report.status === 'published') {
        attempt.reconciled = true;
        this.transition(attempt, 'awaiting_confirmation');
        console.log(`[Pipeline] Publish ${previous.publishId} completed remotely, not re-posting`);
        return ok(undefined);
      }

      if (report.status === 'rejected') {
        console.log(`[Pipeline] Publish ${previous.publishId} was rejected (${report.detail ?? 'unknown'}), re-posting`);
        return startFresh();
      }

      return fail('confirmation_timeout', `Earlier publish ${previous.publishId} is still processing`);
    } catch (error) {
      if (!signal?.aborted && error instanceof RemoteError && !error.retryable) {
        console.warn(`[Pipeline] Publish ${previous.publishId} cannot be checked (${error.message}), treating it as lost`);
        return startFresh();
      }
      return classify(error, signal, {
        reason: 'confirmation_timeout',
        matches: (e) => e instanceof RemoteError,
      });
    }
  }

  private async writeCaption(item: CatalogItem, signal?: AbortSignal): Promise<StageOutcome<Caption>> {
    try {
      return ok(await abortable(this.deps.captions.write(item, signal), signal));
    } catch (error) {
      return classify(error, signal);
    }
  }

  private async hostMedia(item: CatalogItem, signal?: AbortSignal): Promise<StageOutcome<string>> {
    const source = item.mediaUrl;
    if (!source) {
      return fail('media_unavailable', `Item ${item.itemId} has no media reference`);
    }

    try {
      const url = await retryWithBackoff(() => this.deps.mediaHost.host(source, signal), this.config.hosting, {
        signal,
        sleep: this.sleep,
        isRetryable: (error) => error instanceof HostingError && error.retryable,
        onRetry: (error, n, delay) =>
          console.warn(`[Pipeline] Hosting attempt ${n} failed (${errorMessage(error)}), retrying in ${delay}ms`),
      });
      return ok(url);
    } catch (error) {
      return classify(error, signal, {
        reason: 'media_unavailable',
        matches: (e) => e instanceof HostingError,
      });
    }
  }

  private async initPublish(text: string, publicUrl: string, signal?: AbortSignal): Promise<StageOutcome<string>> {
    try {
      const publishId = await retryWithBackoff(
        async () => {
          const token = await this.deps.credentials.ensureValid(signal);
          return this.deps.publisher.initPublish(
            text,
            publicUrl,
            { privacyLevel: this.config.privacyLevel },
            token,
            signal
          );
        },
        this.config.publishInit,
        {
          signal,
          sleep: this.sleep,
          isRetryable: (error) => error instanceof RemoteError && error.retryable,
          onRetry: (error, n, delay) =>
            console.warn(`[Pipeline] Publish init attempt ${n} failed (${errorMessage(error)}), retrying in ${delay}ms`),
        }
      );
      return ok(publishId);
    } catch (error) {
      return classify(error, signal, {
        reason: 'publish_init_failed',
        matches: (e) => e instanceof RemoteError,
      });
    }
  }

  /**
   * Poll the remote status until it settles or the poll budget is spent.
   * A remote error during a poll counts as a poll that saw no progress.
   */
  private async confirm(publishId: string, signal?: AbortSignal): Promise<StageOutcome<void>> {
    const { maxPolls, pollIntervalMs, maxDelayMs } = this.config.confirmation;

    for (let poll = 1; poll <= maxPolls; poll++) {
      try {
        const token = await this.deps.credentials.ensureValid(signal);
        const report = await abortable(this.deps.publisher.confirmStatus(publishId, token, signal), signal);

        if (report.status === 'published') {
          return ok(undefined);
        }
        if (report.status === 'rejected') {
          return fail('remote_rejected', `Remote rejected publish ${publishId}: ${report.detail ?? 'unknown'}`);
        }
      } catch (error) {
        if (signal?.aborted || !(error instanceof RemoteError)) {
          return classify(error, signal);
        }
        console.warn(`[Pipeline] Status poll ${poll}/${maxPolls} failed: ${errorMessage(error)}`);
      }

      if (poll < maxPolls) {
        try {
          await this.sleep(backoffDelay(poll, pollIntervalMs, maxDelayMs), signal);
        } catch (error) {
          return classify(error, signal);
        }
      }
    }

    return fail(
      'confirmation_timeout',
      `Publish ${publishId} still processing after ${maxPolls} status checks`
    );
  }

  // ===========================================================================
  // ATTEMPT LIFECYCLE
  // ===========================================================================

  private newAttempt(item: CatalogItem, runId: string | null): PostAttempt {
    return {
      id: this.newId(),
      itemId: item.itemId,
      runId,
      postText: null,
      hostedMediaUrl: null,
      publishId: null,
      publishInitiatedAt: null,
      status: 'pending',
      failureReason: null,
      errorMessage: null,
      reconciled: false,
      createdAt: this.clock(),
      completedAt: null,
    };
  }

  private transition(attempt: PostAttempt, next: PostAttemptStatus): void {
    console.log(`[Pipeline] ${attempt.itemId}: ${attempt.status} → ${next}`);
    attempt.status = next;
  }

  private async finalize(attempt: PostAttempt, outcome: StageOutcome<void>): Promise<FinalizedAttempt> {
    const now = this.clock();
    const finalized: FinalizedAttempt = outcome.ok
      ? { ...attempt, status: 'published', failureReason: null, errorMessage: null, completedAt: now }
      : {
          ...attempt,
          status: 'failed',
          failureReason: outcome.reason,
          errorMessage: outcome.error,
          completedAt: now,
        };

    if (finalized.status === 'published') {
      console.log(`[Pipeline] ${attempt.itemId}: ${attempt.status} → published (${finalized.publishId})`);
    } else {
      console.error(
        `[Pipeline] ${attempt.itemId}: ${attempt.status} → failed [${finalized.failureReason}] ${finalized.errorMessage}`
      );
    }

    await this.deps.store.recordOutcome(finalized, now);
    return finalized;
  }
}
