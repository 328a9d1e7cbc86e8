/**
 * Publisher Module Types
 *
 * Contracts for the external collaborators the pipeline drives, and the
 * values it passes between its stages.
 */

import type { CatalogItem, FailureReason, FinalizedAttempt } from '../catalog/types.js';
import type { PrivacyLevel, RetryPolicy } from '../config/index.js';

// =============================================================================
// COLLABORATORS
// =============================================================================

/**
 * Makes a source image reachable at a durable public URL
 */
export interface MediaHost {
  /** @throws HostingError */
  host(sourceUrl: string, signal?: AbortSignal): Promise<string>;
}

export type RemoteStatus = 'processing' | 'published' | 'rejected';

export interface StatusReport {
  status: RemoteStatus;
  /** Remote-side explanation for a rejection */
  detail?: string;
}

export interface PublishOptions {
  privacyLevel: PrivacyLevel;
  disableComment?: boolean;
  autoAddMusic?: boolean;
}

/**
 * Remote content API. Both calls authenticate with a bearer access token.
 */
export interface ContentPublisher {
  /** @throws RemoteError */
  initPublish(
    text: string,
    publicUrl: string,
    options: PublishOptions,
    accessToken: string,
    signal?: AbortSignal
  ): Promise<string>;

  /** @throws RemoteError */
  confirmStatus(publishId: string, accessToken: string, signal?: AbortSignal): Promise<StatusReport>;
}

export interface Caption {
  body: string;
  hashtags: string[];
  /** Body and hashtags as posted */
  fullText: string;
}

export interface CaptionWriter {
  /** Rejects once `signal` aborts */
  write(item: CatalogItem, signal?: AbortSignal): Promise<Caption>;
}

/**
 * The slice of CredentialManager the pipeline depends on
 */
export interface AccessTokenSource {
  /** @throws CredentialError */
  ensureValid(signal?: AbortSignal): Promise<string>;
}

// =============================================================================
// PIPELINE
// =============================================================================

/**
 * Result of one pipeline stage. Stages never throw for expected failures.
 */
export type StageOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; reason: FailureReason; error: string };

export interface ConfirmationPolicy {
  maxPolls: number;
  pollIntervalMs: number;
  maxDelayMs: number;
}

export interface PipelineConfig {
  hosting: RetryPolicy;
  publishInit: RetryPolicy;
  confirmation: ConfirmationPolicy;
  /** How long an unconfirmed publish is checked before re-publishing the item */
  reconcileWindowMs: number;
  privacyLevel: PrivacyLevel;
}

export interface ExecuteOptions {
  runId?: string | null;
  dryRun?: boolean;
  signal?: AbortSignal;
}

export interface DryRunPreview {
  itemId: string;
  text: string;
  mediaSource: string | null;
}

export type PipelineOutcome =
  | { kind: 'recorded'; attempt: FinalizedAttempt }
  | { kind: 'dry_run'; preview: DryRunPreview };
