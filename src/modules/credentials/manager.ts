/**
 * Credential Manager
 *
 * Owns the access/refresh token pair for the duration of a run and keeps
 * it usable across unattended, time-triggered invocations.
 *
 * - Refreshes when the token is expired or inside the refresh margin
 * - Bounded retries for transient token-endpoint failures only
 * - A rejected refresh token, or exhausted retries, makes the manager
 *   invalid for the rest of the run: every later call fails fast until
 *   beginRun() starts the next one from the stored record
 * - A new record is persisted before it becomes visible in memory, and it
 *   replaces the previous one as a whole
 */

import { AuthError, CredentialError, TimeoutError, errorMessage } from '../errors/index.js';
import { retryWithBackoff, sleep as defaultSleep } from '../retry/index.js';
import type {
  CredentialManagerConfig,
  CredentialRecord,
  CredentialRepository,
  CredentialState,
  CredentialStatus,
  TokenRefresher,
} from './types.js';

export const DEFAULT_CREDENTIAL_CONFIG: CredentialManagerConfig = {
  refreshMarginMs: 5 * 60 * 1000,
  refresh: {
    maxAttempts: 3,
    baseDelayMs: 1000,
    maxDelayMs: 30000,
  },
};

/**
 * Validity of a record at a point in time, ignoring in-flight refreshes
 */
export function evaluateRecord(
  record: CredentialRecord,
  now: Date,
  refreshMarginMs: number
): Extract<CredentialState, 'valid' | 'near_expiry' | 'expired'> {
  const remaining = record.expiresAt.getTime() - now.getTime();
  if (remaining <= 0) return 'expired';
  if (remaining < refreshMarginMs) return 'near_expiry';
  return 'valid';
}

export interface CredentialManagerOptions {
  clock?: () => Date;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export class CredentialManager {
  private readonly config: CredentialManagerConfig;
  private readonly clock: () => Date;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  private record: CredentialRecord | undefined;
  private loaded = false;
  private invalidReason: string | null = null;
  private inFlightRefresh: Promise<string> | null = null;

  constructor(
    private readonly repository: CredentialRepository,
    private readonly refresher: TokenRefresher,
    config: Partial<CredentialManagerConfig> = {},
    options: CredentialManagerOptions = {}
  ) {
    this.config = { ...DEFAULT_CREDENTIAL_CONFIG, ...config };
    this.clock = options.clock ?? (() => new Date());
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Start a new run. Clears the previous run's failure and rereads the
   * stored record on next use, since another process may have replaced it.
   */
  beginRun(): void {
    this.invalidReason = null;
    if (!this.inFlightRefresh) {
      this.record = undefined;
      this.loaded = false;
    }
  }

  /**
   * Return a usable access token, refreshing first when needed
   *
   * @throws CredentialError when no valid token can be obtained
   */
  async ensureValid(signal?: AbortSignal): Promise<string> {
    if (this.invalidReason !== null) {
      throw new CredentialError(this.invalidReason);
    }

    // Concurrent callers share one refresh
    if (this.inFlightRefresh) {
      return this.inFlightRefresh;
    }

    const record = await this.current();
    if (this.inFlightRefresh) {
      return this.inFlightRefresh;
    }
    if (!record) {
      return this.invalidate('No credential record is stored; run the authorization flow first');
    }

    const state = evaluateRecord(record, this.clock(), this.config.refreshMarginMs);
    if (state === 'valid') {
      return record.accessToken;
    }

    console.log(
      `[Credentials] Access token ${state === 'expired' ? 'has expired' : 'expires soon'} ` +
        `(${record.expiresAt.toISOString()}), refreshing`
    );

    this.inFlightRefresh = this.refresh(record, signal).finally(() => {
      this.inFlightRefresh = null;
    });
    return this.inFlightRefresh;
  }

  /**
   * Current status without side effects: never refreshes or persists
   */
  async inspect(): Promise<CredentialStatus> {
    const record = await this.current();
    const now = this.clock();

    const base = {
      expiresAt: record?.expiresAt ?? null,
      remainingMs: record ? record.expiresAt.getTime() - now.getTime() : null,
      accountId: record?.accountId ?? null,
    };

    if (this.invalidReason !== null) {
      return { ...base, state: 'invalid', reason: this.invalidReason };
    }
    if (this.inFlightRefresh) {
      return { ...base, state: 'refreshing' };
    }
    if (!record) {
      return { ...base, state: 'invalid', reason: 'No credential record is stored' };
    }
    return { ...base, state: evaluateRecord(record, now, this.config.refreshMarginMs) };
  }

  private async current(): Promise<CredentialRecord | undefined> {
    if (!this.loaded) {
      this.record = await this.repository.load();
      this.loaded = true;
    }
    return this.record;
  }

  private async refresh(previous: CredentialRecord, signal?: AbortSignal): Promise<string> {
    let next: CredentialRecord;

    try {
      next = await retryWithBackoff(
        () => this.refresher.refresh(previous.refreshToken),
        this.config.refresh,
        {
          signal,
          sleep: this.sleep,
          isRetryable: (error) => error instanceof AuthError && error.retryable,
          onRetry: (error, attempt, delay) => {
            console.warn(
              `[Credentials] Refresh attempt ${attempt}/${this.config.refresh.maxAttempts} failed ` +
                `(${errorMessage(error)}), retrying in ${delay}ms`
            );
          },
        }
      );

      // Persist first; only a durable record becomes visible
      await this.repository.replace(next);
    } catch (error) {
      // An aborted run says nothing about the refresh token
      if (error instanceof TimeoutError) throw error;
      return this.invalidate(`Token refresh failed: ${errorMessage(error)}`, error);
    }

    this.record = next;
    console.log(`[Credentials] Token refreshed, valid until ${next.expiresAt.toISOString()}`);
    return next.accessToken;
  }

  private invalidate(reason: string, cause?: unknown): never {
    this.invalidReason = reason;
    console.error(`[Credentials] ${reason}`);
    throw new CredentialError(reason, { cause });
  }
}
