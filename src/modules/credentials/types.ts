/**
 * Credential Module Types
 */

/**
 * The authoritative access/refresh token pair. Singleton per deployment.
 */
export interface CredentialRecord {
  accessToken: string;
  refreshToken: string;
  /** Absolute expiry of the access token */
  expiresAt: Date;
  /** External account identifier (open_id) */
  accountId: string | null;
}

/**
 * Validity states of the stored token pair
 *
 * valid ──(margin reached)──> near_expiry ──┐
 *                              expired ─────┴─ ensureValid() ─> refreshing ─> valid | invalid
 *
 * invalid is terminal for the current run; beginRun() starts the next
 * run from the stored record.
 */
export type CredentialState = 'valid' | 'near_expiry' | 'expired' | 'refreshing' | 'invalid';

export interface CredentialStatus {
  state: CredentialState;
  expiresAt: Date | null;
  /** Milliseconds until expiry, negative once expired */
  remainingMs: number | null;
  accountId: string | null;
  /** Why the credential is invalid, when it is */
  reason?: string;
}

/**
 * Persistence for the single credential record.
 * `replace` must swap the whole record in one atomic write.
 */
export interface CredentialRepository {
  load(): Promise<CredentialRecord | undefined>;
  replace(record: CredentialRecord): Promise<void>;
}

/**
 * Token endpoint collaborator
 *
 * @throws AuthError, retryable for transient failures
 */
export interface TokenRefresher {
  refresh(refreshToken: string): Promise<CredentialRecord>;
}

export interface CredentialManagerConfig {
  /** Refresh once remaining lifetime falls below this */
  refreshMarginMs: number;
  refresh: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
  };
}
