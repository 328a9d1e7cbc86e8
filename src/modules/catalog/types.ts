/**
 * Catalog Module Types
 */

// =============================================================================
// CATALOG ITEM
// =============================================================================

export interface CatalogItem {
  /** Stable external key, unique across active and inactive items */
  itemId: string;
  name: string;
  price: number | null;
  /** Source image reference, hosted publicly before publishing */
  mediaUrl: string | null;
  category: string | null;
  description: string | null;
  sourceUrl: string | null;
  postCount: number;
  lastPostedAt: Date | null;
  active: boolean;
}

/**
 * Ingestion input. Rotation stats are never set through this path.
 */
export type CatalogItemInput = Pick<CatalogItem, 'itemId' | 'name'> &
  Partial<Pick<CatalogItem, 'price' | 'mediaUrl' | 'category' | 'description' | 'sourceUrl'>>;

// =============================================================================
// POST ATTEMPT
// =============================================================================

export type PostAttemptStatus =
  | 'pending'
  | 'uploading'
  | 'awaiting_confirmation'
  | 'published'
  | 'failed';

export type TerminalStatus = Extract<PostAttemptStatus, 'published' | 'failed'>;

export type FailureReason =
  | 'media_unavailable'
  | 'publish_init_failed'
  | 'remote_rejected'
  | 'confirmation_timeout'
  | 'timeout'
  | 'already_in_progress'
  | 'credential_error'
  | 'unexpected_error';

export interface PostAttempt {
  id: string;
  itemId: string;
  runId: string | null;
  postText: string | null;
  hostedMediaUrl: string | null;
  publishId: string | null;
  /** When the remote first accepted `publishId`; carried over by reconciliation */
  publishInitiatedAt: Date | null;
  status: PostAttemptStatus;
  failureReason: FailureReason | null;
  errorMessage: string | null;
  /** Outcome was taken from an earlier publish instead of a new one */
  reconciled: boolean;
  createdAt: Date;
  completedAt: Date | null;
}

/**
 * A PostAttempt that has reached published or failed
 */
export type FinalizedAttempt = PostAttempt & { status: TerminalStatus; completedAt: Date };

// =============================================================================
// STORE CONTRACT
// =============================================================================

/**
 * Persistence boundary for catalog items and the posting log.
 * Exclusively owns CatalogItem and PostAttempt rows.
 */
export interface CatalogStore {
  /** Active items with well-formed data; malformed rows are skipped */
  listActiveItems(): Promise<CatalogItem[]>;
  getItem(itemId: string): Promise<CatalogItem | undefined>;
  listItems(): Promise<CatalogItem[]>;
  /** Insert or update display attributes; rotation stats are left alone */
  upsertItem(input: CatalogItemInput): Promise<CatalogItem>;
  deactivateItem(itemId: string): Promise<boolean>;
  latestAttempt(itemId: string): Promise<PostAttempt | undefined>;
  recentAttempts(limit: number): Promise<PostAttempt[]>;
  /**
   * Persist a finalized attempt. On `published` the item's postCount is
   * incremented and lastPostedAt set to `now`, in the same transaction.
   */
  recordOutcome(attempt: FinalizedAttempt, now: Date): Promise<void>;
}

export interface ImportResult {
  imported: number;
  skipped: number;
  errors: Array<{ index: number; itemId?: string; issues: string[] }>;
}
