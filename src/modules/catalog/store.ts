import { eq, desc, asc, sql } from 'drizzle-orm';
import type { Database } from '../database/client.js';
import {
  catalogItems,
  postAttempts,
  type CatalogItemRow,
  type PostAttemptRow,
} from '../database/schema.js';
import { keepValidItems, parseCatalogItem } from './validation.js';
import type {
  CatalogItem,
  CatalogItemInput,
  CatalogStore,
  FailureReason,
  FinalizedAttempt,
  PostAttempt,
  PostAttemptStatus,
} from './types.js';

const ATTEMPT_STATUSES: readonly PostAttemptStatus[] = [
  'pending',
  'uploading',
  'awaiting_confirmation',
  'published',
  'failed',
];

const FAILURE_REASONS: readonly FailureReason[] = [
  'media_unavailable',
  'publish_init_failed',
  'remote_rejected',
  'confirmation_timeout',
  'timeout',
  'already_in_progress',
  'credential_error',
  'unexpected_error',
];

function isAttemptStatus(value: string): value is PostAttemptStatus {
  return (ATTEMPT_STATUSES as readonly string[]).includes(value);
}

function isFailureReason(value: string): value is FailureReason {
  return (FAILURE_REASONS as readonly string[]).includes(value);
}

// =============================================================================
// ROW MAPPING
// =============================================================================

export function rowToItemShape(row: CatalogItemRow): Record<string, unknown> {
  return {
    itemId: row.itemId,
    name: row.name,
    price: row.price,
    mediaUrl: row.mediaUrl,
    category: row.category,
    description: row.description,
    sourceUrl: row.sourceUrl,
    postCount: row.postCount,
    lastPostedAt: row.lastPostedAt,
    active: row.isActive,
  };
}

export function rowToAttempt(row: PostAttemptRow): PostAttempt {
  // Unknown values written by older releases read back as a failed attempt
  const status = isAttemptStatus(row.status) ? row.status : 'failed';
  const failureReason =
    row.failureReason && isFailureReason(row.failureReason) ? row.failureReason : null;

  return {
    id: row.id,
    itemId: row.itemId,
    runId: row.runId,
    postText: row.postText,
    hostedMediaUrl: row.hostedMediaUrl,
    publishId: row.publishId,
    publishInitiatedAt: row.publishInitiatedAt,
    status,
    failureReason,
    errorMessage: row.errorMessage,
    reconciled: row.reconciled,
    createdAt: row.createdAt,
    completedAt: row.completedAt,
  };
}

// =============================================================================
// DRIZZLE STORE
// =============================================================================

/**
 * CatalogStore backed by PostgreSQL
 */
export class DrizzleCatalogStore implements CatalogStore {
  constructor(private readonly db: Database) {}

  async listActiveItems(): Promise<CatalogItem[]> {
    const rows = await this.db
      .select()
      .from(catalogItems)
      .where(eq(catalogItems.isActive, true))
      .orderBy(asc(catalogItems.itemId));
    return keepValidItems(rows.map(rowToItemShape));
  }

  async listItems(): Promise<CatalogItem[]> {
    const rows = await this.db.select().from(catalogItems).orderBy(asc(catalogItems.itemId));
    return keepValidItems(rows.map(rowToItemShape));
  }

  async getItem(itemId: string): Promise<CatalogItem | undefined> {
    const [row] = await this.db.select().from(catalogItems).where(eq(catalogItems.itemId, itemId));
    return row ? parseCatalogItem(rowToItemShape(row)) : undefined;
  }

  async upsertItem(input: CatalogItemInput): Promise<CatalogItem> {
    const attributes = {
      name: input.name,
      price: input.price ?? null,
      mediaUrl: input.mediaUrl ?? null,
      category: input.category ?? null,
      description: input.description ?? null,
      sourceUrl: input.sourceUrl ?? null,
    };

    const [row] = await this.db
      .insert(catalogItems)
      .values({ itemId: input.itemId, ...attributes })
      .onConflictDoUpdate({
        target: catalogItems.itemId,
        set: { ...attributes, updatedAt: new Date() },
      })
      .returning();

    return parseCatalogItem(rowToItemShape(row));
  }

  async deactivateItem(itemId: string): Promise<boolean> {
    const result = await this.db
      .update(catalogItems)
      .set({ isActive: false, updatedAt: new Date() })
      .where(eq(catalogItems.itemId, itemId))
      .returning({ id: catalogItems.id });
    return result.length > 0;
  }

  async latestAttempt(itemId: string): Promise<PostAttempt | undefined> {
    const [row] = await this.db
      .select()
      .from(postAttempts)
      .where(eq(postAttempts.itemId, itemId))
      .orderBy(desc(postAttempts.createdAt))
      .limit(1);
    return row ? rowToAttempt(row) : undefined;
  }

  async recentAttempts(limit: number): Promise<PostAttempt[]> {
    const rows = await this.db
      .select()
      .from(postAttempts)
      .orderBy(desc(postAttempts.createdAt))
      .limit(limit);
    return rows.map(rowToAttempt);
  }

  async recordOutcome(attempt: FinalizedAttempt, now: Date): Promise<void> {
    await this.db.transaction(async (tx) => {
      await tx.insert(postAttempts).values({
        id: attempt.id,
        itemId: attempt.itemId,
        runId: attempt.runId,
        postText: attempt.postText,
        hostedMediaUrl: attempt.hostedMediaUrl,
        publishId: attempt.publishId,
        publishInitiatedAt: attempt.publishInitiatedAt,
        status: attempt.status,
        failureReason: attempt.failureReason,
        errorMessage: attempt.errorMessage,
        reconciled: attempt.reconciled,
        createdAt: attempt.createdAt,
        completedAt: attempt.completedAt,
      });

      if (attempt.status === 'published') {
        await tx
          .update(catalogItems)
          .set({
            postCount: sql`${catalogItems.postCount} + 1`,
            lastPostedAt: now,
            updatedAt: now,
          })
          .where(eq(catalogItems.itemId, attempt.itemId));
      }
    });
  }
}
