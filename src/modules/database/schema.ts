import { sql } from 'drizzle-orm';
import {
  pgTable,
  uuid,
  varchar,
  text,
  timestamp,
  boolean,
  integer,
  index,
  uniqueIndex,
  check,
  jsonb,
} from 'drizzle-orm/pg-core';
import type { Recommendation } from '../research/types.js';

// =============================================================================
// CATALOG ITEMS TABLE
// =============================================================================
/**
 * Items eligible for posting, with their rotation stats.
 * Rows are created by ingestion and deactivated, never deleted.
 */
export const catalogItems = pgTable(
  'catalog_items',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    itemId: varchar('item_id', { length: 255 }).notNull().unique(),
    name: text('name').notNull(),
    price: integer('price'),
    mediaUrl: text('media_url'),
    category: varchar('category', { length: 255 }),
    description: text('description'),
    sourceUrl: text('source_url'),
    postCount: integer('post_count').notNull().default(0),
    lastPostedAt: timestamp('last_posted_at', { withTimezone: true }),
    isActive: boolean('is_active').notNull().default(true),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('catalog_items_item_id_unique_idx').on(table.itemId),
    // Rotation order: never posted first, then fewest posts, then oldest post
    index('catalog_items_rotation_idx').on(table.isActive, table.postCount, table.lastPostedAt),
  ]
);

// =============================================================================
// POST ATTEMPTS TABLE
// =============================================================================
/**
 * Append-only audit trail: one row per pipeline invocation.
 */
export const postAttempts = pgTable(
  'post_attempts',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    itemId: varchar('item_id', { length: 255 })
      .notNull()
      .references(() => catalogItems.itemId),
    runId: uuid('run_id'),
    postText: text('post_text'),
    hostedMediaUrl: text('hosted_media_url'),
    publishId: varchar('publish_id', { length: 255 }),
    publishInitiatedAt: timestamp('publish_initiated_at', { withTimezone: true }),
    status: varchar('status', { length: 32 }).notNull().default('pending'),
    failureReason: varchar('failure_reason', { length: 64 }),
    errorMessage: text('error_message'),
    reconciled: boolean('reconciled').notNull().default(false),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    completedAt: timestamp('completed_at', { withTimezone: true }),
  },
  (table) => [
    index('post_attempts_item_id_created_at_idx').on(table.itemId, table.createdAt),
    index('post_attempts_status_idx').on(table.status),
  ]
);

// =============================================================================
// CREDENTIALS TABLE
// =============================================================================
/**
 * Single-row table holding the authoritative token pair.
 * A refresh replaces the whole row in one statement.
 */
export const credentials = pgTable(
  'credentials',
  {
    id: integer('id').primaryKey().default(1),
    accessToken: text('access_token').notNull(),
    refreshToken: text('refresh_token').notNull(),
    expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
    accountId: varchar('account_id', { length: 255 }),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [check('credentials_singleton_chk', sql`${table.id} = 1`)]
);

// =============================================================================
// RESEARCH LOGS TABLE
// =============================================================================
/**
 * Product suggestions from each research run, newest read back by `research latest`.
 */
export const researchLogs = pgTable(
  'research_logs',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    researchedAt: timestamp('research_date', { withTimezone: true }).notNull().defaultNow(),
    recommendations: jsonb('recommendations').$type<Recommendation[]>().notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('research_logs_research_date_idx').on(table.researchedAt)]
);

// =============================================================================
// TYPE EXPORTS
// =============================================================================
export type CatalogItemRow = typeof catalogItems.$inferSelect;
export type NewCatalogItemRow = typeof catalogItems.$inferInsert;

export type PostAttemptRow = typeof postAttempts.$inferSelect;
export type NewPostAttemptRow = typeof postAttempts.$inferInsert;

export type CredentialRow = typeof credentials.$inferSelect;
export type NewCredentialRow = typeof credentials.$inferInsert;

export type ResearchLogRow = typeof researchLogs.$inferSelect;
export type NewResearchLogRow = typeof researchLogs.$inferInsert;
