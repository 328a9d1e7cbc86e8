import type {
  CatalogItem,
  CatalogItemInput,
  CatalogStore,
  FinalizedAttempt,
  PostAttempt,
} from '../../src/modules/catalog/types.js';

export function makeItem(overrides: Partial<CatalogItem> & Pick<CatalogItem, 'itemId'>): CatalogItem {
  return {
    name: `Item ${overrides.itemId}`,
    price: null,
    mediaUrl: `https://img.example.com/${overrides.itemId}.jpg`,
    category: null,
    description: null,
    sourceUrl: null,
    postCount: 0,
    lastPostedAt: null,
    active: true,
    ...overrides,
  };
}

export function makeAttempt(overrides: Partial<PostAttempt> & Pick<PostAttempt, 'itemId'>): PostAttempt {
  return {
    id: `attempt-${overrides.itemId}`,
    runId: null,
    postText: null,
    hostedMediaUrl: null,
    publishId: null,
    publishInitiatedAt: null,
    status: 'failed',
    failureReason: null,
    errorMessage: null,
    reconciled: false,
    createdAt: new Date('2026-01-01T00:00:00Z'),
    completedAt: null,
    ...overrides,
  };
}

/**
 * In-process CatalogStore with the same outcome semantics as the SQL store
 */
export class MemoryCatalogStore implements CatalogStore {
  readonly items = new Map<string, CatalogItem>();
  readonly attempts: PostAttempt[] = [];

  constructor(items: CatalogItem[] = [], attempts: PostAttempt[] = []) {
    for (const item of items) this.items.set(item.itemId, { ...item });
    this.attempts.push(...attempts);
  }

  async listActiveItems(): Promise<CatalogItem[]> {
    return (await this.listItems()).filter((item) => item.active);
  }

  async listItems(): Promise<CatalogItem[]> {
    return [...this.items.values()]
      .sort((a, b) => (a.itemId < b.itemId ? -1 : a.itemId > b.itemId ? 1 : 0))
      .map((item) => ({ ...item }));
  }

  async getItem(itemId: string): Promise<CatalogItem | undefined> {
    const item = this.items.get(itemId);
    return item ? { ...item } : undefined;
  }

  async upsertItem(input: CatalogItemInput): Promise<CatalogItem> {
    const existing = this.items.get(input.itemId);
    const item: CatalogItem = {
      itemId: input.itemId,
      name: input.name,
      price: input.price ?? null,
      mediaUrl: input.mediaUrl ?? null,
      category: input.category ?? null,
      description: input.description ?? null,
      sourceUrl: input.sourceUrl ?? null,
      postCount: existing?.postCount ?? 0,
      lastPostedAt: existing?.lastPostedAt ?? null,
      active: existing?.active ?? true,
    };
    this.items.set(item.itemId, item);
    return { ...item };
  }

  async deactivateItem(itemId: string): Promise<boolean> {
    const item = this.items.get(itemId);
    if (!item) return false;
    item.active = false;
    return true;
  }

  async latestAttempt(itemId: string): Promise<PostAttempt | undefined> {
    const matching = this.attempts.filter((attempt) => attempt.itemId === itemId);
    return matching[matching.length - 1];
  }

  async recentAttempts(limit: number): Promise<PostAttempt[]> {
    return [...this.attempts].reverse().slice(0, limit);
  }

  async recordOutcome(attempt: FinalizedAttempt, now: Date): Promise<void> {
    this.attempts.push({ ...attempt });
    if (attempt.status === 'published') {
      const item = this.items.get(attempt.itemId);
      if (item) {
        item.postCount += 1;
        item.lastPostedAt = now;
      }
    }
  }
}
