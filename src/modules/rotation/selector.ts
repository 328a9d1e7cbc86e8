/**
 * Rotation Selector
 *
 * Decides which catalog item is due next. Pure: it never mutates the items
 * it is given, and repeated calls over the same input return the same item.
 * An item is only "consumed" when the pipeline records a successful publish.
 *
 * Order (first criterion wins):
 * 1. Never posted (no lastPostedAt) before posted at least once
 * 2. Fewer posts first
 * 3. Older lastPostedAt first (absent counts as earliest)
 * 4. itemId ascending
 */

import type { CatalogItem } from '../catalog/types.js';

type RotationFields = Pick<CatalogItem, 'itemId' | 'postCount' | 'lastPostedAt'>;

/**
 * Total order over items by rotation priority. Negative means `a` is due first.
 */
export function compareRotation(a: RotationFields, b: RotationFields): number {
  const aNever = a.lastPostedAt === null;
  const bNever = b.lastPostedAt === null;
  if (aNever !== bNever) return aNever ? -1 : 1;

  if (a.postCount !== b.postCount) return a.postCount - b.postCount;

  const aTime = a.lastPostedAt?.getTime() ?? Number.NEGATIVE_INFINITY;
  const bTime = b.lastPostedAt?.getTime() ?? Number.NEGATIVE_INFINITY;
  if (aTime !== bTime) return aTime < bTime ? -1 : 1;

  // Code-unit comparison keeps the order locale-independent
  if (a.itemId === b.itemId) return 0;
  return a.itemId < b.itemId ? -1 : 1;
}

/**
 * Active items in the order they are due
 */
export function rankItems<T extends RotationFields & Pick<CatalogItem, 'active'>>(items: readonly T[]): T[] {
  return items.filter((item) => item.active).sort(compareRotation);
}

/**
 * Pick the next item to post, or undefined when no active item exists
 */
export function selectNext<T extends RotationFields & Pick<CatalogItem, 'active'>>(
  items: readonly T[]
): T | undefined {
  let next: T | undefined;

  for (const item of items) {
    if (!item.active) continue;
    if (next === undefined || compareRotation(item, next) < 0) {
      next = item;
    }
  }

  return next;
}
