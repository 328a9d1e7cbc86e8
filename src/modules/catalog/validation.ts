import { z } from 'zod';
import { ValidationError } from '../errors/index.js';
import type { CatalogItem, CatalogItemInput } from './types.js';

const optionalText = z
  .string()
  .trim()
  .nullish()
  .transform((value) => (value ? value : null));

// =============================================================================
// VALIDATION SCHEMAS
// =============================================================================

/**
 * Ingestion payload for one catalog item
 */
export const catalogItemInputSchema = z.object({
  itemId: z.string().trim().min(1, 'itemId must not be empty').max(255),
  name: z.string().trim().min(1, 'name must not be empty'),
  price: z.number().int().nonnegative().nullish().transform((value) => value ?? null),
  mediaUrl: z.string().url().nullish().transform((value) => value ?? null),
  category: optionalText,
  description: optionalText,
  sourceUrl: z.string().url().nullish().transform((value) => value ?? null),
});

/**
 * Stored item as read back from the catalog table
 */
export const catalogItemSchema = z.object({
  itemId: z.string().min(1),
  name: z.string().min(1),
  price: z.number().int().nullable(),
  mediaUrl: z.string().nullable(),
  category: z.string().nullable(),
  description: z.string().nullable(),
  sourceUrl: z.string().nullable(),
  postCount: z.number().int().nonnegative(),
  lastPostedAt: z.date().nullable(),
  active: z.boolean(),
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || 'item'}: ${issue.message}`);
}

/**
 * Validate a stored item
 *
 * @throws ValidationError when the row is malformed
 */
export function parseCatalogItem(value: unknown): CatalogItem {
  const result = catalogItemSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError('Malformed catalog item', formatIssues(result.error));
  }
  return result.data;
}

/**
 * Validate an ingestion payload
 *
 * @throws ValidationError when the payload is malformed
 */
export function parseCatalogItemInput(value: unknown): CatalogItemInput {
  const result = catalogItemInputSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError('Invalid catalog item input', formatIssues(result.error));
  }
  return result.data;
}

/**
 * Keep well-formed items, warn about the rest
 */
export function keepValidItems(values: unknown[]): CatalogItem[] {
  const items: CatalogItem[] = [];

  for (const value of values) {
    try {
      items.push(parseCatalogItem(value));
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      console.warn(`[Catalog] Skipping malformed item: ${error.issues.join('; ')}`);
    }
  }

  return items;
}
