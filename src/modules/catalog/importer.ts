import { readFile } from 'fs/promises';
import { extname } from 'path';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { ValidationError } from '../errors/index.js';
import { parseCatalogItemInput } from './validation.js';
import type { CatalogItemInput, CatalogStore, ImportResult } from './types.js';

/**
 * CSV header → item field. Both the spreadsheet export headers and the
 * field names themselves are accepted.
 */
const CSV_COLUMNS = new Map<string, keyof CatalogItemInput>([
  ['item_id', 'itemId'],
  ['itemId', 'itemId'],
  ['item_name', 'name'],
  ['name', 'name'],
  ['price', 'price'],
  ['image_url', 'mediaUrl'],
  ['mediaUrl', 'mediaUrl'],
  ['category', 'category'],
  ['description', 'description'],
  ['affiliate_url', 'sourceUrl'],
  ['sourceUrl', 'sourceUrl'],
]);

const csvRowsSchema = z.array(z.record(z.string()));

/**
 * Upsert a batch of raw item payloads. Invalid entries are skipped and
 * reported; valid ones are written one by one.
 */
export async function importItems(store: CatalogStore, entries: unknown[]): Promise<ImportResult> {
  const result: ImportResult = { imported: 0, skipped: 0, errors: [] };

  for (const [index, entry] of entries.entries()) {
    try {
      const input = parseCatalogItemInput(entry);
      await store.upsertItem(input);
      result.imported++;
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;

      const itemId =
        typeof entry === 'object' && entry !== null && 'itemId' in entry && typeof entry.itemId === 'string'
          ? entry.itemId
          : undefined;
      result.skipped++;
      result.errors.push({ index, itemId, issues: error.issues });
      console.warn(`[Catalog] Skipping entry #${index}${itemId ? ` (${itemId})` : ''}: ${error.issues.join('; ')}`);
    }
  }

  return result;
}

/**
 * Turn CSV text with a header row into item payloads. Unknown columns are
 * ignored; blank cells are left out so optional fields stay unset.
 */
export function parseCatalogCsv(raw: string): Record<string, unknown>[] {
  let records: unknown;
  try {
    records = parse(raw, { columns: true, skip_empty_lines: true, trim: true, bom: true });
  } catch (error) {
    throw new ValidationError('Catalog CSV could not be parsed', [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  return csvRowsSchema.parse(records).map((row) => {
    const entry: Record<string, unknown> = {};
    for (const [header, value] of Object.entries(row)) {
      const field = CSV_COLUMNS.get(header);
      if (!field || value === '') continue;
      entry[field] = field === 'price' ? parsePrice(value) : value;
    }
    return entry;
  });
}

/**
 * "1,980" → 1980. Anything else is passed through for validation to reject.
 */
function parsePrice(value: string): number | string {
  const digits = value.replace(/,/g, '');
  return /^\d+$/.test(digits) ? Number(digits) : value;
}

/**
 * Import items from a file: a CSV with a header row when the name ends in
 * .csv, otherwise a JSON array of item payloads
 */
export async function importItemsFromFile(store: CatalogStore, filePath: string): Promise<ImportResult> {
  const raw = await readFile(filePath, 'utf-8');

  if (extname(filePath).toLowerCase() === '.csv') {
    return importItems(store, parseCatalogCsv(raw));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(`${filePath} is not valid JSON`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  if (!Array.isArray(parsed)) {
    throw new ValidationError(`${filePath} must contain a JSON array of items`);
  }

  return importItems(store, parsed);
}
