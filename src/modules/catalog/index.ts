/**
 * Catalog Module
 *
 * Catalog items, the append-only posting log, and the store contract over them.
 */

export {
  type CatalogItem,
  type CatalogItemInput,
  type CatalogStore,
  type FailureReason,
  type FinalizedAttempt,
  type ImportResult,
  type PostAttempt,
  type PostAttemptStatus,
  type TerminalStatus,
} from './types.js';

export {
  catalogItemInputSchema,
  catalogItemSchema,
  keepValidItems,
  parseCatalogItem,
  parseCatalogItemInput,
} from './validation.js';

export { DrizzleCatalogStore, rowToAttempt, rowToItemShape } from './store.js';

export { importItems, importItemsFromFile, parseCatalogCsv } from './importer.js';
