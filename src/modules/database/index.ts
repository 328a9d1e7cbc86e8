/**
 * Database Module
 *
 * Type-safe store access via Drizzle ORM over PostgreSQL.
 */

export {
  createDatabase,
  checkDatabaseHealth,
  closeDatabaseConnection,
  schema,
  type Database,
  type DatabaseHandle,
} from './client.js';

export { initStore, SCHEMA_SQL_PATH } from './bootstrap.js';

export {
  catalogItems,
  postAttempts,
  credentials,
  type CatalogItemRow,
  type NewCatalogItemRow,
  type PostAttemptRow,
  type NewPostAttemptRow,
  type CredentialRow,
  type NewCredentialRow,
} from './schema.js';
