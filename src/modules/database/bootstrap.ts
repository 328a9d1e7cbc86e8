import { readFile } from 'fs/promises';
import path from 'path';
import { fileURLToPath } from 'url';
import type pg from 'pg';

// sql/ sits at the package root, three levels above this module in both src/ and dist/
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
export const SCHEMA_SQL_PATH = path.resolve(__dirname, '../../../sql/schema.sql');

/**
 * Apply the idempotent schema DDL.
 *
 * This script:
 * 1. Enables pgcrypto (gen_random_uuid on older PostgreSQL)
 * 2. Creates catalog, posting-log, credential and research tables if missing
 *
 * Runs in one transaction so a failed bootstrap leaves no partial schema.
 */
export async function initStore(pool: pg.Pool, schemaPath: string = SCHEMA_SQL_PATH): Promise<void> {
  const ddl = await readFile(schemaPath, 'utf-8');
  const client = await pool.connect();

  try {
    await client.query('BEGIN');
    await client.query('CREATE EXTENSION IF NOT EXISTS pgcrypto');
    await client.query(ddl);
    await client.query('COMMIT');
    console.log('Store schema is up to date');
  } catch (error) {
    await client.query('ROLLBACK');
    console.error('Store bootstrap failed:', error);
    throw error;
  } finally {
    client.release();
  }
}
