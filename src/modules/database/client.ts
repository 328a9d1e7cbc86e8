import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import type { StoreConfig } from '../config/index.js';
import * as schema from './schema.js';

const { Pool } = pg;

export type Database = NodePgDatabase<typeof schema>;

/**
 * Pool plus Drizzle client for one process
 */
export interface DatabaseHandle {
  db: Database;
  pool: pg.Pool;
}

/**
 * Create PostgreSQL connection pool
 */
function createPool(config: StoreConfig): pg.Pool {
  return new Pool({
    connectionString: config.connectionString,
    max: config.maxConnections,
    idleTimeoutMillis: config.idleTimeoutMs,
    connectionTimeoutMillis: config.connectionTimeoutMs,
  });
}

/**
 * Build the connection pool and Drizzle client from explicit config
 */
export function createDatabase(config: StoreConfig): DatabaseHandle {
  const pool = createPool(config);
  const db = drizzle(pool, { schema });
  return { db, pool };
}

export { schema };

/**
 * Check if the database connection is healthy
 */
export async function checkDatabaseHealth(pool: pg.Pool): Promise<boolean> {
  try {
    const client = await pool.connect();
    try {
      await client.query('SELECT 1');
      return true;
    } finally {
      client.release();
    }
  } catch (error) {
    console.error('Database health check failed:', error);
    return false;
  }
}

/**
 * Gracefully close all database connections
 */
export async function closeDatabaseConnection(pool: pg.Pool): Promise<void> {
  try {
    await pool.end();
  } catch (error) {
    console.error('Error closing database connections:', error);
    throw error;
  }
}
