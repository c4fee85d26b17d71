import pg from 'pg';
import type { Pool } from 'pg';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import * as schema from './schema.js';

export type Database = NodePgDatabase<typeof schema>;

export interface DatabaseOptions {
  url: string;
  minConnections?: number;
  maxConnections?: number;
}

let pool: Pool | null = null;
let db: Database | null = null;

const UNIQUE_VIOLATION = '23505';

/**
 * Initialize the connection pool and drizzle client
 */
export function initializeDatabase(options: DatabaseOptions): Database {
  if (db) {
    return db;
  }

  pool = new pg.Pool({
    connectionString: options.url,
    min: options.minConnections,
    max: options.maxConnections,
  });
  db = drizzle(pool, { schema });

  return db;
}

/**
 * Get the current database client
 * Throws if not initialized
 */
export function getDb(): Database {
  if (!db) {
    throw new Error('Database not initialized');
  }
  return db;
}

/**
 * Run raw SQL on the pool (schema bootstrap)
 */
export async function executeSql(text: string): Promise<void> {
  if (!pool) {
    throw new Error('Database not initialized');
  }
  await pool.query(text);
}

/**
 * Close the connection pool
 */
export async function closeDatabase(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    db = null;
  }
}

/**
 * True for a PostgreSQL unique constraint violation, also when wrapped
 */
export function isUniqueViolation(error: unknown): boolean {
  if (error instanceof pg.DatabaseError) {
    return error.code === UNIQUE_VIOLATION;
  }
  if (error instanceof Error && error.cause !== undefined) {
    return isUniqueViolation(error.cause);
  }
  return false;
}
