// src/config/database.ts
import pg from 'pg';
import { logger } from '../utils/logger.js';
import { ENVIRONMENT } from './environment.js';

export type QueryFn = <T extends pg.QueryResultRow>(text: string, params?: unknown[]) => Promise<pg.QueryResult<T>>;

/** Row-level view of a query for callers that validate rows themselves. */
export type RowQueryFn = (text: string, params?: unknown[]) => Promise<{ rows: unknown[] }>;

let pool: pg.Pool | null = null;

/**
 * Lazily create the shared pool; nothing connects until the first query.
 */
export function getPool(): pg.Pool {
  if (pool) return pool;

  pool = new pg.Pool({
    connectionString: ENVIRONMENT.DATABASE_URL,
    host: ENVIRONMENT.DB_HOST,
    port: ENVIRONMENT.DB_PORT,
    database: ENVIRONMENT.DB_NAME,
    user: ENVIRONMENT.DB_USER,
    password: ENVIRONMENT.DB_PASSWORD,
    ssl: ENVIRONMENT.DB_SSL ? { rejectUnauthorized: false } : undefined,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
    statement_timeout: ENVIRONMENT.STORE_TIMEOUT_MS,
  });

  pool.on('error', (err) => {
    logger.error('Unexpected database error', { error: err.message });
  });

  return pool;
}

export const query: QueryFn = async <T extends pg.QueryResultRow>(text: string, params: unknown[] = []) => {
  const start = Date.now();
  try {
    const res = await getPool().query<T>(text, params);
    logger.debug('Executed query', { duration: Date.now() - start, rows: res.rowCount });
    return res;
  } catch (error) {
    logger.error('Database query error', { error: error instanceof Error ? error.message : String(error) });
    throw error;
  }
};

export async function closePool(): Promise<void> {
  if (pool) {
    const closing = pool;
    pool = null;
    await closing.end();
  }
}
