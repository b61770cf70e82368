import pg from 'pg';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';

const { Pool } = pg;

function createPool(): pg.Pool {
  const created = new Pool({
    connectionString: config.DATABASE_URL,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  });

  created.on('error', (err) => {
    logger.error({ err }, 'Unexpected database pool error');
  });

  return created;
}

let pool: pg.Pool = createPool();

export function getPool(): pg.Pool {
  return pool;
}

/** Swaps the pool, e.g. for an in-process database in tests. */
export function setPool(next: pg.Pool): void {
  pool = next;
}

export async function testConnection(): Promise<boolean> {
  try {
    const client = await pool.connect();
    await client.query('SELECT 1');
    client.release();
    logger.info('Database connection established');
    return true;
  } catch (err) {
    logger.error({ err }, 'Failed to connect to database');
    return false;
  }
}

export interface Queryable {
  query<T extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]): Promise<pg.QueryResult<T>>;
}

export async function query<T extends pg.QueryResultRow = pg.QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<pg.QueryResult<T>> {
  const start = Date.now();
  const result = await pool.query<T>(text, params);
  const duration = Date.now() - start;
  logger.debug({ query: text.substring(0, 80), duration, rows: result.rowCount }, 'DB query');
  return result;
}

/**
 * Runs `work` on one checked-out client inside BEGIN/COMMIT and releases it.
 * Any thrown error rolls the transaction back and is rethrown.
 */
export async function withTransaction<T>(work: (client: Queryable) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}

export async function closePool(): Promise<void> {
  await pool.end();
}
