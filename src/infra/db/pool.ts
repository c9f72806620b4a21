import pg from 'pg';
import dotenv from 'dotenv';
import { logger } from '../logger.js';

dotenv.config();

const { Pool, types } = pg;

// DATE columns come back as YYYY-MM-DD strings instead of local-midnight Dates
const DATE_OID = 1082;
types.setTypeParser(DATE_OID, (value: string) => value);

export type Db = pg.Pool;

// Do not throw at import time - allow unit tests to run without DATABASE_URL
// The pool will fail when actually used if DATABASE_URL is missing
export const pool: Db = new Pool({
  connectionString: process.env.DATABASE_URL,
  max: 20,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 2000,
});

pool.on('connect', () => {
  logger.debug('Database connection established');
});

pool.on('error', (err) => {
  logger.error({ err }, 'Unexpected database error');
});

/**
 * Run `work` inside BEGIN/COMMIT on a dedicated client, rolling back on any
 * error.
 */
export async function withTransaction<T>(
  db: Db,
  work: (client: pg.PoolClient) => Promise<T>
): Promise<T> {
  const client = await db.connect();
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}
