import { Pool, type PoolClient } from 'pg';
import { env } from '../config/env';
import { errorMeta, logger } from './logger';

let pool: Pool | null = null;

export function getDb() {
  if (!pool) {
    pool = new Pool({
      connectionString: env.databaseUrl,
      // Managed Postgres providers usually require SSL
      ssl: env.databaseSsl ? { rejectUnauthorized: false } : undefined,
      connectionTimeoutMillis: 5000,
      // Server-side cap so an abandoned statement cannot hold a game row
      statement_timeout: env.repositoryTimeoutMs,
    });
    pool.on('error', (err) => {
      logger.error('[db] idle client error', errorMeta(err));
    });
  }
  return pool;
}

export async function ensureDb() {
  const p = getDb();
  try {
    await p.query('SELECT 1');
  } catch (err) {
    logger.error('[db] connection test failed', errorMeta(err));
    throw err;
  }
  return p;
}

/**
 * Runs `work` inside BEGIN/COMMIT on a dedicated client. Any error rolls the
 * transaction back and is rethrown; the client is always released.
 */
export async function inTransaction<T>(db: Pool, work: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await db.connect();
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
      logger.warn('[db] rollback failed', errorMeta(rollbackErr));
    });
    throw err;
  } finally {
    client.release();
  }
}

export async function closeDb() {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
