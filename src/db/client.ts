import { Pool, type ClientBase, type PoolClient } from 'pg';
import { logger } from '../logger.js';
import { FatalStoreError } from '../lib/errors.js';
import { getErrorMessage } from '../utils/error-handlers.js';
import { sanitizeConnectionUrl } from '../utils/url-sanitizer.js';

/**
 * Anything that can run a query: the pool itself or a checked-out client
 * inside a transaction.
 */
export type Queryable = Pick<ClientBase, 'query'>;

export function createPool(databaseUrl: string): Pool {
  const pool = new Pool({
    connectionString: databaseUrl,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  pool.on('error', (error: Error) => {
    logger.error('Idle Postgres client error', {
      error: error.message,
      url: sanitizeConnectionUrl(databaseUrl),
    });
  });

  return pool;
}

/**
 * Runs `fn` inside BEGIN/COMMIT on a dedicated client. Any throw rolls the
 * whole transaction back and is rethrown unchanged.
 */
export async function withTransaction<T>(
  pool: Pool,
  fn: (client: PoolClient) => Promise<T>
): Promise<T> {
  let client: PoolClient;
  try {
    client = await pool.connect();
  } catch (error) {
    throw new FatalStoreError('Could not acquire a database connection', error);
  }

  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      logger.error('Transaction rollback failed', {
        error: getErrorMessage(rollbackError),
        originalError: getErrorMessage(error),
      });
    }
    throw error;
  } finally {
    client.release();
  }
}
