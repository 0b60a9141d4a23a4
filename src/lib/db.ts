/**
 * PostgreSQL connection pool + transaction helper
 */

import pg from 'pg';
import type { Pool, PoolClient } from 'pg';
import type { DatabaseConfig } from '../config.js';

/** One short-lived job: a small pool, closed by the entry point */
export function createPool(config: DatabaseConfig): Pool {
  return new pg.Pool({
    connectionString: config.connectionString,
    max: 2,
    idleTimeoutMillis: 30000,
  });
}

/**
 * BEGIN → fn → COMMIT; ROLLBACK on any error and rethrow the original error.
 * The client is always released; a client whose ROLLBACK failed is destroyed.
 */
export async function withTransaction<T>(
  pool: Pool,
  fn: (client: PoolClient) => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  let broken: Error | undefined;
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackErr) {
      broken = rollbackErr instanceof Error ? rollbackErr : new Error(String(rollbackErr));
    }
    throw err;
  } finally {
    client.release(broken);
  }
}
