import { Pool, PoolClient } from 'pg';
import { Config } from '../config';
import { logger } from '../utils/logger';

/**
 * Removes SSL query parameters so the explicit `ssl` option takes precedence
 */
export function stripSslParams(databaseUrl: string): string {
  try {
    const url = new URL(databaseUrl);
    const sslParams = ['sslmode', 'ssl', 'sslcert', 'sslkey', 'sslrootcert', 'sslcrl'];
    sslParams.forEach(param => url.searchParams.delete(param));
    return url.toString();
  } catch {
    // Non-URL connection strings (key=value form) are passed through as is
    return databaseUrl;
  }
}

export function createPool(config: Pick<Config, 'databaseUrl' | 'databaseSsl'>): Pool {
  const pool = new Pool({
    connectionString: stripSslParams(config.databaseUrl),
    // Managed databases commonly present self-signed certificates
    ssl: config.databaseSsl ? { rejectUnauthorized: false } : false,
    // The run is sequential; one connection is in use at a time
    max: 2,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
  });

  pool.on('error', (err) => {
    logger.error('Unexpected error on idle database client', err);
  });

  return pool;
}

/**
 * Checks that a connection can be opened and a query round-trips
 */
export async function verifyConnection(pool: Pool): Promise<void> {
  const client = await pool.connect();
  try {
    await client.query('SELECT 1');
  } finally {
    client.release();
  }
}

export async function withTransaction<T>(
  pool: Pool,
  callback: (client: PoolClient) => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await callback(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      logger.warn('Rollback failed', {
        error: rollbackError instanceof Error ? rollbackError.message : String(rollbackError),
      });
    }
    throw error;
  } finally {
    client.release();
  }
}

export async function closePool(pool: Pool): Promise<void> {
  await pool.end();
}
