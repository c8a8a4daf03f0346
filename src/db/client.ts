import { Pool, PoolClient } from 'pg';
import { logger } from '../utils/logger';

let pool: Pool | null = null;

function resolveSslConfig(): false | { rejectUnauthorized: boolean } {
  const isProduction =
    process.env.NODE_ENV === 'production' ||
    process.env.VERCEL === '1' ||
    !!process.env.AWS_LAMBDA_FUNCTION_NAME;

  // Managed databases require SSL in production; locally it can be disabled with DATABASE_SSL=false
  if (isProduction) {
    return { rejectUnauthorized: false };
  }
  return process.env.DATABASE_SSL === 'false' ? false : { rejectUnauthorized: false };
}

/**
 * Drops sslmode-style params so the explicit ssl config takes precedence
 */
export function cleanConnectionString(databaseUrl: string): string {
  try {
    const url = new URL(databaseUrl);
    const sslParams = ['sslmode', 'ssl', 'sslcert', 'sslkey', 'sslrootcert', 'sslcrl'];
    sslParams.forEach(param => url.searchParams.delete(param));
    return url.toString();
  } catch {
    // Non-URL connection strings are passed through unchanged
    return databaseUrl;
  }
}

export function getPool(databaseUrl: string | undefined = process.env.DATABASE_URL): Pool {
  if (!pool) {
    if (!databaseUrl) {
      throw new Error('DATABASE_URL environment variable is not set');
    }

    pool = new Pool({
      connectionString: cleanConnectionString(databaseUrl),
      ssl: resolveSslConfig(),
      // A run holds at most one connection
      max: 2,
      idleTimeoutMillis: 10000,
      connectionTimeoutMillis: 5000,
    });

    pool.on('error', (err) => {
      logger.error('Unexpected error on idle database client', err);
    });
  }

  return pool;
}

export async function withTransaction<T>(
  callback: (client: PoolClient) => Promise<T>,
  databaseUrl?: string
): Promise<T> {
  const client = await getPool(databaseUrl).connect();
  try {
    await client.query('BEGIN');
    const result = await callback(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
