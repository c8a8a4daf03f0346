import type { VercelRequest, VercelResponse } from '@vercel/node';
import { getPool } from '../src/db/client';
import { HISTORY_SCHEMA_SQL } from '../src/db/schema';
import { logger } from '../src/utils/logger';

export interface MigrationResponse {
  status: number;
  body: Record<string, unknown>;
}

/**
 * Creates the job_history table when the bearer token matches the secret
 */
export async function handleMigrationRequest(
  authorization: string | undefined,
  expectedSecret: string | undefined = process.env.MIGRATION_SECRET || process.env.CRON_SECRET
): Promise<MigrationResponse> {
  if (expectedSecret && authorization !== `Bearer ${expectedSecret}`) {
    logger.warn('Unauthorized migration request', { authHeader: authorization ? 'present' : 'missing' });
    return { status: 401, body: { error: 'Unauthorized' } };
  }

  try {
    logger.info('Starting database migration...');
    await getPool().query(HISTORY_SCHEMA_SQL);
    logger.info('Database migration completed successfully');

    return { status: 200, body: { success: true, message: 'job_history table is ready' } };
  } catch (error) {
    logger.error('Database migration failed', error);

    return {
      status: 500,
      body: {
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error',
      },
    };
  }
}

/**
 * Database migration endpoint
 * Secured with MIGRATION_SECRET, falling back to CRON_SECRET
 */
export default async function handler(
  req: VercelRequest,
  res: VercelResponse
): Promise<void> {
  const { status, body } = await handleMigrationRequest(req.headers.authorization);
  res.status(status).json(body);
}
