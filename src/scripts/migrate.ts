import dotenv from 'dotenv';
dotenv.config();

import { closePool, getPool } from '../db/client';
import { HISTORY_SCHEMA_SQL } from '../db/schema';
import { logger } from '../utils/logger';

/**
 * Database migration script
 * Creates the job_history table used by HISTORY_BACKEND=postgres
 */
async function migrate(): Promise<void> {
  try {
    logger.info('Starting database migration...');

    await getPool().query(HISTORY_SCHEMA_SQL);

    logger.info('Database migration completed successfully');
    await closePool();
    process.exit(0);
  } catch (error) {
    logger.error('Database migration failed', error);
    process.exit(1);
  }
}

void migrate();
