import { PoolClient } from 'pg';
import { logger } from '../utils/logger';

interface HistoryRow {
  keys: string;
}

/**
 * Database operations for the seen-posting history
 * One row per store id holds the whole serialized set
 */
export class HistoryRepository {
  async readKeys(client: PoolClient, storeId: string): Promise<string | null> {
    const result = await client.query<HistoryRow>(
      `SELECT keys FROM job_history WHERE store_id = $1`,
      [storeId]
    );
    return result.rows.length > 0 ? result.rows[0].keys : null;
  }

  async writeKeys(client: PoolClient, storeId: string, serialized: string): Promise<void> {
    try {
      await client.query(
        `INSERT INTO job_history (store_id, keys)
         VALUES ($1, $2)
         ON CONFLICT (store_id)
         DO UPDATE SET
           keys = EXCLUDED.keys,
           updated_at = NOW()`,
        [storeId, serialized]
      );
    } catch (error) {
      logger.error(`Error writing job history`, error, { storeId });
      throw error;
    }
  }

  async deleteKeys(client: PoolClient, storeId: string): Promise<void> {
    await client.query(`DELETE FROM job_history WHERE store_id = $1`, [storeId]);
  }
}
