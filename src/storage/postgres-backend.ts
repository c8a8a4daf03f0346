import { HistoryBackend } from './history-backend';
import { HistoryRepository } from '../db/history';
import { withTransaction } from '../db/client';

/**
 * Keeps the seen-set in one row of the job_history table
 */
export class PostgresHistoryBackend implements HistoryBackend {
  readonly description: string;

  constructor(
    private readonly storeId: string,
    private readonly databaseUrl?: string,
    private readonly repository: HistoryRepository = new HistoryRepository()
  ) {
    this.description = `postgres job_history[${storeId}]`;
  }

  async read(): Promise<string | null> {
    return withTransaction(
      client => this.repository.readKeys(client, this.storeId),
      this.databaseUrl
    );
  }

  async write(serialized: string): Promise<void> {
    await withTransaction(
      client => this.repository.writeKeys(client, this.storeId, serialized),
      this.databaseUrl
    );
  }

  async clear(): Promise<void> {
    await withTransaction(
      client => this.repository.deleteKeys(client, this.storeId),
      this.databaseUrl
    );
  }
}
