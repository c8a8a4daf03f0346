import { HistoryBackend } from './history-backend';
import { FileHistoryBackend } from './file-backend';
import { PostgresHistoryBackend } from './postgres-backend';
import { Config } from '../config';

export type { HistoryBackend } from './history-backend';
export { parseHistory, serializeHistory } from './history-backend';
export { FileHistoryBackend } from './file-backend';
export { PostgresHistoryBackend } from './postgres-backend';

export function createHistoryBackend(history: Config['history']): HistoryBackend {
  if (history.backend === 'postgres') {
    return new PostgresHistoryBackend(history.storeId, history.databaseUrl);
  }
  return new FileHistoryBackend(history.filePath);
}
