import { mkdir, readFile, rm, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { HistoryBackend } from './history-backend';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Keeps the seen-set in a single JSON file
 */
export class FileHistoryBackend implements HistoryBackend {
  readonly description: string;

  constructor(private readonly filePath: string) {
    this.description = `file ${filePath}`;
  }

  async read(): Promise<string | null> {
    try {
      return await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
  }

  async write(serialized: string): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, serialized, 'utf-8');
  }

  async clear(): Promise<void> {
    await rm(this.filePath, { force: true });
  }
}
