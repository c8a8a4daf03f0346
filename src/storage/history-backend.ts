import { z } from 'zod';

/**
 * Durable home of the serialized seen-set.
 * A backend stores one opaque record; the History Store owns its format.
 */
export interface HistoryBackend {
  readonly description: string;

  /** Returns the stored record, or null when nothing has been saved yet */
  read(): Promise<string | null>;

  write(serialized: string): Promise<void>;

  /** Removes the stored record so the next read returns null */
  clear(): Promise<void>;
}

const historyRecordSchema = z.object({
  lastUpdated: z.string().optional(),
  keys: z.array(z.string()),
});

export type HistoryRecord = z.infer<typeof historyRecordSchema>;

export function serializeHistory(keys: Iterable<string>, updatedAt: Date = new Date()): string {
  const record: HistoryRecord = {
    lastUpdated: updatedAt.toISOString(),
    keys: Array.from(new Set(keys)).sort(),
  };
  return JSON.stringify(record, null, 2);
}

/**
 * Parses a stored record back into a key set.
 * Throws on invalid JSON or an unexpected shape.
 */
export function parseHistory(serialized: string): Set<string> {
  const record = historyRecordSchema.parse(JSON.parse(serialized));
  return new Set(record.keys);
}
