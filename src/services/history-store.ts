import { HistoryBackend, parseHistory, serializeHistory } from '../storage';
import { JobPosting } from '../types/job';
import { buildDedupeKey } from '../utils/dedupe-key';
import { HistoryLoadError, HistoryWriteError } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * Tracks which postings were already reported.
 * The only component that touches persisted state: read once at the start
 * of a run, written once at the end. The set only grows.
 */
export class HistoryStore {
  private seen: Set<string> | null = null;

  constructor(
    private readonly backend: HistoryBackend,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Returns every recorded dedupe key.
   * Missing or corrupt state yields an empty set (fail open).
   */
  async load(): Promise<Set<string>> {
    this.seen = await this.readSeenSet();
    return new Set(this.seen);
  }

  /**
   * Returns the postings whose key was not seen before, in input order,
   * and persists the union of the previous set and every key passed in.
   *
   * @throws HistoryWriteError when saving fails; it carries the new postings
   */
  async diffAndRecord(postings: JobPosting[]): Promise<JobPosting[]> {
    const seen = this.seen ?? (await this.load());
    const newPostings = postings.filter(posting => !seen.has(buildDedupeKey(posting)));

    const updated = new Set(seen);
    for (const posting of postings) {
      updated.add(buildDedupeKey(posting));
    }

    try {
      await this.backend.write(serializeHistory(updated, this.clock()));
    } catch (error) {
      logger.error(`Failed to save job history to ${this.backend.description}`, error);
      throw new HistoryWriteError(
        `Could not save job history to ${this.backend.description}`,
        newPostings,
        { cause: error }
      );
    }

    this.seen = updated;
    logger.info(`Recorded ${postings.length} postings in history`, {
      new: newPostings.length,
      totalTracked: updated.size,
    });
    return newPostings;
  }

  /**
   * Clears persisted state so the next run treats every posting as new
   *
   * @throws HistoryWriteError when the stored record cannot be removed
   */
  async reset(): Promise<void> {
    try {
      await this.backend.clear();
    } catch (error) {
      throw new HistoryWriteError(`Could not reset job history in ${this.backend.description}`, [], {
        cause: error,
      });
    }
    this.seen = new Set();
    logger.info(`Job history reset`, { backend: this.backend.description });
  }

  private async readSeenSet(): Promise<Set<string>> {
    let serialized: string | null;
    try {
      serialized = await this.backend.read();
    } catch (error) {
      this.warnLoadFailure(new HistoryLoadError(`Could not read ${this.backend.description}`, { cause: error }));
      return new Set();
    }

    if (serialized === null) {
      logger.info(`No job history found, starting fresh`, { backend: this.backend.description });
      return new Set();
    }

    try {
      const keys = parseHistory(serialized);
      logger.info(`Loaded ${keys.size} seen postings`, { backend: this.backend.description });
      return keys;
    } catch (error) {
      this.warnLoadFailure(new HistoryLoadError(`Corrupt job history in ${this.backend.description}`, { cause: error }));
      return new Set();
    }
  }

  private warnLoadFailure(error: HistoryLoadError): void {
    logger.warn(`${error.message}; treating history as empty`, {
      cause: error.cause instanceof Error ? error.cause.message : String(error.cause),
    });
  }
}
