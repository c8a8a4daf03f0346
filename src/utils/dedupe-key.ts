import { JobPosting } from '../types/job';

export const DEDUPE_KEY_SEPARATOR = '::';

/**
 * Cross-run identity of a posting: company + "::" + sourceId.
 * Stays the same when a vendor edits the title or location.
 */
export function buildDedupeKey(posting: Pick<JobPosting, 'company' | 'sourceId'>): string {
  return `${posting.company}${DEDUPE_KEY_SEPARATOR}${posting.sourceId}`;
}
