import { JobPosting } from '../types/job';
import { FilterRules, FilterVerdict, RejectionReason } from '../types/filter';
import { buildDedupeKey } from '../utils/dedupe-key';
import { logger } from '../utils/logger';

export interface FilterOptions {
  /** Bypass every check and return postings unchanged (diagnostics) */
  noFilter?: boolean;
}

function normalizeKeywords(keywords: string[]): string[] {
  return keywords
    .map(keyword => keyword.trim().toLowerCase())
    .filter(keyword => keyword.length > 0);
}

function findKeyword(text: string, keywords: string[]): string | undefined {
  const lower = text.toLowerCase();
  return keywords.find(keyword => lower.includes(keyword));
}

/**
 * Filters postings by title and location keywords.
 * Substring matching: "manager" also rejects "Senior Manager, Accounting".
 */
export class JobFilter {
  private readonly rules: FilterRules;

  constructor(rules: FilterRules) {
    this.rules = {
      includeKeywords: normalizeKeywords(rules.includeKeywords),
      excludeKeywords: normalizeKeywords(rules.excludeKeywords),
      locationKeywords: normalizeKeywords(rules.locationKeywords),
      remoteKeywords: normalizeKeywords(rules.remoteKeywords),
    };
  }

  /**
   * Checks a posting against the rules, stopping at the first failed check
   */
  evaluate(posting: JobPosting): FilterVerdict {
    const included = findKeyword(posting.title, this.rules.includeKeywords);
    if (!included) {
      return { accepted: false, reason: 'no_include_match' };
    }

    // Exclusion wins over inclusion
    const excluded = findKeyword(posting.title, this.rules.excludeKeywords);
    if (excluded) {
      return { accepted: false, reason: 'excluded_keyword', keyword: excluded };
    }

    if (!this.matchesLocation(posting.location)) {
      return { accepted: false, reason: 'location_mismatch' };
    }

    return { accepted: true };
  }

  /**
   * Filters an array of postings, logging per-reason rejection counts
   */
  filter(postings: JobPosting[]): JobPosting[] {
    const rejected: Record<RejectionReason, number> = {
      no_include_match: 0,
      excluded_keyword: 0,
      location_mismatch: 0,
    };
    const accepted: JobPosting[] = [];

    for (const posting of postings) {
      const verdict = this.evaluate(posting);
      if (verdict.accepted) {
        accepted.push(posting);
        continue;
      }
      rejected[verdict.reason]++;
      logger.debug(`Posting filtered out: ${verdict.reason}`, {
        company: posting.company,
        title: posting.title,
        keyword: verdict.keyword,
      });
    }

    logger.info(`Filter kept ${accepted.length} of ${postings.length} postings`, { rejected });
    return accepted;
  }

  private matchesLocation(location: string): boolean {
    // Blank locations never match
    if (location.trim().length === 0) {
      return false;
    }
    return (
      findKeyword(location, this.rules.locationKeywords) !== undefined ||
      findKeyword(location, this.rules.remoteKeywords) !== undefined
    );
  }
}

/**
 * Pure entry point: applies the rules, or passes postings through in no-filter mode
 */
export function filterPostings(
  postings: JobPosting[],
  rules: FilterRules,
  options: FilterOptions = {}
): JobPosting[] {
  if (options.noFilter) {
    return postings;
  }
  return new JobFilter(rules).filter(postings);
}

/**
 * Keeps the first posting of each dedupe key, preserving order
 */
export function dedupePostings(postings: JobPosting[]): JobPosting[] {
  const seen = new Set<string>();
  const unique: JobPosting[] = [];

  for (const posting of postings) {
    const key = buildDedupeKey(posting);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(posting);
  }

  return unique;
}
