/**
 * Keyword rules applied to job titles and locations.
 * Matching is case-insensitive substring matching.
 */
export interface FilterRules {
  includeKeywords: string[];
  excludeKeywords: string[];
  locationKeywords: string[];
  remoteKeywords: string[];
}

export type RejectionReason = 'no_include_match' | 'excluded_keyword' | 'location_mismatch';

export type FilterVerdict =
  | { accepted: true }
  | { accepted: false; reason: RejectionReason; keyword?: string };
