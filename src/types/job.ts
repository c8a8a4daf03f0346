/**
 * Vendors whose public job-board APIs we poll
 */
export const SOURCE_KINDS = ['greenhouse', 'ashby', 'lever'] as const;

export type SourceKind = (typeof SOURCE_KINDS)[number];

/**
 * A company board to poll, tagged with the vendor that hosts it
 */
export interface CompanyTarget {
  source: SourceKind;
  slug: string;
  name: string;
}

/**
 * Normalized job posting
 * All source adapters must produce this structure
 */
export interface JobPosting {
  sourceId: string;
  company: string;
  title: string;
  location: string;
  url: string;
  postedAt?: Date;
  source: SourceKind;
  companySlug: string;
  department?: string;
}

