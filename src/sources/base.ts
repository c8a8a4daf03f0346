import { ZodType } from 'zod';
import { CompanyTarget, JobPosting, SourceKind } from '../types/job';
import { SourceFetchError } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * Fetches a URL and returns the decoded JSON body
 */
export type JsonGetter = (url: string) => Promise<unknown>;

/**
 * Base interface for all job sources
 * Each vendor adapter must implement this interface
 */
export interface JobSource {
  /**
   * Vendor this adapter understands
   */
  readonly kind: SourceKind;

  /**
   * Fetches every open posting on a company's board
   * @throws SourceFetchError when the board cannot be fetched or parsed
   */
  fetchJobs(company: CompanyTarget): Promise<JobPosting[]>;
}

/**
 * Shared fetch-validate-normalize flow for vendor board APIs.
 * Subclasses supply the board URL, the response schema and the per-record mapping.
 */
export abstract class BoardApiSource<TPayload, TRecord> implements JobSource {
  abstract readonly kind: SourceKind;

  protected abstract readonly payloadSchema: ZodType<TPayload>;
  protected abstract readonly recordSchema: ZodType<TRecord>;

  constructor(private readonly getJson: JsonGetter) {}

  protected abstract boardUrl(slug: string): string;

  protected abstract extractRecords(payload: TPayload): unknown[];

  protected abstract toPosting(record: TRecord, company: CompanyTarget): JobPosting;

  async fetchJobs(company: CompanyTarget): Promise<JobPosting[]> {
    const url = this.boardUrl(company.slug);
    let payload: TPayload;

    try {
      logger.debug(`Fetching ${this.kind} board`, { company: company.name, url });
      const body = await this.getJson(url);
      payload = this.payloadSchema.parse(body);
    } catch (error) {
      throw new SourceFetchError(this.kind, company.slug, { cause: error });
    }

    const records = this.extractRecords(payload);
    const postings: JobPosting[] = [];
    let skipped = 0;

    for (const raw of records) {
      const parsed = this.recordSchema.safeParse(raw);
      if (!parsed.success) {
        skipped++;
        logger.warn(`Skipping malformed ${this.kind} posting`, {
          company: company.name,
          issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
        });
        continue;
      }
      postings.push(this.toPosting(parsed.data, company));
    }

    logger.info(`Fetched ${postings.length} postings from ${company.name}`, {
      source: this.kind,
      slug: company.slug,
      totalItems: records.length,
      skipped,
    });
    return postings;
  }
}

/**
 * Parses a vendor timestamp (ISO string or epoch milliseconds)
 */
export function parseTimestamp(value: string | number | null | undefined): Date | undefined {
  if (value === null || value === undefined || value === '') return undefined;
  const date = new Date(value);
  return isNaN(date.getTime()) ? undefined : date;
}

export function textOrEmpty(value: string | null | undefined): string {
  return value ? value.trim() : '';
}

export function titleOrDefault(value: string | null | undefined): string {
  const title = textOrEmpty(value);
  return title.length > 0 ? title : 'Untitled';
}
