import { JobSourceRegistry } from '../sources';
import { CompanyTarget, JobPosting } from '../types/job';
import { SourceFetchError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface CompanyFetchStats {
  source: CompanyTarget['source'];
  fetched: number;
  failed: boolean;
}

export interface FetchAllResult {
  postings: JobPosting[];
  stats: Record<string, CompanyFetchStats>;
  failures: SourceFetchError[];
}

/**
 * Polls every configured company board, one at a time
 */
export class JobFetcherService {
  constructor(private sources: JobSourceRegistry) {}

  /**
   * Fetches postings from all companies.
   * A failing board is logged and contributes zero postings.
   */
  async fetchAll(companies: CompanyTarget[]): Promise<FetchAllResult> {
    const stats: Record<string, CompanyFetchStats> = {};
    const failures: SourceFetchError[] = [];
    const postings: JobPosting[] = [];

    for (const company of companies) {
      const companyStats: CompanyFetchStats = { source: company.source, fetched: 0, failed: false };
      const source = this.sources[company.source];

      try {
        const companyPostings = await source.fetchJobs(company);
        companyStats.fetched = companyPostings.length;
        postings.push(...companyPostings);
      } catch (error) {
        companyStats.failed = true;
        const failure = error instanceof SourceFetchError
          ? error
          : new SourceFetchError(company.source, company.slug, { cause: error });
        failures.push(failure);
        logger.error(`Source ${company.source} failed for ${company.name}`, failure, {
          slug: company.slug,
        });
        // Continue with other companies - isolated failures
      }

      stats[`${company.source}:${company.slug}`] = companyStats;
    }

    logger.info(`Fetched ${postings.length} postings from ${companies.length} companies`, {
      failedCompanies: failures.length,
    });

    return { postings, stats, failures };
  }
}
