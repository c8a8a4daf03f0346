import { JobFetcherService, CompanyFetchStats } from './job-fetcher';
import { HistoryStore } from './history-store';
import { DigestDocument, renderDigest } from './digest-formatter';
import { DeliveryReport, DigestDelivery, TelegramDigestDelivery } from './notification-dispatcher';
import { dedupePostings, filterPostings } from '../filters/job-filter';
import { createJobSources } from '../sources';
import { createHistoryBackend } from '../storage';
import { Config } from '../config';
import { CompanyTarget, JobPosting } from '../types/job';
import { FilterRules } from '../types/filter';
import { HistoryWriteError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface RunOptions {
  /** Compute everything, skip delivery */
  dryRun: boolean;
  /** Bypass the filter engine */
  noFilter: boolean;
  /** Clear history before the run */
  resetHistory: boolean;
  now?: Date;
}

export interface RunSummary {
  fetched: number;
  matched: number;
  unique: number;
  newPostings: JobPosting[];
  sourceStats: Record<string, CompanyFetchStats>;
  failedCompanies: string[];
  warnings: string[];
  digest: DigestDocument;
  /** Null when delivery was skipped */
  delivery: DeliveryReport | null;
  deliverySkippedReason?: 'dry_run' | 'empty_digest' | 'no_recipients';
}

export interface DigestRunnerDeps {
  companies: CompanyTarget[];
  filters: FilterRules;
  fetcher: JobFetcherService;
  history: HistoryStore;
  delivery: DigestDelivery | null;
  recipients: string[];
  sendEmptyDigest: boolean;
}

/**
 * Runs the pipeline once: fetch, filter, diff against history, render, deliver
 */
export class DigestRunner {
  constructor(private deps: DigestRunnerDeps) {}

  async run(options: RunOptions): Promise<RunSummary> {
    const startTime = Date.now();
    const warnings: string[] = [];
    const { history } = this.deps;

    logger.info('Digest run started', {
      companies: this.deps.companies.length,
      dryRun: options.dryRun,
      noFilter: options.noFilter,
      resetHistory: options.resetHistory,
    });

    if (options.resetHistory) {
      try {
        await history.reset();
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        warnings.push(message);
        logger.warn('History reset failed', { error: message });
      }
    }

    await history.load();

    // Step 1: Fetch postings from every board
    const { postings, stats, failures } = await this.deps.fetcher.fetchAll(this.deps.companies);

    // Step 2: Filter and collapse repeats within this run
    const matched = filterPostings(postings, this.deps.filters, { noFilter: options.noFilter });
    const unique = dedupePostings(matched);

    // Step 3: Diff against history and record
    let newPostings: JobPosting[];
    try {
      newPostings = await history.diffAndRecord(unique);
    } catch (error) {
      if (!(error instanceof HistoryWriteError)) {
        throw error;
      }
      newPostings = error.newPostings;
      warnings.push(`${error.message}; these postings will be reported again next run`);
    }

    // Step 4: Render
    const digest = renderDigest(newPostings, {
      generatedAt: options.now ?? new Date(),
      companyCount: this.deps.companies.length,
    });

    // Step 5: Deliver
    const { delivery, skippedReason } = await this.deliver(digest, options);

    const summary: RunSummary = {
      fetched: postings.length,
      matched: matched.length,
      unique: unique.length,
      newPostings,
      sourceStats: stats,
      failedCompanies: failures.map(failure => `${failure.source}:${failure.companySlug}`),
      warnings,
      digest,
      delivery,
      deliverySkippedReason: skippedReason,
    };

    logger.info('Digest run completed', {
      duration: `${Date.now() - startTime}ms`,
      fetched: summary.fetched,
      matched: summary.matched,
      unique: summary.unique,
      new: newPostings.length,
      failedCompanies: summary.failedCompanies.length,
      warnings: warnings.length,
      delivered: delivery?.delivered.length ?? 0,
      deliverySkippedReason: skippedReason,
    });

    return summary;
  }

  private async deliver(
    digest: DigestDocument,
    options: RunOptions
  ): Promise<{ delivery: DeliveryReport | null; skippedReason?: RunSummary['deliverySkippedReason'] }> {
    if (options.dryRun) {
      logger.info('Dry run - digest would be sent', {
        subject: digest.subject,
        recipients: this.deps.recipients.length,
        sections: digest.sections.length,
      });
      return { delivery: null, skippedReason: 'dry_run' };
    }

    if (digest.isEmpty && !this.deps.sendEmptyDigest) {
      logger.info('No new postings, skipping delivery');
      return { delivery: null, skippedReason: 'empty_digest' };
    }

    if (!this.deps.delivery || this.deps.recipients.length === 0) {
      logger.warn('No delivery recipients configured, skipping delivery');
      return { delivery: null, skippedReason: 'no_recipients' };
    }

    const delivery = await this.deps.delivery.deliver(digest, this.deps.recipients);
    return { delivery };
  }
}

/**
 * Wires the runner from configuration
 */
export function createDigestRunner(config: Config): DigestRunner {
  return new DigestRunner({
    companies: config.companies,
    filters: config.filters,
    fetcher: new JobFetcherService(createJobSources(config)),
    history: new HistoryStore(createHistoryBackend(config.history)),
    delivery: config.telegram.botToken ? new TelegramDigestDelivery(config.telegram.botToken) : null,
    recipients: config.telegram.chatIds,
    sendEmptyDigest: config.sendEmptyDigest,
  });
}

/**
 * True when delivery was attempted and no recipient received the digest
 */
export function deliveryFailedEverywhere(summary: RunSummary): boolean {
  return summary.delivery !== null && summary.delivery.delivered.length === 0;
}
