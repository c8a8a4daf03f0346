import { JobPosting, SourceKind } from '../types/job';

export interface HttpErrorDetails {
  status: number;
  statusText: string;
  url: string;
  bodySnippet?: string;
}

/**
 * Non-2xx response from a job board API
 */
export class HttpError extends Error {
  readonly status: number;
  readonly statusText: string;
  readonly url: string;
  readonly bodySnippet?: string;

  constructor(details: HttpErrorDetails) {
    super(
      `HTTP ${details.status} ${details.statusText} - ${details.url}${
        details.bodySnippet ? ` - ${details.bodySnippet}` : ''
      }`
    );
    this.name = 'HttpError';
    this.status = details.status;
    this.statusText = details.statusText;
    this.url = details.url;
    this.bodySnippet = details.bodySnippet;
  }
}

/**
 * One company's board could not be fetched or parsed.
 * The company contributes zero postings to the run.
 */
export class SourceFetchError extends Error {
  constructor(
    readonly source: SourceKind,
    readonly companySlug: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to fetch ${source} board "${companySlug}": ${describeCause(options?.cause)}`, options);
    this.name = 'SourceFetchError';
  }
}

/**
 * Persisted history was unreadable; the run treats it as empty
 */
export class HistoryLoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HistoryLoadError';
  }
}

/**
 * History could not be saved. Carries the postings that were identified as
 * new so they can still be delivered.
 */
export class HistoryWriteError extends Error {
  readonly newPostings: JobPosting[];

  constructor(message: string, newPostings: JobPosting[], options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HistoryWriteError';
    this.newPostings = newPostings;
  }
}

export class DeliveryError extends Error {
  constructor(readonly recipient: string, options?: { cause?: unknown }) {
    super(`Failed to deliver digest to ${recipient}: ${describeCause(options?.cause)}`, options);
    this.name = 'DeliveryError';
  }
}

/**
 * Configuration could not be loaded. Fatal for the run.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (cause === undefined) return 'unknown error';
  return String(cause);
}
