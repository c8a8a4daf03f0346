import { z } from 'zod';
import { BoardApiSource, parseTimestamp, textOrEmpty, titleOrDefault } from './base';
import { CompanyTarget, JobPosting } from '../types/job';

const ashbyBoardSchema = z.object({
  jobs: z.array(z.unknown()),
});

const ashbyJobSchema = z.object({
  id: z.string().min(1),
  title: z.string().nullable().optional(),
  location: z.string().nullable().optional(),
  department: z.string().nullable().optional(),
  jobUrl: z.string().nullable().optional(),
  publishedAt: z.string().nullable().optional(),
});

type AshbyBoard = z.infer<typeof ashbyBoardSchema>;
type AshbyJob = z.infer<typeof ashbyJobSchema>;

/**
 * Ashby posting API adapter
 * Postings are wrapped in the board response's "jobs" field.
 */
export class AshbySource extends BoardApiSource<AshbyBoard, AshbyJob> {
  readonly kind = 'ashby' as const;
  private readonly apiUrl = 'https://api.ashbyhq.com/posting-api/job-board';

  protected readonly payloadSchema = ashbyBoardSchema;
  protected readonly recordSchema = ashbyJobSchema;

  protected boardUrl(slug: string): string {
    return `${this.apiUrl}/${encodeURIComponent(slug)}`;
  }

  protected extractRecords(payload: AshbyBoard): unknown[] {
    return payload.jobs;
  }

  protected toPosting(job: AshbyJob, company: CompanyTarget): JobPosting {
    const department = textOrEmpty(job.department);

    return {
      sourceId: job.id,
      company: company.name,
      title: titleOrDefault(job.title),
      location: textOrEmpty(job.location),
      url: job.jobUrl || `https://jobs.ashbyhq.com/${company.slug}/${job.id}`,
      postedAt: parseTimestamp(job.publishedAt),
      source: this.kind,
      companySlug: company.slug,
      department: department || undefined,
    };
  }
}
