import { z } from 'zod';
import { BoardApiSource, parseTimestamp, textOrEmpty, titleOrDefault } from './base';
import { CompanyTarget, JobPosting } from '../types/job';

const greenhouseBoardSchema = z.object({
  jobs: z.array(z.unknown()),
});

const greenhouseJobSchema = z.object({
  id: z.union([z.number(), z.string().min(1)]),
  title: z.string().nullable().optional(),
  absolute_url: z.string().nullable().optional(),
  updated_at: z.string().nullable().optional(),
  location: z.object({ name: z.string().nullable().optional() }).nullable().optional(),
  departments: z.array(z.object({ name: z.string().nullable().optional() })).nullable().optional(),
});

type GreenhouseBoard = z.infer<typeof greenhouseBoardSchema>;
type GreenhouseJob = z.infer<typeof greenhouseJobSchema>;

/**
 * Greenhouse Job Board API adapter
 * API Documentation: https://developers.greenhouse.io/job-board.html
 *
 * Jobs carry nested location and department objects, flattened one level here.
 */
export class GreenhouseSource extends BoardApiSource<GreenhouseBoard, GreenhouseJob> {
  readonly kind = 'greenhouse' as const;
  private readonly apiUrl = 'https://boards-api.greenhouse.io/v1/boards';

  protected readonly payloadSchema = greenhouseBoardSchema;
  protected readonly recordSchema = greenhouseJobSchema;

  protected boardUrl(slug: string): string {
    return `${this.apiUrl}/${encodeURIComponent(slug)}/jobs`;
  }

  protected extractRecords(payload: GreenhouseBoard): unknown[] {
    return payload.jobs;
  }

  protected toPosting(job: GreenhouseJob, company: CompanyTarget): JobPosting {
    const sourceId = String(job.id);
    const department = textOrEmpty(job.departments?.[0]?.name);

    return {
      sourceId,
      company: company.name,
      title: titleOrDefault(job.title),
      location: textOrEmpty(job.location?.name),
      url: job.absolute_url || `https://boards.greenhouse.io/${company.slug}/jobs/${sourceId}`,
      postedAt: parseTimestamp(job.updated_at),
      source: this.kind,
      companySlug: company.slug,
      department: department || undefined,
    };
  }
}
