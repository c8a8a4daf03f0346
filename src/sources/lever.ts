import { z } from 'zod';
import { BoardApiSource, parseTimestamp, textOrEmpty, titleOrDefault } from './base';
import { CompanyTarget, JobPosting } from '../types/job';

// GET /v0/postings/{slug} returns a bare array
const leverPostingsSchema = z.array(z.unknown());

const leverPostingSchema = z.object({
  id: z.string().min(1),
  text: z.string().nullable().optional(),
  hostedUrl: z.string().nullable().optional(),
  applyUrl: z.string().nullable().optional(),
  createdAt: z.number().nullable().optional(),
  categories: z
    .object({
      location: z.string().nullable().optional(),
      team: z.string().nullable().optional(),
      department: z.string().nullable().optional(),
    })
    .nullable()
    .optional(),
});

type LeverPostings = z.infer<typeof leverPostingsSchema>;
type LeverPosting = z.infer<typeof leverPostingSchema>;

/**
 * Lever postings API adapter
 * API Documentation: https://github.com/lever/postings-api
 */
export class LeverSource extends BoardApiSource<LeverPostings, LeverPosting> {
  readonly kind = 'lever' as const;
  private readonly apiUrl = 'https://api.lever.co/v0/postings';

  protected readonly payloadSchema = leverPostingsSchema;
  protected readonly recordSchema = leverPostingSchema;

  protected boardUrl(slug: string): string {
    return `${this.apiUrl}/${encodeURIComponent(slug)}?mode=json`;
  }

  protected extractRecords(payload: LeverPostings): unknown[] {
    return payload;
  }

  protected toPosting(posting: LeverPosting, company: CompanyTarget): JobPosting {
    const categories = posting.categories;
    const department = textOrEmpty(categories?.team) || textOrEmpty(categories?.department);

    return {
      sourceId: posting.id,
      company: company.name,
      title: titleOrDefault(posting.text),
      location: textOrEmpty(categories?.location),
      url:
        posting.hostedUrl ||
        posting.applyUrl ||
        `https://jobs.lever.co/${company.slug}/${posting.id}`,
      postedAt: parseTimestamp(posting.createdAt),
      source: this.kind,
      companySlug: company.slug,
      department: department || undefined,
    };
  }
}
