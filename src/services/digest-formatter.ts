import { JobPosting } from '../types/job';

/** Telegram rejects messages over 4096 characters */
export const MAX_SECTION_LENGTH = 4000;

// Worst-case escaping grows text sixfold; these keep one posting block well under a section
const MAX_TITLE_LENGTH = 150;
const MAX_DETAILS_LENGTH = 200;
const MAX_LINK_LENGTH = 1500;

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

export interface DigestGroup {
  company: string;
  postings: JobPosting[];
}

/**
 * Rendered digest for one run
 */
export interface DigestDocument {
  subject: string;
  generatedAt: string;
  companyCount: number;
  totalNew: number;
  isEmpty: boolean;
  /** Postings grouped by company, in the order companies were first seen */
  groups: DigestGroup[];
  /** Telegram-ready HTML messages: a header, then the company blocks */
  sections: string[];
  /** Plain-text rendering of the whole digest */
  text: string;
}

export interface RenderOptions {
  generatedAt: Date;
  companyCount: number;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}

/**
 * "Oct 07" in UTC
 */
export function formatShortDate(date: Date): string {
  return `${MONTHS[date.getUTCMonth()]} ${String(date.getUTCDate()).padStart(2, '0')}`;
}

export function groupByCompany(postings: JobPosting[]): DigestGroup[] {
  const groups = new Map<string, DigestGroup>();
  for (const posting of postings) {
    let group = groups.get(posting.company);
    if (!group) {
      group = { company: posting.company, postings: [] };
      groups.set(posting.company, group);
    }
    group.postings.push(posting);
  }
  return Array.from(groups.values());
}

function buildSubject(totalNew: number, generatedAt: Date): string {
  const date = formatShortDate(generatedAt);
  return totalNew > 0
    ? `Job Digest: ${totalNew} new (${date})`
    : `Job Digest: no new postings (${date})`;
}

function postingDetails(posting: JobPosting): string[] {
  const details = [posting.location || 'Location not listed'];
  if (posting.department) {
    details.push(posting.department);
  }
  return details;
}

function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength - 1)}…` : text;
}

function renderPostingHtml(posting: JobPosting): string {
  const title = escapeHtml(truncate(posting.title, MAX_TITLE_LENGTH));
  const details = escapeHtml(truncate(postingDetails(posting).join(' · '), MAX_DETAILS_LENGTH));
  const href = escapeHtml(posting.url);
  // An overlong link would be cut mid-URL; show the title unlinked instead
  const heading = href.length > MAX_LINK_LENGTH ? `• ${title}` : `• <a href="${href}">${title}</a>`;
  return [heading, `  ${details}`].join('\n');
}

function renderPostingText(posting: JobPosting): string {
  return [
    `- ${posting.title}`,
    `  ${postingDetails(posting).join(' · ')}`,
    `  ${posting.url}`,
  ].join('\n');
}

/**
 * Renders one company block, split at posting boundaries to respect the section limit
 */
function renderGroupSections(group: DigestGroup): string[] {
  const heading = `🏢 <b>${escapeHtml(group.company)}</b> (${group.postings.length})`;
  const sections: string[] = [];
  let current = heading;

  for (const posting of group.postings) {
    const block = renderPostingHtml(posting);
    if (current.length + block.length + 2 > MAX_SECTION_LENGTH && current !== heading) {
      sections.push(current);
      current = `${heading} (cont.)`;
    }
    current = `${current}\n\n${block}`;
  }

  sections.push(current);
  return sections;
}

/**
 * Renders new postings into a digest document.
 * An empty list still produces a document; whether to send it is the caller's call.
 */
export function renderDigest(postings: JobPosting[], options: RenderOptions): DigestDocument {
  const groups = groupByCompany(postings);
  const totalNew = postings.length;
  const subject = buildSubject(totalNew, options.generatedAt);
  const monitoring = `Monitoring ${options.companyCount} companies`;

  const summary = totalNew > 0
    ? `${totalNew} new postings across ${groups.length} companies`
    : 'No new postings matching your filters.';

  const header = [`🔍 <b>${escapeHtml(subject)}</b>`, summary, `<i>${monitoring}</i>`].join('\n');
  const sections = [header, ...groups.flatMap(renderGroupSections)];

  const textLines = [subject, summary, ''];
  for (const group of groups) {
    textLines.push(`${group.company} (${group.postings.length})`);
    for (const posting of group.postings) {
      textLines.push(renderPostingText(posting));
    }
    textLines.push('');
  }
  textLines.push(monitoring);

  return {
    subject,
    generatedAt: options.generatedAt.toISOString(),
    companyCount: options.companyCount,
    totalNew,
    isEmpty: totalNew === 0,
    groups,
    sections,
    text: textLines.join('\n'),
  };
}
