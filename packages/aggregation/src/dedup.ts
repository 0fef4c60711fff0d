import type { JobPosting } from '@jobsweep/scraper-sdk';

function dedupKey(posting: Pick<JobPosting, 'title' | 'company'>): string {
  return `${posting.title.toLowerCase()}\u0000${posting.company.toLowerCase()}`;
}

/**
 * Cross-source dedup on (title, company), case-insensitive. The first
 * occurrence wins, so callers control priority through input order.
 */
export function dedupPostings<T extends Pick<JobPosting, 'title' | 'company'>>(postings: T[]): T[] {
  const seen = new Set<string>();
  const unique: T[] = [];

  for (const posting of postings) {
    const key = dedupKey(posting);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(posting);
  }

  return unique;
}
