import type { JobPosting } from '@jobsweep/scraper-sdk';
import { dedupPostings } from './dedup.js';
import type { AggregateOptions } from './types.js';

/** Concatenate batches in order, drop duplicates, then cap. */
export function aggregate<T extends Pick<JobPosting, 'title' | 'company'>>(
  batches: T[][],
  options: AggregateOptions = {},
): T[] {
  const unique = dedupPostings(batches.flat());
  return options.maxResults === undefined ? unique : unique.slice(0, Math.max(0, options.maxResults));
}
