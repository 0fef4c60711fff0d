import {
  collectPages,
  defaultLogger,
  defineAdapter,
  finalizePostings,
  HttpFetcher,
  resolveSearchRequest,
  DEFAULT_MAX_PAGES,
  type AdapterManifest,
  type Fetcher,
  type JobType,
  type ScrapeLogger,
} from '@jobsweep/scraper-sdk';
import { fetchPage, jsonLdStrategy, runStrategies } from '@jobsweep/extractors';
import { createIndeedCardStrategy } from './cards.js';

export { createIndeedCardStrategy } from './cards.js';

export const INDEED_MANIFEST: AdapterManifest = {
  id: 'indeed',
  name: 'Indeed',
  version: '0.1.0',
  baseUrl: 'https://www.indeed.com/jobs',
  delayMs: 2000,
  pageSize: 15,
  maxPages: DEFAULT_MAX_PAGES,
};

const JOB_TYPE_CODES: Partial<Record<JobType, string>> = {
  'Full-time': 'fulltime',
  'Part-time': 'parttime',
  Internship: 'internship',
  Contract: 'contract',
  Temporary: 'temporary',
};

/** Indeed filters on a single type; the first one it knows wins. */
export function indeedJobTypeCode(jobTypes: readonly JobType[]): string | undefined {
  for (const jobType of jobTypes) {
    const code = JOB_TYPE_CODES[jobType];
    if (code) return code;
  }
  return undefined;
}

export interface IndeedAdapterOptions {
  fetcher?: Fetcher;
  logger?: ScrapeLogger;
  now?: () => Date;
}

export function createIndeedAdapter(options: IndeedAdapterOptions = {}) {
  const manifest = INDEED_MANIFEST;
  const fetcher = options.fetcher ?? new HttpFetcher({ delayMs: manifest.delayMs });
  const logger = options.logger ?? defaultLogger;
  const strategies = [createIndeedCardStrategy(options.now), jsonLdStrategy];

  return defineAdapter({
    manifest,
    async search(request) {
      const { query, location, radiusMiles, jobTypes, maxResults, signal } = resolveSearchRequest(request);
      const jt = indeedJobTypeCode(jobTypes);

      const postings = await collectPages({
        maxResults,
        pageSize: manifest.pageSize,
        maxPages: manifest.maxPages,
        signal,
        fetchPage: async (pageIndex) => {
          const page = await fetchPage(fetcher, manifest.baseUrl, {
            source: manifest.id,
            logger,
            params: {
              q: query,
              l: location,
              radius: radiusMiles,
              start: pageIndex * manifest.pageSize,
              sort: 'date',
              jt,
            },
          });
          return page ? runStrategies(page, strategies, { logger }) : [];
        },
      });

      return finalizePostings(postings, maxResults);
    },
  });
}
