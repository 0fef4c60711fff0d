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
import { fetchPage, runStrategies } from '@jobsweep/extractors';
import { createLinkedInCardStrategy } from './cards.js';

export { createLinkedInCardStrategy } from './cards.js';

export const LINKEDIN_MANIFEST: AdapterManifest = {
  id: 'linkedin',
  name: 'LinkedIn',
  version: '0.1.0',
  baseUrl: 'https://www.linkedin.com/jobs/search',
  delayMs: 3000,
  pageSize: 25,
  maxPages: DEFAULT_MAX_PAGES,
};

const DISTANCE_BUCKETS = [5, 10, 25, 50] as const;
const MAX_DISTANCE = 100;

const JOB_TYPE_CODES: Partial<Record<JobType, string>> = {
  'Full-time': 'F',
  'Part-time': 'P',
  Internship: 'I',
  Contract: 'C',
  Temporary: 'T',
};

/** Entry level and associate. */
const EXPERIENCE_LEVELS = '1,2';

/** LinkedIn only accepts a few distances; round up to the next one. */
export function linkedInDistance(radiusMiles: number): number {
  return DISTANCE_BUCKETS.find((bucket) => radiusMiles <= bucket) ?? MAX_DISTANCE;
}

export function linkedInJobTypeCodes(jobTypes: readonly JobType[]): string | undefined {
  const codes = jobTypes.map((jobType) => JOB_TYPE_CODES[jobType]).filter((code): code is string => code !== undefined);
  return codes.length > 0 ? codes.join(',') : undefined;
}

export interface LinkedInAdapterOptions {
  fetcher?: Fetcher;
  logger?: ScrapeLogger;
  now?: () => Date;
}

export function createLinkedInAdapter(options: LinkedInAdapterOptions = {}) {
  const manifest = LINKEDIN_MANIFEST;
  const fetcher = options.fetcher ?? new HttpFetcher({ delayMs: manifest.delayMs });
  const logger = options.logger ?? defaultLogger;
  const strategies = [createLinkedInCardStrategy(options.now)];

  return defineAdapter({
    manifest,
    async search(request) {
      const { query, location, radiusMiles, jobTypes, maxResults, signal } = resolveSearchRequest(request);

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
              keywords: query,
              location,
              distance: linkedInDistance(radiusMiles),
              start: pageIndex * manifest.pageSize,
              sortBy: 'DD',
              f_JT: linkedInJobTypeCodes(jobTypes),
              f_E: EXPERIENCE_LEVELS,
            },
          });
          return page ? runStrategies(page, strategies, { logger }) : [];
        },
      });

      return finalizePostings(postings, maxResults);
    },
  });
}
