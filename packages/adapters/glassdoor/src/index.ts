import {
  BROWSER_HEADERS,
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
import { createJsonLdStrategy, fetchPage, runStrategies } from '@jobsweep/extractors';
import { createGlassdoorCardStrategy } from './cards.js';

export { createGlassdoorCardStrategy } from './cards.js';

export const GLASSDOOR_MANIFEST: AdapterManifest = {
  id: 'glassdoor',
  name: 'Glassdoor',
  version: '0.1.0',
  baseUrl: 'https://www.glassdoor.com/Job/jobs.htm',
  delayMs: 4000,
  pageSize: 30,
  maxPages: DEFAULT_MAX_PAGES,
};

/** Glassdoor rejects requests that do not look like a navigating browser. */
export const GLASSDOOR_HEADERS: Readonly<Record<string, string>> = {
  ...BROWSER_HEADERS,
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8',
  'Cache-Control': 'max-age=0',
  'Sec-Ch-Ua': '"Not_A Brand";v="8", "Chromium";v="120"',
  'Sec-Ch-Ua-Mobile': '?0',
  'Sec-Ch-Ua-Platform': '"macOS"',
  'Sec-Fetch-Dest': 'document',
  'Sec-Fetch-Mode': 'navigate',
  'Sec-Fetch-Site': 'none',
  'Sec-Fetch-User': '?1',
  'Upgrade-Insecure-Requests': '1',
};

const JSON_LD_DESCRIPTION_LENGTH = 2000;
const POSTED_WITHIN_DAYS = '7';

const JOB_TYPE_CODES: Partial<Record<JobType, string>> = {
  'Full-time': 'fulltime',
  'Part-time': 'parttime',
  Internship: 'internship',
  Contract: 'contract',
  Temporary: 'temporary',
};

export function glassdoorJobTypeCode(jobTypes: readonly JobType[]): string | undefined {
  for (const jobType of jobTypes) {
    const code = JOB_TYPE_CODES[jobType];
    if (code) return code;
  }
  return undefined;
}

export interface GlassdoorAdapterOptions {
  fetcher?: Fetcher;
  logger?: ScrapeLogger;
  now?: () => Date;
}

export function createGlassdoorAdapter(options: GlassdoorAdapterOptions = {}) {
  const manifest = GLASSDOOR_MANIFEST;
  const fetcher = options.fetcher ?? new HttpFetcher({ delayMs: manifest.delayMs, headers: { ...GLASSDOOR_HEADERS } });
  const logger = options.logger ?? defaultLogger;
  const strategies = [
    createGlassdoorCardStrategy(options.now),
    createJsonLdStrategy({ maxDescriptionLength: JSON_LD_DESCRIPTION_LENGTH }),
  ];

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
              'sc.keyword': query,
              locT: 'C',
              locKeyword: location,
              radius: radiusMiles,
              fromAge: POSTED_WITHIN_DAYS,
              jobType: glassdoorJobTypeCode(jobTypes),
              p: pageIndex > 0 ? pageIndex + 1 : undefined,
            },
          });
          return page ? runStrategies(page, strategies, { logger }) : [];
        },
      });

      return finalizePostings(postings, maxResults);
    },
  });
}
