import {
  defaultLogger,
  defineAdapter,
  finalizePostings,
  HttpFetcher,
  matchesJobTypes,
  resolveSearchRequest,
  type AdapterManifest,
  type Fetcher,
  type JobType,
  type ScrapeLogger,
} from '@jobsweep/scraper-sdk';
import {
  createHtmlPatternStrategy,
  embeddedJsonStrategy,
  fetchPage,
  jsonLdStrategy,
  runStrategies,
  type ExtractionStrategy,
} from '@jobsweep/extractors';

export const WAYUP_MANIFEST: AdapterManifest = {
  id: 'wayup',
  name: 'WayUp',
  version: '0.1.0',
  baseUrl: 'https://www.wayup.com/s/jobs-internships',
  delayMs: 2500,
  pageSize: 0,
  maxPages: 1,
};

const DEFAULT_KEYWORD = 'student';

/** In priority order; WayUp filters on one type. */
const JOB_TYPE_FILTERS: ReadonlyArray<[JobType, string]> = [
  ['Internship', 'internship'],
  ['Part-time', 'part-time'],
  ['Full-time', 'full-time'],
];

export function wayUpJobTypeFilter(jobTypes: readonly JobType[]): string | undefined {
  return JOB_TYPE_FILTERS.find(([jobType]) => jobTypes.includes(jobType))?.[1];
}

export interface WayUpAdapterOptions {
  fetcher?: Fetcher;
  logger?: ScrapeLogger;
}

export function createWayUpAdapter(options: WayUpAdapterOptions = {}) {
  const manifest = WAYUP_MANIFEST;
  const fetcher = options.fetcher ?? new HttpFetcher({ delayMs: manifest.delayMs });
  const logger = options.logger ?? defaultLogger;
  const strategies: ExtractionStrategy[] = [
    createHtmlPatternStrategy({
      containers: [
        { tag: 'div', className: /job-card|JobCard|listing/ },
        { tag: 'article', className: /job|listing/ },
      ],
      linkPattern: /\/jobs?\//,
    }),
    jsonLdStrategy,
    embeddedJsonStrategy,
  ];

  return defineAdapter({
    manifest,
    async search(request) {
      const { query, location, jobTypes, maxResults, signal } = resolveSearchRequest(request);
      if (signal?.aborted) return [];

      const page = await fetchPage(fetcher, manifest.baseUrl, {
        source: manifest.id,
        logger,
        params: {
          keywords: query || DEFAULT_KEYWORD,
          location,
          job_type: wayUpJobTypeFilter(jobTypes),
        },
      });
      if (!page) return [];

      const postings = runStrategies(page, strategies, { mode: 'merge', logger }).filter((posting) =>
        matchesJobTypes(posting, jobTypes),
      );
      return finalizePostings(postings, maxResults);
    },
  });
}
