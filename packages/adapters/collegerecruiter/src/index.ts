import {
  collectPages,
  defaultLogger,
  defineAdapter,
  finalizePostings,
  HttpFetcher,
  matchesJobTypes,
  resolveSearchRequest,
  DEFAULT_MAX_PAGES,
  type AdapterManifest,
  type Fetcher,
  type ScrapeLogger,
} from '@jobsweep/scraper-sdk';
import {
  createHtmlPatternStrategy,
  embeddedJsonStrategy,
  fetchPage,
  jsonLdStrategy,
  mergeStrategies,
  runStrategies,
  type ExtractionStrategy,
} from '@jobsweep/extractors';

export const COLLEGE_RECRUITER_MANIFEST: AdapterManifest = {
  id: 'collegerecruiter',
  name: 'College Recruiter',
  version: '0.1.0',
  baseUrl: 'https://www.collegerecruiter.com/job-search',
  delayMs: 2500,
  pageSize: 25,
  maxPages: DEFAULT_MAX_PAGES,
};

const DEFAULT_KEYWORD = 'student';
const DEFAULT_LOCATION = 'US';

export interface CollegeRecruiterAdapterOptions {
  fetcher?: Fetcher;
  logger?: ScrapeLogger;
  now?: () => Date;
}

export function createCollegeRecruiterAdapter(options: CollegeRecruiterAdapterOptions = {}) {
  const manifest = COLLEGE_RECRUITER_MANIFEST;
  const fetcher = options.fetcher ?? new HttpFetcher({ delayMs: manifest.delayMs });
  const logger = options.logger ?? defaultLogger;

  // The site hydrates from __NEXT_DATA__; markup is only consulted when that is missing.
  const strategies: ExtractionStrategy[] = [
    embeddedJsonStrategy,
    mergeStrategies(
      'collegerecruiter-listings',
      [
        jsonLdStrategy,
        createHtmlPatternStrategy({
          containers: [
            { tag: 'div', className: /job-listing|job-card|listing-item/i },
            { tag: 'article', className: /job/i },
            { tag: 'li', className: /job/i },
          ],
          idPattern: /\/job\/(\d+)/,
          postedDate: true,
          now: options.now,
        }),
      ],
      logger,
    ),
  ];

  return defineAdapter({
    manifest,
    async search(request) {
      const { query, location, jobTypes, maxResults, signal } = resolveSearchRequest(request);

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
              keyword: query || DEFAULT_KEYWORD,
              location: location || DEFAULT_LOCATION,
              page: pageIndex > 0 ? pageIndex + 1 : undefined,
            },
          });
          if (!page) return [];

          return runStrategies(page, strategies, { logger }).filter((posting) => matchesJobTypes(posting, jobTypes));
        },
      });

      return finalizePostings(postings, maxResults);
    },
  });
}
