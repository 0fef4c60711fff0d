import {
  defaultLogger,
  defineAdapter,
  HttpFetcher,
  isPortalRedirect,
  isValidPosting,
  matchesJobTypes,
  resolveSearchRequest,
  type AdapterManifest,
  type Fetcher,
  type JobPosting,
  type ScrapeLogger,
} from '@jobsweep/scraper-sdk';
import {
  createHtmlPatternStrategy,
  createPortalStrategy,
  feedStrategy,
  fetchPage,
  isFeedUrl,
  jsonLdStrategy,
  mergeStrategies,
  runStrategies,
  tableStrategy,
  type ExtractionStrategy,
  type PortalDefinition,
} from '@jobsweep/extractors';

const DELAY_MS = 2000;

export interface UniversityBoardConfig {
  /** Display name; used as the fallback employer and in portal guidance. */
  name: string;
  url?: string;
  useAuth?: boolean;
  /** Raw Cookie header value of a signed-in session. */
  authCookie?: string;
}

export interface UniversityAdapterOptions extends UniversityBoardConfig {
  fetcher?: Fetcher;
  logger?: ScrapeLogger;
  portals?: readonly PortalDefinition[];
  now?: () => Date;
}

/** Cookie header for boards that need a signed-in session. */
export function authHeaders(config: UniversityBoardConfig): Record<string, string> {
  return config.useAuth && config.authCookie ? { Cookie: config.authCookie } : {};
}

/** First posting per case-insensitive title. */
export function dedupByTitle(postings: JobPosting[]): JobPosting[] {
  const seen = new Set<string>();
  return postings.filter((posting) => {
    const key = posting.title.toLowerCase();
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

function matchesQuery(posting: JobPosting, query: string): boolean {
  if (!query) return true;
  const needle = query.toLowerCase();
  return posting.title.toLowerCase().includes(needle) || posting.description.toLowerCase().includes(needle);
}

export function createUniversityAdapter(options: UniversityAdapterOptions) {
  const manifest: AdapterManifest = {
    id: 'university',
    name: options.name,
    version: '0.1.0',
    baseUrl: options.url ?? '',
    delayMs: DELAY_MS,
    pageSize: 0,
    maxPages: 1,
  };
  const fetcher = options.fetcher ?? new HttpFetcher({ delayMs: DELAY_MS, headers: authHeaders(options) });
  const logger = options.logger ?? defaultLogger;

  // Portal detection short-circuits the listing strategies.
  const boardStrategies: ExtractionStrategy[] = [
    createPortalStrategy({ portals: options.portals }),
    mergeStrategies(
      'university-listings',
      [jsonLdStrategy, createHtmlPatternStrategy({ postedDate: true, now: options.now }), tableStrategy],
      logger,
    ),
  ];

  return defineAdapter({
    manifest,
    async search(request) {
      const { query, jobTypes, maxResults, signal } = resolveSearchRequest(request);
      const url = options.url;
      if (!url || signal?.aborted) return [];

      const page = await fetchPage(fetcher, url, { source: manifest.id, organization: options.name, logger });
      if (!page) return [];

      const strategies = isFeedUrl(url) ? [feedStrategy] : boardStrategies;
      const postings = dedupByTitle(runStrategies(page, strategies, { logger })).filter(
        (posting) => isPortalRedirect(posting) || (matchesQuery(posting, query) && matchesJobTypes(posting, jobTypes)),
      );

      // Portal records skip the validity check.
      return postings.filter((posting) => isPortalRedirect(posting) || isValidPosting(posting)).slice(0, maxResults);
    },
  });
}
