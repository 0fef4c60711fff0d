import { defaultLogger, type Fetcher, type QueryParams, type ScrapeLogger } from '@jobsweep/scraper-sdk';
import { createPage, type Page } from './page.js';

export interface FetchPageOptions {
  source: string;
  params?: QueryParams;
  organization?: string;
  logger?: ScrapeLogger;
}

/** Undefined when the request failed; the failure is logged and the page contributes nothing. */
export async function fetchPage(fetcher: Fetcher, url: string, options: FetchPageOptions): Promise<Page | undefined> {
  const outcome = await fetcher.fetch(url, options.params);
  if (!outcome.ok) {
    (options.logger ?? defaultLogger).warn('Page fetch failed', {
      source: options.source,
      url,
      kind: outcome.failure.kind,
      status: outcome.failure.status,
      message: outcome.failure.message,
    });
    return undefined;
  }

  return createPage({
    source: options.source,
    url: outcome.url,
    body: outcome.text,
    organization: options.organization,
  });
}
