import type { ScrapeLogger, ValidatedJobPosting } from '@jobsweep/scraper-sdk';

/**
 * Per-source counts for one search.
 */
export interface SourceStats {
  sourceId: string;
  sourceName: string;
  /** Postings the adapter returned. */
  count: number;
  /** Postings that failed schema validation and were dropped. */
  validationDropped: number;
  errors: string[];
  durationMs: number;
}

export interface SearchAllResult {
  postings: ValidatedJobPosting[];
  sources: SourceStats[];
  /** Postings removed as (title, company) duplicates across sources. */
  duplicatesRemoved: number;
  totalErrors: number;
  aborted: boolean;
  durationMs: number;
}

export interface SearchAllOptions {
  logger?: ScrapeLogger;
  /** Cap on the merged result. */
  maxResults?: number;
  /** Cap passed to each adapter; defaults to the request's own maxResults. */
  perSourceMaxResults?: number;
  signal?: AbortSignal;
}

export interface AggregateOptions {
  maxResults?: number;
}
