import {
  defaultLogger,
  serializeError,
  validatePostings,
  type ScrapeLogger,
  type SearchRequest,
  type SourceAdapter,
  type ValidatedJobPosting,
} from '@jobsweep/scraper-sdk';
import { aggregate } from './aggregate.js';
import type { SearchAllOptions, SearchAllResult, SourceStats } from './types.js';

interface SourceOutcome {
  stats: SourceStats;
  postings: ValidatedJobPosting[];
}

async function searchSource(
  adapter: SourceAdapter,
  request: SearchRequest,
  logger: ScrapeLogger,
): Promise<SourceOutcome> {
  const { id, name } = adapter.manifest;
  const start = performance.now();
  const stats: SourceStats = { sourceId: id, sourceName: name, count: 0, validationDropped: 0, errors: [], durationMs: 0 };
  let postings: ValidatedJobPosting[] = [];

  try {
    logger.info(`[search:${id}] Searching ${name}...`, { event: 'source_search_started', source: id });
    const found = await adapter.search(request);
    stats.count = found.length;

    postings = validatePostings(found, {
      onInvalid: (issues) => {
        stats.validationDropped += 1;
        logger.warn(`[search:${id}] Dropped a posting that failed validation`, {
          event: 'posting_validation_failed',
          source: id,
          issues: issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        });
      },
    });

    logger.info(`[search:${id}] ${postings.length} postings`, {
      event: 'source_search_completed',
      source: id,
      count: stats.count,
      validationDropped: stats.validationDropped,
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    stats.errors.push(message);
    logger.error(`[search:${id}] Error: ${message}`, {
      event: 'source_search_failed',
      source: id,
      error: serializeError(error),
    });
  }

  stats.durationMs = performance.now() - start;
  return { stats, postings };
}

/**
 * Run every adapter against the same request and merge what they find.
 * Adapters run one at a time; a failing adapter is recorded in its stats
 * and the others still run.
 */
export async function searchAll(
  adapters: SourceAdapter[],
  request: SearchRequest,
  options: SearchAllOptions = {},
): Promise<SearchAllResult> {
  const logger = options.logger ?? defaultLogger;
  const signal = options.signal ?? request.signal;
  const start = performance.now();

  const sourceRequest: SearchRequest = {
    ...request,
    maxResults: options.perSourceMaxResults ?? request.maxResults,
    signal,
  };

  const sources: SourceStats[] = [];
  const batches: ValidatedJobPosting[][] = [];
  let aborted = false;

  for (const adapter of adapters) {
    if (signal?.aborted) {
      aborted = true;
      logger.warn(`[search] Aborted before ${adapter.manifest.id}`, { event: 'search_aborted', source: adapter.manifest.id });
      break;
    }

    const outcome = await searchSource(adapter, sourceRequest, logger);
    sources.push(outcome.stats);
    batches.push(outcome.postings);
  }

  const merged = batches.reduce((sum, batch) => sum + batch.length, 0);
  const unique = aggregate(batches);
  const postings = options.maxResults === undefined ? unique : unique.slice(0, Math.max(0, options.maxResults));
  const totalErrors = sources.reduce((sum, source) => sum + source.errors.length, 0);

  logger.info(`[search] Done. ${postings.length} postings from ${sources.length} sources.`, {
    event: 'search_completed',
    count: postings.length,
    duplicatesRemoved: merged - unique.length,
    totalErrors,
  });

  return {
    postings,
    sources,
    duplicatesRemoved: merged - unique.length,
    totalErrors,
    aborted,
    durationMs: performance.now() - start,
  };
}
