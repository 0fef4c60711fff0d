import { defaultLogger, serializeError, type JobPosting, type ScrapeLogger } from '@jobsweep/scraper-sdk';
import type { ExtractionStrategy, Page } from './page.js';

export type StrategyMode = 'first' | 'merge';

export interface RunStrategiesOptions {
  /** `first` stops at the first strategy that yields postings; `merge` concatenates all of them. */
  mode?: StrategyMode;
  logger?: ScrapeLogger;
}

function runGuarded(strategy: ExtractionStrategy, page: Page, logger: ScrapeLogger): JobPosting[] {
  try {
    return strategy.extract(page);
  } catch (error) {
    logger.warn('Extraction strategy failed', {
      source: page.source,
      strategy: strategy.name,
      url: page.url,
      error: serializeError(error),
    });
    return [];
  }
}

/** A failing strategy counts as one that found nothing. */
export function runStrategies(
  page: Page,
  strategies: readonly ExtractionStrategy[],
  options: RunStrategiesOptions = {},
): JobPosting[] {
  const mode = options.mode ?? 'first';
  const logger = options.logger ?? defaultLogger;
  const collected: JobPosting[] = [];

  for (const strategy of strategies) {
    const postings = runGuarded(strategy, page, logger);
    if (mode === 'first' && postings.length > 0) {
      return postings;
    }
    collected.push(...postings);
  }

  return collected;
}

/** Bundles strategies into one that returns everything they find. */
export function mergeStrategies(
  name: string,
  strategies: readonly ExtractionStrategy[],
  logger: ScrapeLogger = defaultLogger,
): ExtractionStrategy {
  return {
    name,
    extract: (page) => runStrategies(page, strategies, { mode: 'merge', logger }),
  };
}
