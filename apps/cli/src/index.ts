#!/usr/bin/env tsx
import 'dotenv/config';
import { cac } from 'cac';
import { createAdapters, searchAll } from '@jobsweep/aggregation';
import { serializeError } from '@jobsweep/scraper-sdk';
import { parseSearchArgs } from './args.js';
import { loadConfig } from './config.js';
import { createCliLogger, createScrapeLogger } from './logger.js';

const logger = createCliLogger();

async function runSearch(query: unknown, flags: unknown): Promise<void> {
  const config = loadConfig();
  const invocation = parseSearchArgs(query, flags, config);
  const scrapeLogger = createScrapeLogger(logger);

  const adapters = createAdapters(invocation.sources, { logger: scrapeLogger, university: config.university });
  if (adapters.length === 0) {
    logger.warn({ event: 'no_sources' }, 'No sources are configured');
  }

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  const result = await searchAll(adapters, invocation.request, {
    logger: scrapeLogger,
    maxResults: invocation.maxResults,
    perSourceMaxResults: invocation.perSourceMaxResults,
    signal: controller.signal,
  });

  logger.info(
    {
      event: 'search_completed',
      query: invocation.request.query,
      count: result.postings.length,
      duplicatesRemoved: result.duplicatesRemoved,
      totalErrors: result.totalErrors,
      aborted: result.aborted,
      durationMs: Math.round(result.durationMs),
      sources: result.sources.map((source) => ({
        sourceId: source.sourceId,
        count: source.count,
        validationDropped: source.validationDropped,
        errors: source.errors.length,
        durationMs: Math.round(source.durationMs),
      })),
    },
    'Search completed',
  );

  process.stdout.write(`${JSON.stringify(result.postings, null, 2)}\n`);
}

const cli = cac('jobsweep');

cli
  .command('<query>', 'Search every configured job source and print the postings as JSON')
  .option('--location <location>', 'City, state or ZIP code')
  .option('--radius <miles>', 'Search radius in miles')
  .option('--type <type>', 'Job type filter; repeat or comma-separate (e.g. internship,part-time)')
  .option('--sources <list>', 'Comma-separated source ids (defaults to JOBSWEEP_SOURCES or all)')
  .option('--max <n>', 'Maximum postings in the merged result')
  .example('jobsweep "library assistant" --location "Springfield, IL" --type part-time')
  .action(runSearch);

cli.help();
cli.version('0.1.0');

async function main(): Promise<void> {
  cli.parse(process.argv, { run: false });
  if (cli.options.help || cli.options.version) {
    return;
  }

  if (!cli.matchedCommand) {
    cli.outputHelp();
    return;
  }

  await cli.runMatchedCommand();
}

main().catch((error: unknown) => {
  logger.fatal({ event: 'cli_failed', error: serializeError(error) }, 'jobsweep failed');
  process.exitCode = 1;
});
