import pino, { type DestinationStream, type LevelWithSilent, type Logger } from 'pino';
import type { ScrapeLogger } from '@jobsweep/scraper-sdk';

const DEFAULT_LOG_LEVEL: LevelWithSilent = 'info';
const DEFAULT_SERVICE_NAME = 'jobsweep-cli';
const VALID_LOG_LEVELS: ReadonlySet<string> = new Set<LevelWithSilent>([
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
  'silent',
]);

function isLogLevel(value: string): value is LevelWithSilent {
  return VALID_LOG_LEVELS.has(value);
}

function readLogLevel(): LevelWithSilent {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  if (!raw || !isLogLevel(raw)) {
    return DEFAULT_LOG_LEVEL;
  }

  return raw;
}

/**
 * JSON logs go to stderr so stdout carries only the search result.
 */
export function createCliLogger(destination: DestinationStream = pino.destination(2)): Logger {
  const service = process.env.LOG_SERVICE_NAME?.trim() || DEFAULT_SERVICE_NAME;

  return pino(
    {
      level: readLogLevel(),
      base: { service },
      timestamp: () => `,"ts":"${new Date().toISOString()}"`,
      formatters: {
        level: (label) => ({ level: label }),
      },
      messageKey: 'message',
    },
    destination,
  );
}

/** Progress chatter from adapters is demoted to debug. */
export function createScrapeLogger(logger: Logger): ScrapeLogger {
  return {
    info: (message, context) => logger.debug({ event: 'scrape_stage', ...context }, message),
    warn: (message, context) => logger.warn({ event: 'scrape_stage', ...context }, message),
    error: (message, context) => logger.error({ event: 'scrape_stage', ...context }, message),
  };
}
