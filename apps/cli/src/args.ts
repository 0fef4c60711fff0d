import { z } from 'zod';
import { parseSourceList, type SourceId } from '@jobsweep/aggregation';
import { JOB_TYPES, type JobType, type SearchRequest } from '@jobsweep/scraper-sdk';
import type { CliConfig } from './config.js';

// cac turns numeric-looking values into numbers, so a ZIP code arrives as one.
const textValue = z.union([z.string(), z.number()]).transform((value) => String(value).trim());

const positiveInt = z.coerce.number().int().positive();

const searchFlagsSchema = z.object({
  location: textValue.optional(),
  radius: positiveInt.optional(),
  type: z.union([textValue, z.array(textValue)]).optional(),
  sources: textValue.optional(),
  max: positiveInt.optional(),
});

export interface SearchInvocation {
  request: SearchRequest;
  sources: SourceId[];
  maxResults?: number;
  perSourceMaxResults?: number;
}

/** Case-insensitive, and tolerant of "full time" / "fulltime" spellings. */
export function parseJobType(value: string): JobType {
  const wanted = value.toLowerCase().replace(/[^a-z]/g, '');
  const match = JOB_TYPES.find((jobType) => jobType.toLowerCase().replace(/[^a-z]/g, '') === wanted);
  if (!match) {
    throw new Error(`Unknown job type: ${value}. Expected one of: ${JOB_TYPES.join(', ')}`);
  }

  return match;
}

function toList(value: string | string[] | undefined): string[] {
  if (value === undefined) return [];
  return (Array.isArray(value) ? value : [value]).flatMap((entry) => entry.split(','));
}

/**
 * Command-line flags win over environment configuration.
 */
export function parseSearchArgs(query: unknown, rawFlags: unknown, config: CliConfig): SearchInvocation {
  const flags = searchFlagsSchema.safeParse(rawFlags);
  if (!flags.success) {
    const details = flags.error.issues.map((issue) => `--${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid options: ${details}`);
  }

  const { location, radius, type, sources, max } = flags.data;
  const jobTypes = [
    ...new Set(
      toList(type)
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0)
        .map(parseJobType),
    ),
  ];
  const maxResults = max ?? config.maxResults;

  return {
    request: {
      query: textValue.parse(query ?? ''),
      location: location ?? '',
      radiusMiles: radius,
      jobTypes,
      maxResults,
    },
    sources: sources === undefined ? config.sources : parseSourceList(sources),
    maxResults,
    perSourceMaxResults: config.perSourceMaxResults,
  };
}
