import { createCollegeRecruiterAdapter } from '@jobsweep/adapter-collegerecruiter';
import { createGlassdoorAdapter } from '@jobsweep/adapter-glassdoor';
import { createIndeedAdapter } from '@jobsweep/adapter-indeed';
import { createLinkedInAdapter } from '@jobsweep/adapter-linkedin';
import { createUniversityAdapter, type UniversityBoardConfig } from '@jobsweep/adapter-university';
import { createWayUpAdapter } from '@jobsweep/adapter-wayup';
import { defaultLogger, type ScrapeLogger, type SourceAdapter } from '@jobsweep/scraper-sdk';

export const SOURCE_IDS = ['indeed', 'linkedin', 'glassdoor', 'collegerecruiter', 'wayup', 'university'] as const;

export type SourceId = (typeof SOURCE_IDS)[number];

export interface CreateAdaptersOptions {
  logger?: ScrapeLogger;
  university?: UniversityBoardConfig;
}

export interface SourceDefinition {
  id: SourceId;
  name: string;
  /** Returns undefined when the source is not configured. */
  create(options: CreateAdaptersOptions): SourceAdapter | undefined;
}

const allSources: SourceDefinition[] = [
  { id: 'indeed', name: 'Indeed', create: ({ logger }) => createIndeedAdapter({ logger }) },
  { id: 'linkedin', name: 'LinkedIn', create: ({ logger }) => createLinkedInAdapter({ logger }) },
  { id: 'glassdoor', name: 'Glassdoor', create: ({ logger }) => createGlassdoorAdapter({ logger }) },
  {
    id: 'collegerecruiter',
    name: 'College Recruiter',
    create: ({ logger }) => createCollegeRecruiterAdapter({ logger }),
  },
  { id: 'wayup', name: 'WayUp', create: ({ logger }) => createWayUpAdapter({ logger }) },
  {
    id: 'university',
    name: 'University',
    create: ({ logger, university }) =>
      university?.url ? createUniversityAdapter({ ...university, logger }) : undefined,
  },
];

function normalizeName(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9]/g, '');
}

function buildSourceMap(sources: SourceDefinition[]): Map<string, SourceDefinition> {
  const sourceMap = new Map<string, SourceDefinition>();

  for (const source of sources) {
    if (sourceMap.has(source.id)) {
      throw new Error(`Duplicate source id: ${source.id}`);
    }

    sourceMap.set(source.id, source);
  }

  return sourceMap;
}

const sourceMap = buildSourceMap(allSources);

export function getSourceById(sourceId: string): SourceDefinition {
  const source = sourceMap.get(sourceId);
  if (!source) {
    throw new Error(`Unknown source id: ${sourceId}`);
  }

  return source;
}

/** Accepts an id or a display name, ignoring case, spaces and punctuation. */
export function resolveSourceId(value: string): SourceId {
  const wanted = normalizeName(value);
  const source = allSources.find((candidate) => candidate.id === wanted || normalizeName(candidate.name) === wanted);
  if (!source) {
    throw new Error(`Unknown source id: ${value.trim()}`);
  }

  return source.id;
}

/** Comma-separated list; empty input selects every source. */
export function parseSourceList(value: string | undefined): SourceId[] {
  const entries = (value ?? '')
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

  if (entries.length === 0) {
    return [...SOURCE_IDS];
  }

  return [...new Set(entries.map(resolveSourceId))];
}

export function createAdapters(sourceIds: readonly string[], options: CreateAdaptersOptions = {}): SourceAdapter[] {
  const logger = options.logger ?? defaultLogger;
  const adapters: SourceAdapter[] = [];

  for (const sourceId of sourceIds) {
    const adapter = getSourceById(sourceId).create(options);
    if (!adapter) {
      logger.warn(`[sources] Skipping ${sourceId}: not configured`, { event: 'source_skipped', source: sourceId });
      continue;
    }
    adapters.push(adapter);
  }

  return adapters;
}
