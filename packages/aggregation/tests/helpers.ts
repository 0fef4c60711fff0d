import { vi } from 'vitest';
import type { JobPosting, ScrapeLogger, SearchRequest, SourceAdapter } from '@jobsweep/scraper-sdk';

export function posting(overrides: Partial<JobPosting> = {}): JobPosting {
  return {
    source: 'test',
    sourceId: 'abc123',
    title: 'Library Assistant',
    company: 'Riverside College',
    location: 'Springfield, IL',
    description: 'Shelve returned books.',
    url: 'https://jobs.example.com/1',
    ...overrides,
  };
}

export function silentLogger(): ScrapeLogger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function fakeAdapter(
  id: string,
  search: (request: SearchRequest) => Promise<JobPosting[]>,
): SourceAdapter {
  return {
    manifest: {
      id,
      name: id.toUpperCase(),
      version: '0.0.0',
      baseUrl: `https://${id}.example.com`,
      delayMs: 0,
      pageSize: 0,
      maxPages: 1,
    },
    search: vi.fn(search),
  };
}
