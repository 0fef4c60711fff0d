import { readFileSync } from 'node:fs';
import { describe, it, expect, vi } from 'vitest';
import type { Fetcher, FetchOutcome, QueryParams, ScrapeLogger } from '@jobsweep/scraper-sdk';
import { createWayUpAdapter, wayUpJobTypeFilter } from '../src/index.js';

const fixture = readFileSync(new URL('../fixtures/search.html', import.meta.url), 'utf8');

function page(text: string): FetchOutcome {
  return { ok: true, text, url: 'https://www.wayup.com/s/jobs-internships?keywords=intern' };
}

function mockFetcher(outcome: FetchOutcome) {
  const fetch = vi.fn(async (_url: string, _params?: QueryParams): Promise<FetchOutcome> => outcome);
  const fetcher: Fetcher = { fetch };
  return { fetcher, fetch };
}

function fakeLogger(): ScrapeLogger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('WayUp adapter', () => {
  it('merges cards with structured data', async () => {
    const { fetcher, fetch } = mockFetcher(page(fixture));
    const adapter = createWayUpAdapter({ fetcher, logger: fakeLogger() });

    const postings = await adapter.search({ query: 'intern', location: 'Springfield' });

    expect(postings.map((posting) => [posting.title, posting.company, posting.location, posting.jobType])).toEqual([
      ['Marketing Intern', 'Springfield Media', 'Springfield, IL', 'Internship'],
      ['Barista', 'Daily Grind', '', 'Full-time'],
      ['Research Intern', 'Springfield Labs', '', 'Internship'],
    ]);
    expect(postings[0]?.url).toBe('https://www.wayup.com/i-j-Marketing-Intern-Springfield-Media-123/');
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('filters by job type and forwards the preferred filter', async () => {
    const { fetcher, fetch } = mockFetcher(page(fixture));
    const adapter = createWayUpAdapter({ fetcher, logger: fakeLogger() });

    const postings = await adapter.search({ query: '', location: 'Springfield', jobTypes: ['Internship'] });

    expect(postings.map((posting) => posting.title)).toEqual(['Marketing Intern', 'Research Intern']);
    expect(fetch).toHaveBeenCalledWith('https://www.wayup.com/s/jobs-internships', {
      keywords: 'student',
      location: 'Springfield',
      job_type: 'internship',
    });
  });

  it('falls back to job links when no card markup is present', async () => {
    const body = `<div><a href="/jobs/camp-counselor-1">Camp Counselor</a><span class="employer">Lakeside Camps</span></div>`;
    const { fetcher } = mockFetcher(page(body));
    const adapter = createWayUpAdapter({ fetcher, logger: fakeLogger() });

    const postings = await adapter.search({ query: 'camp', location: '' });

    expect(postings.map((posting) => [posting.title, posting.company, posting.url])).toEqual([
      ['Camp Counselor', 'Lakeside Camps', 'https://www.wayup.com/jobs/camp-counselor-1'],
    ]);
  });

  it('resolves to an empty list on fetch failure', async () => {
    const { fetcher } = mockFetcher({ ok: false, failure: { kind: 'timeout', message: 'timed out' } });
    const adapter = createWayUpAdapter({ fetcher, logger: fakeLogger() });

    await expect(adapter.search({ query: 'camp', location: '' })).resolves.toEqual([]);
  });
});

describe('wayUpJobTypeFilter', () => {
  it('prefers internships, then part-time, then full-time', () => {
    expect(wayUpJobTypeFilter(['Full-time', 'Part-time'])).toBe('part-time');
    expect(wayUpJobTypeFilter(['Contract'])).toBeUndefined();
  });
});
