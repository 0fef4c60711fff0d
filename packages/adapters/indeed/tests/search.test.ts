import { readFileSync } from 'node:fs';
import { describe, it, expect, vi } from 'vitest';
import type { Fetcher, FetchOutcome, QueryParams, ScrapeLogger } from '@jobsweep/scraper-sdk';
import { createIndeedAdapter, indeedJobTypeCode } from '../src/index.js';

const fixture = readFileSync(new URL('../fixtures/search.html', import.meta.url), 'utf8');
const now = () => new Date(2026, 2, 10);

function page(text: string): FetchOutcome {
  return { ok: true, text, url: 'https://www.indeed.com/jobs?q=barista' };
}

function mockFetcher(outcomes: FetchOutcome[]) {
  let index = 0;
  const fetch = vi.fn(async (_url: string, _params?: QueryParams): Promise<FetchOutcome> => {
    const outcome = outcomes[Math.min(index, outcomes.length - 1)] ?? page('');
    index += 1;
    return outcome;
  });
  const fetcher: Fetcher = { fetch };
  return { fetcher, fetch };
}

function cards(count: number, offset = 0): string {
  const items = Array.from({ length: count }, (_, i) => {
    const n = offset + i + 1;
    return `<div class="job_seen_beacon"><h2 class="jobTitle"><a href="/rc/clk?jk=${(4096 + n).toString(16)}">Server ${n}</a></h2><span data-testid="company-name">Diner ${n}</span></div>`;
  });
  return `<html><body>${items.join('')}</body></html>`;
}

function fakeLogger(): ScrapeLogger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('Indeed adapter', () => {
  it('maps job cards and drops masked ones', async () => {
    const { fetcher } = mockFetcher([page(fixture)]);
    const adapter = createIndeedAdapter({ fetcher, now, logger: fakeLogger() });

    const postings = await adapter.search({ query: 'barista', location: 'Springfield, IL' });

    expect(postings).toEqual([
      {
        source: 'indeed',
        sourceId: 'a1b2c3',
        title: 'Barista',
        company: 'Daily Grind',
        location: 'Springfield, IL',
        description: 'Prepare espresso drinks.',
        salaryText: '$15 - $18 an hour',
        salaryMin: 15,
        salaryMax: 18,
        salaryType: 'hourly',
        jobType: 'Part-time',
        url: 'https://www.indeed.com/rc/clk?jk=a1b2c3&from=serp',
        postedDate: '2026-03-07',
      },
    ]);
  });

  it('sends the search parameters', async () => {
    const { fetcher, fetch } = mockFetcher([page(fixture)]);
    const adapter = createIndeedAdapter({ fetcher, now, logger: fakeLogger() });

    await adapter.search({
      query: 'barista',
      location: 'Springfield, IL',
      radiusMiles: 25,
      jobTypes: ['Work-study', 'Part-time', 'Internship'],
    });

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(fetch).toHaveBeenCalledWith('https://www.indeed.com/jobs', {
      q: 'barista',
      l: 'Springfield, IL',
      radius: 25,
      start: 0,
      sort: 'date',
      jt: 'parttime',
    });
  });

  it('pages by 15 until a short page', async () => {
    const { fetcher, fetch } = mockFetcher([page(cards(15)), page(cards(3, 15))]);
    const adapter = createIndeedAdapter({ fetcher, now, logger: fakeLogger() });

    const postings = await adapter.search({ query: 'server', location: 'Springfield' });

    expect(postings).toHaveLength(18);
    expect(fetch).toHaveBeenCalledTimes(2);
    expect(fetch.mock.calls[1]?.[1]).toMatchObject({ start: 15 });
  });

  it('caps the result count', async () => {
    const { fetcher, fetch } = mockFetcher([page(cards(15))]);
    const adapter = createIndeedAdapter({ fetcher, now, logger: fakeLogger() });

    const postings = await adapter.search({ query: 'server', location: 'Springfield', maxResults: 10 });

    expect(postings.map((posting) => posting.title)).toEqual(Array.from({ length: 10 }, (_, i) => `Server ${i + 1}`));
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('falls back to JSON-LD when no cards are present', async () => {
    const body = `<script type="application/ld+json">${JSON.stringify({
      '@type': 'JobPosting',
      title: 'Line Cook',
      hiringOrganization: { name: 'Grill House' },
    })}</script>`;
    const { fetcher } = mockFetcher([page(body)]);
    const adapter = createIndeedAdapter({ fetcher, now, logger: fakeLogger() });

    const postings = await adapter.search({ query: 'cook', location: 'Springfield' });

    expect(postings.map((posting) => [posting.source, posting.title, posting.company])).toEqual([
      ['indeed', 'Line Cook', 'Grill House'],
    ]);
  });

  it('resolves to an empty list when the page cannot be fetched', async () => {
    const logger = fakeLogger();
    const { fetcher } = mockFetcher([
      { ok: false, failure: { kind: 'http_error', status: 503, message: 'unavailable' } },
    ]);
    const adapter = createIndeedAdapter({ fetcher, now, logger });

    await expect(adapter.search({ query: 'cook', location: 'Springfield' })).resolves.toEqual([]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});

describe('indeedJobTypeCode', () => {
  it('uses the first supported type', () => {
    expect(indeedJobTypeCode(['On-campus', 'Internship', 'Full-time'])).toBe('internship');
    expect(indeedJobTypeCode(['Work-study'])).toBeUndefined();
  });
});
