import { readFileSync } from 'node:fs';
import { describe, it, expect, vi } from 'vitest';
import { generateSourceId, type Fetcher, type FetchOutcome, type QueryParams, type ScrapeLogger } from '@jobsweep/scraper-sdk';
import { createGlassdoorAdapter, glassdoorJobTypeCode } from '../src/index.js';

const fixture = readFileSync(new URL('../fixtures/search.html', import.meta.url), 'utf8');
const now = () => new Date(2026, 2, 10);

function page(text: string): FetchOutcome {
  return { ok: true, text, url: 'https://www.glassdoor.com/Job/jobs.htm?sc.keyword=zoo' };
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

function fakeLogger(): ScrapeLogger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function listings(count: number): string {
  const items = Array.from(
    { length: count },
    (_, i) => `<li class="JobsList_jobListItem" data-id="${i + 1}"><a class="JobCard_jobTitle" href="/job/${i + 1}">Usher ${i + 1}</a></li>`,
  );
  return `<ul>${items.join('')}</ul>`;
}

describe('Glassdoor adapter', () => {
  it('maps listing cards', async () => {
    const { fetcher } = mockFetcher([page(fixture)]);
    const adapter = createGlassdoorAdapter({ fetcher, now, logger: fakeLogger() });

    const postings = await adapter.search({ query: 'zoo', location: 'Springfield, IL' });

    expect(postings).toEqual([
      {
        source: 'glassdoor',
        sourceId: '1009012345',
        title: 'Zookeeper Assistant',
        company: 'Springfield Zoo',
        location: 'Springfield, IL',
        description: '',
        salaryText: '$17.00 - $21.00 Per Hour (Employer est.)',
        salaryMin: 17,
        salaryMax: 21,
        salaryType: 'hourly',
        url: 'https://www.glassdoor.com/job-listing/zookeeper-assistant?jl=1009012345&jobListingId=1009012345',
        postedDate: '2026-03-07',
      },
      {
        source: 'glassdoor',
        sourceId: '555',
        title: 'Ticket Taker',
        company: 'Springfield Cinema',
        location: 'Springfield, IL',
        description: '',
        salaryText: undefined,
        salaryMin: undefined,
        salaryMax: undefined,
        salaryType: undefined,
        url: 'https://www.glassdoor.com/partner/jobListing.htm?pos=102',
        postedDate: '2026-02-08',
      },
    ]);
  });

  it('numbers pages from the second one on', async () => {
    const { fetcher, fetch } = mockFetcher([page(listings(30)), page(listings(2))]);
    const adapter = createGlassdoorAdapter({ fetcher, now, logger: fakeLogger() });

    await adapter.search({ query: 'usher', location: 'Springfield', radiusMiles: 15, jobTypes: ['Temporary'] });

    expect(fetch).toHaveBeenCalledTimes(2);
    expect(fetch.mock.calls[0]?.[1]).toEqual({
      'sc.keyword': 'usher',
      locT: 'C',
      locKeyword: 'Springfield',
      radius: 15,
      fromAge: '7',
      jobType: 'temporary',
      p: undefined,
    });
    expect(fetch.mock.calls[1]?.[1]).toMatchObject({ p: 2 });
  });

  it('keeps longer JSON-LD descriptions', async () => {
    const description = 'Care for animals. '.repeat(60).trim();
    const body = `<script type="application/ld+json">${JSON.stringify({
      '@type': 'JobPosting',
      title: 'Animal Care Intern',
      hiringOrganization: 'Springfield Zoo',
      url: 'https://www.glassdoor.com/job-listing/animal-care',
      description,
    })}</script>`;
    const { fetcher } = mockFetcher([page(body)]);
    const adapter = createGlassdoorAdapter({ fetcher, now, logger: fakeLogger() });

    const [posting] = await adapter.search({ query: 'animal', location: 'Springfield' });

    expect(posting?.description).toBe(description);
    expect(posting?.sourceId).toBe(
      generateSourceId('Animal Care Intern', 'Springfield Zoo', 'https://www.glassdoor.com/job-listing/animal-care'),
    );
  });
});

describe('glassdoorJobTypeCode', () => {
  it('maps the first supported type', () => {
    expect(glassdoorJobTypeCode(['Part-time', 'Full-time'])).toBe('parttime');
    expect(glassdoorJobTypeCode([])).toBeUndefined();
  });
});
