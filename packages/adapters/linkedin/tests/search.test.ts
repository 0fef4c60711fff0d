import { readFileSync } from 'node:fs';
import { describe, it, expect, vi } from 'vitest';
import type { Fetcher, FetchOutcome, QueryParams, ScrapeLogger } from '@jobsweep/scraper-sdk';
import { createLinkedInAdapter, linkedInDistance, linkedInJobTypeCodes } from '../src/index.js';

const fixture = readFileSync(new URL('../fixtures/search.html', import.meta.url), 'utf8');
const now = () => new Date(2026, 2, 10);

function page(text: string): FetchOutcome {
  return { ok: true, text, url: 'https://www.linkedin.com/jobs/search?keywords=assistant' };
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

describe('LinkedIn adapter', () => {
  it('maps guest search cards', async () => {
    const { fetcher } = mockFetcher([page(fixture)]);
    const adapter = createLinkedInAdapter({ fetcher, now, logger: fakeLogger() });

    const postings = await adapter.search({ query: 'assistant', location: 'Springfield, IL' });

    expect(postings).toEqual([
      {
        source: 'linkedin',
        sourceId: '3812345678',
        title: 'Student Assistant',
        company: 'Springfield Library',
        location: 'Springfield, IL',
        description: '',
        salaryText: '$16.00 - $19.50 per hour',
        salaryMin: 16,
        salaryMax: 19.5,
        salaryType: 'hourly',
        jobType: undefined,
        url: 'https://www.linkedin.com/jobs/view/student-assistant-at-springfield-library-3812345678?refId=abc',
        postedDate: '2026-03-04',
      },
      {
        source: 'linkedin',
        sourceId: '9988776655',
        title: 'Marketing Intern',
        company: 'Shelbyville Media',
        location: 'Shelbyville, IL',
        description: '',
        salaryText: undefined,
        salaryMin: undefined,
        salaryMax: undefined,
        salaryType: undefined,
        jobType: 'Internship',
        url: 'https://www.linkedin.com/jobs/view/9988776655/',
        postedDate: '2026-02-24',
      },
    ]);
  });

  it('sends distance buckets, type codes and experience levels', async () => {
    const { fetcher, fetch } = mockFetcher([page(fixture)]);
    const adapter = createLinkedInAdapter({ fetcher, now, logger: fakeLogger() });

    await adapter.search({
      query: 'assistant',
      location: 'Springfield, IL',
      radiusMiles: 30,
      jobTypes: ['Part-time', 'Internship', 'Work-study'],
    });

    expect(fetch).toHaveBeenCalledWith('https://www.linkedin.com/jobs/search', {
      keywords: 'assistant',
      location: 'Springfield, IL',
      distance: 50,
      start: 0,
      sortBy: 'DD',
      f_JT: 'P,I',
      f_E: '1,2',
    });
  });

  it('reads list items when cards carry no card class', async () => {
    const body = `<ul class="jobs-search__results-list">
      <li><h3 class="job-title">Gallery Attendant</h3><a href="/jobs/view/1234">View</a></li>
    </ul>`;
    const { fetcher } = mockFetcher([page(body)]);
    const adapter = createLinkedInAdapter({ fetcher, now, logger: fakeLogger() });

    const [posting] = await adapter.search({ query: 'gallery', location: 'Springfield' });

    expect(posting?.title).toBe('Gallery Attendant');
    expect(posting?.sourceId).toBe('1234');
    expect(posting?.company).toBe('Unknown');
  });

  it('stops paging once the caller aborts', async () => {
    const controller = new AbortController();
    controller.abort();
    const { fetcher, fetch } = mockFetcher([page(fixture)]);
    const adapter = createLinkedInAdapter({ fetcher, now, logger: fakeLogger() });

    await expect(
      adapter.search({ query: 'assistant', location: 'Springfield', signal: controller.signal }),
    ).resolves.toEqual([]);
    expect(fetch).not.toHaveBeenCalled();
  });
});

describe('linkedInDistance', () => {
  it('rounds up to a supported distance', () => {
    expect(linkedInDistance(3)).toBe(5);
    expect(linkedInDistance(10)).toBe(10);
    expect(linkedInDistance(11)).toBe(25);
    expect(linkedInDistance(75)).toBe(100);
    expect(linkedInDistance(500)).toBe(100);
  });
});

describe('linkedInJobTypeCodes', () => {
  it('omits the filter when no type maps', () => {
    expect(linkedInJobTypeCodes(['On-campus'])).toBeUndefined();
    expect(linkedInJobTypeCodes(['Full-time', 'Temporary'])).toBe('F,T');
  });
});
