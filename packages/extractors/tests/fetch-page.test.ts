import { describe, it, expect, vi } from 'vitest';
import type { Fetcher, ScrapeLogger } from '@jobsweep/scraper-sdk';
import { fetchPage } from '../src/fetch-page.js';

function fakeLogger(): ScrapeLogger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('fetchPage', () => {
  it('wraps the fetched body in a page at the final URL', async () => {
    const fetcher: Fetcher = {
      fetch: vi.fn(async () => ({ ok: true as const, text: '<h1>Jobs</h1>', url: 'https://example.com/jobs?page=1' })),
    };

    const page = await fetchPage(fetcher, 'https://example.com/jobs', {
      source: 'test',
      params: { page: 1 },
      organization: 'Example College',
    });

    expect(fetcher.fetch).toHaveBeenCalledWith('https://example.com/jobs', { page: 1 });
    expect(page?.url).toBe('https://example.com/jobs?page=1');
    expect(page?.organization).toBe('Example College');
    expect(page?.dom()('h1').text()).toBe('Jobs');
  });

  it('logs a warning and returns undefined on failure', async () => {
    const logger = fakeLogger();
    const fetcher: Fetcher = {
      fetch: async () => ({ ok: false, failure: { kind: 'http_error', status: 404, message: 'not found' } }),
    };

    const page = await fetchPage(fetcher, 'https://example.com/jobs', { source: 'test', logger });

    expect(page).toBeUndefined();
    expect(logger.warn).toHaveBeenCalledWith('Page fetch failed', {
      source: 'test',
      url: 'https://example.com/jobs',
      kind: 'http_error',
      status: 404,
      message: 'not found',
    });
  });
});
