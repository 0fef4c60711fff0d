import { describe, it, expect, vi } from 'vitest';
import type { JobPosting, ScrapeLogger } from '@jobsweep/scraper-sdk';
import { createPage, type ExtractionStrategy } from '../src/page.js';
import { mergeStrategies, runStrategies } from '../src/runner.js';

function posting(title: string): JobPosting {
  return {
    source: 'test',
    sourceId: title,
    title,
    company: 'Acme',
    location: '',
    description: '',
    url: 'https://example.com/jobs',
  };
}

function fixed(name: string, titles: string[]): ExtractionStrategy {
  return { name, extract: () => titles.map(posting) };
}

const failing: ExtractionStrategy = {
  name: 'failing',
  extract: () => {
    throw new Error('boom');
  },
};

function fakeLogger(): ScrapeLogger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const page = createPage({ source: 'test', url: 'https://example.com/jobs', body: '' });

describe('runStrategies', () => {
  it('returns the first non-empty result in first mode', () => {
    const result = runStrategies(page, [fixed('empty', []), fixed('a', ['Cook']), fixed('b', ['Baker'])]);
    expect(result.map((p) => p.title)).toEqual(['Cook']);
  });

  it('concatenates every result in merge mode', () => {
    const result = runStrategies(page, [fixed('a', ['Cook']), fixed('b', ['Baker'])], { mode: 'merge' });
    expect(result.map((p) => p.title)).toEqual(['Cook', 'Baker']);
  });

  it('treats a throwing strategy as empty and logs it', () => {
    const logger = fakeLogger();
    const result = runStrategies(page, [failing, fixed('a', ['Cook'])], { logger });

    expect(result.map((p) => p.title)).toEqual(['Cook']);
    expect(logger.warn).toHaveBeenCalledWith(
      'Extraction strategy failed',
      expect.objectContaining({ source: 'test', strategy: 'failing' }),
    );
  });
});

describe('mergeStrategies', () => {
  it('acts as a single strategy', () => {
    const merged = mergeStrategies('listings', [fixed('a', ['Cook']), failing, fixed('b', ['Baker'])], fakeLogger());
    expect(runStrategies(page, [fixed('empty', []), merged]).map((p) => p.title)).toEqual(['Cook', 'Baker']);
  });
});
