import { describe, it, expect } from 'vitest';
import { generateSourceId } from '@jobsweep/scraper-sdk';
import { createEmbeddedJsonStrategy, embeddedJsonStrategy, findJobRecords } from '../src/embedded-json.js';
import { createPage } from '../src/page.js';
import { fixturePage } from './fixtures.js';

const PAGE_URL = 'https://jobs.example/search';

describe('embeddedJsonStrategy', () => {
  it('finds listings nested under framework state', () => {
    const postings = embeddedJsonStrategy.extract(fixturePage('next-data.html', { source: 'test', url: PAGE_URL }));

    expect(postings).toEqual([
      {
        source: 'test',
        sourceId: '9001',
        title: 'Library Page',
        company: 'Springfield Public Library',
        location: 'Springfield, IL',
        description: 'Shelve books & help patrons.',
        salaryText: undefined,
        salaryMin: undefined,
        salaryMax: undefined,
        salaryType: undefined,
        jobType: 'Part-time',
        url: 'https://jobs.example/apply/9001',
        postedDate: '2026-02-20',
      },
      {
        source: 'test',
        sourceId: generateSourceId('Tutor', 'Learning Hub', 'https://learninghub.example/jobs/tutor'),
        title: 'Tutor',
        company: 'Learning Hub',
        location: 'Capital City',
        description: '',
        salaryText: undefined,
        salaryMin: undefined,
        salaryMax: undefined,
        salaryType: undefined,
        jobType: undefined,
        url: 'https://learninghub.example/jobs/tutor',
        postedDate: undefined,
      },
    ]);
  });

  it('returns nothing for malformed JSON', () => {
    const page = createPage({
      source: 'test',
      url: PAGE_URL,
      body: '<script id="__NEXT_DATA__">{"props": {"jobs": [</script>',
    });
    expect(embeddedJsonStrategy.extract(page)).toEqual([]);
  });

  it('only reads the configured script ids', () => {
    const body = '<script id="app-state">{"jobs":[{"title":"Ranger","company":"Parks"}]}</script>';
    const page = createPage({ source: 'test', url: PAGE_URL, body });

    expect(embeddedJsonStrategy.extract(page)).toEqual([]);
    expect(createEmbeddedJsonStrategy({ scriptIds: ['app-state'] }).extract(page).map((p) => p.title)).toEqual(['Ranger']);
  });
});

describe('findJobRecords', () => {
  it('stops descending past the depth limit', () => {
    const job = { title: 'Deep', company: 'Nested' };
    expect(findJobRecords({ data: { data: { data: { data: { data: job } } } } })).toEqual([job]);
    expect(findJobRecords({ data: { data: { data: { data: { data: { data: job } } } } } })).toEqual([]);
  });
});
