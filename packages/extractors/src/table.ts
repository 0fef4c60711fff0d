import { cleanText, generateSourceId, resolveUrl, type JobPosting } from '@jobsweep/scraper-sdk';
import { jobTypeFromText } from './job-type.js';
import { defaultCompany, type ExtractionStrategy } from './page.js';

const HEADER_KEYWORDS = /job|position|title|employer|company/;

/**
 * Job tables: a header row naming jobs or employers, then one posting per
 * row as title, company, location, type.
 */
export const tableStrategy: ExtractionStrategy = {
  name: 'table',
  extract(page) {
    const $ = page.dom();
    const postings: JobPosting[] = [];

    for (const table of $('table').toArray()) {
      const headers = $(table)
        .find('th')
        .toArray()
        .map((th) => $(th).text().toLowerCase())
        .join(' ');
      if (!HEADER_KEYWORDS.test(headers)) continue;

      for (const row of $(table).find('tr').slice(1).toArray()) {
        const cells = $(row).children('td, th');
        if (cells.length < 2) continue;

        const first = cells.eq(0);
        const title = cleanText(first.text());
        if (title.length < 3) continue;

        const company = cleanText(cells.eq(1).text()) || defaultCompany(page);
        const link = resolveUrl(first.find('a[href]').first().attr('href'), page.url);

        postings.push({
          source: page.source,
          sourceId: generateSourceId(title, company),
          title,
          company,
          location: cleanText(cells.eq(2).text()),
          description: '',
          jobType: jobTypeFromText(cells.eq(3).text()),
          url: link ?? page.url,
        });
      }
    }

    return postings;
  },
};
