import type { Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import { generateSourceId, resolveUrl, type JobPosting, type JobType } from '@jobsweep/scraper-sdk';
import {
  findByClass,
  firstPresent,
  jobTypeFromText,
  parseRelativeDate,
  parseSalary,
  textOf,
  type ExtractionStrategy,
  type Page,
} from '@jobsweep/extractors';

const CARD_CLASS = /job_seen_beacon|jobsearch-SerpJobCard|resultContent/;
const JOB_KEY = /jk=([a-f0-9]+)/;

function metadataJobType(card: Cheerio<Element>): JobType | undefined {
  const metadata = card.find('div').filter((_, element) => /metadata|attribute/.test(element.attribs.class ?? ''));
  for (let index = 0; index < metadata.length; index++) {
    const jobType = jobTypeFromText(textOf(metadata.eq(index)));
    if (jobType) return jobType;
  }
  return undefined;
}

function parseCard(card: Cheerio<Element>, page: Page, now: Date): JobPosting | null {
  const title = textOf(
    firstPresent(
      () => findByClass(card, 'h2, a', /jobTitle/),
      () => card.find('span[id*="jobTitle"]').first(),
    ),
  );
  if (!title) return null;

  const link = resolveUrl(card.find('a[href]').first().attr('href'), page.url);
  const salaryText =
    textOf(
      firstPresent(
        () => card.find('div[data-testid="attribute_snippet_testid"]').first(),
        () => findByClass(card, 'span', /salary|estimated/),
      ),
    ) || undefined;
  const salary = parseSalary(salaryText);

  return {
    source: page.source,
    sourceId: link?.match(JOB_KEY)?.[1] ?? generateSourceId(title, link),
    title,
    company:
      textOf(
        firstPresent(
          () => card.find('span[data-testid="company-name"]').first(),
          () => findByClass(card, 'span', /company/),
        ),
      ) || 'Unknown',
    location: textOf(
      firstPresent(
        () => card.find('div[data-testid="text-location"]').first(),
        () => findByClass(card, 'div', /location/),
      ),
    ),
    description: textOf(findByClass(card, 'div', /job-snippet/)),
    salaryText,
    salaryMin: salary?.min,
    salaryMax: salary?.max,
    salaryType: salary?.type,
    jobType: metadataJobType(card),
    url: link ?? page.url,
    postedDate: parseRelativeDate(textOf(findByClass(card, 'span', /date/)), { now }),
  };
}

export function createIndeedCardStrategy(now: () => Date = () => new Date()): ExtractionStrategy {
  return {
    name: 'indeed-cards',
    extract(page) {
      const $ = page.dom();
      let cards = $('div').filter((_, element) => CARD_CLASS.test(element.attribs.class ?? ''));
      if (cards.length === 0) {
        cards = $('td.resultContent');
      }

      const today = now();
      return cards
        .toArray()
        .map((element) => parseCard($(element), page, today))
        .filter((posting): posting is JobPosting => posting !== null);
    },
  };
}
