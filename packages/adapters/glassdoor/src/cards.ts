import type { Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import { generateSourceId, resolveUrl, type JobPosting } from '@jobsweep/scraper-sdk';
import {
  findByClass,
  firstPresent,
  parseRelativeDate,
  parseSalary,
  textOf,
  type ExtractionStrategy,
  type Page,
} from '@jobsweep/extractors';

const CARD_CLASS = /JobsList_jobListItem|react-job-listing/;
const LISTING_ID = /jobListingId=(\d+)/;

function titleOf(card: Cheerio<Element>): string {
  const element = firstPresent(
    () => findByClass(card, 'a', /jobTitle|JobCard_jobTitle/),
    () => card.find('div[data-test="job-title"]').first(),
  );
  if (element) return textOf(element);

  const normalized = card.is('[data-normalize-job-title]') ? card : card.find('[data-normalize-job-title]').first();
  return (normalized.attr('data-normalize-job-title') ?? '').trim();
}

function parseCard(card: Cheerio<Element>, page: Page, now: Date): JobPosting | null {
  const title = titleOf(card);
  if (!title) return null;

  const link = resolveUrl(card.find('a[href]').first().attr('href'), page.url);
  const listingId = card.attr('data-id') ?? card.attr('data-job-id') ?? link?.match(LISTING_ID)?.[1];
  const salaryText =
    textOf(
      firstPresent(
        () => card.find('div[data-test="detailSalary"]').first(),
        () => findByClass(card, 'span', /JobCard_salaryEstimate/),
      ),
    ) || undefined;
  const salary = parseSalary(salaryText);
  const age = textOf(
    firstPresent(
      () => card.find('div[data-test="job-age"]').first(),
      () => findByClass(card, 'span', /JobCard_listingAge/),
    ),
  );

  return {
    source: page.source,
    sourceId: listingId || generateSourceId(title, link),
    title,
    company:
      textOf(
        firstPresent(
          () => card.find('div[data-test="employer-short-name"]').first(),
          () => findByClass(card, 'span', /EmployerProfile_employerName|JobCard_companyName/),
        ),
      ) || 'Unknown',
    location: textOf(
      firstPresent(
        () => card.find('div[data-test="emp-location"]').first(),
        () => findByClass(card, 'span, div', /JobCard_location/),
      ),
    ),
    description: '',
    salaryText,
    salaryMin: salary?.min,
    salaryMax: salary?.max,
    salaryType: salary?.type,
    url: link ?? page.url,
    postedDate: parseRelativeDate(age, { now, compact: true }),
  };
}

export function createGlassdoorCardStrategy(now: () => Date = () => new Date()): ExtractionStrategy {
  return {
    name: 'glassdoor-cards',
    extract(page) {
      const $ = page.dom();
      let cards = $('li').filter((_, element) => CARD_CLASS.test(element.attribs.class ?? ''));
      if (cards.length === 0) {
        cards = $('div[data-test="jobListing"]');
      }
      if (cards.length === 0) {
        cards = $('[data-id][data-normalize-job-title]');
      }

      const today = now();
      return cards
        .toArray()
        .map((element) => parseCard($(element), page, today))
        .filter((posting): posting is JobPosting => posting !== null);
    },
  };
}
