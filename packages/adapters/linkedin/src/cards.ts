import type { Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import { generateSourceId, resolveUrl, type JobPosting, type JobType } from '@jobsweep/scraper-sdk';
import {
  findByClass,
  firstPresent,
  jobTypeFromText,
  parseIsoDate,
  parseRelativeDate,
  parseSalary,
  textOf,
  type ExtractionStrategy,
  type Page,
} from '@jobsweep/extractors';

const CARD_CLASS = /base-card|job-search-card/;
/** `/jobs/view/3812345678` and `/jobs/view/barista-at-daily-grind-3812345678`. */
const JOB_ID = /jobs\/view\/(?:[^/?]*-)?(\d+)/;
const SALARY_HINT = /\$|hour|year/;

interface CardMetadata {
  jobType?: JobType;
  salaryText?: string;
}

function readMetadata(card: Cheerio<Element>): CardMetadata {
  const metadata: CardMetadata = {};
  const items = card.find('span').filter((_, element) => /job-card-container__metadata-item/.test(element.attribs.class ?? ''));

  for (let index = 0; index < items.length; index++) {
    const text = textOf(items.eq(index));
    const jobType = jobTypeFromText(text);
    if (jobType) {
      metadata.jobType = metadata.jobType ?? jobType;
    } else if (SALARY_HINT.test(text.toLowerCase())) {
      metadata.salaryText = metadata.salaryText ?? text;
    }
  }

  const salaryInfo = textOf(findByClass(card, 'span', /salary-info/));
  if (salaryInfo && !metadata.salaryText) {
    metadata.salaryText = salaryInfo;
  }

  return metadata;
}

function postedDateOf(card: Cheerio<Element>, now: Date): string | undefined {
  const time = findByClass(card, 'time', /job-search-card__listdate/);
  if (time.length === 0) return undefined;
  return parseIsoDate(time.attr('datetime')) ?? parseRelativeDate(textOf(time), { now });
}

function parseCard(card: Cheerio<Element>, page: Page, now: Date): JobPosting | null {
  const title = textOf(
    firstPresent(
      () => findByClass(card, 'h3', /base-search-card__title|job-title/),
      () => findByClass(card, 'a', /job-card-list__title/),
      () => findByClass(card, 'span', /sr-only/),
    ),
  );
  if (!title) return null;

  const anchor = firstPresent(
    () => findByClass(card, 'a', /base-card__full-link|job-card-container__link/),
    () => card.find('a[href]').first(),
  );
  const link = resolveUrl(anchor?.attr('href'), page.url);
  const { jobType, salaryText } = readMetadata(card);
  const salary = parseSalary(salaryText, { allowMillions: true });

  return {
    source: page.source,
    sourceId: link?.match(JOB_ID)?.[1] ?? generateSourceId(title, link),
    title,
    company:
      textOf(
        firstPresent(
          () => findByClass(card, 'h4', /base-search-card__subtitle/),
          () => findByClass(card, 'a', /job-card-container__company-name/),
        ),
      ) || 'Unknown',
    location: textOf(findByClass(card, 'span', /job-search-card__location|job-card-container__metadata-item/)),
    description: '',
    salaryText,
    salaryMin: salary?.min,
    salaryMax: salary?.max,
    salaryType: salary?.type,
    jobType,
    url: link ?? page.url,
    postedDate: postedDateOf(card, now),
  };
}

export function createLinkedInCardStrategy(now: () => Date = () => new Date()): ExtractionStrategy {
  return {
    name: 'linkedin-cards',
    extract(page) {
      const $ = page.dom();
      let cards = $('div').filter((_, element) => CARD_CLASS.test(element.attribs.class ?? ''));
      if (cards.length === 0) {
        cards = $('ul')
          .filter((_, element) => /jobs-search__results-list/.test(element.attribs.class ?? ''))
          .first()
          .children('li');
      }

      const today = now();
      return cards
        .toArray()
        .map((element) => parseCard($(element), page, today))
        .filter((posting): posting is JobPosting => posting !== null);
    },
  };
}
