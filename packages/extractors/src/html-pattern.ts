import type { Cheerio } from 'cheerio';
import { isTag, type Element } from 'domhandler';
import {
  cleanText,
  DEFAULT_DESCRIPTION_LENGTH,
  generateSourceId,
  resolveUrl,
  truncate,
  type JobPosting,
} from '@jobsweep/scraper-sdk';
import { parseIsoDate, parseRelativeDate } from './dates.js';
import { findByClass, textOf } from './dom.js';
import { jobTypeFromText } from './job-type.js';
import { defaultCompany, type ExtractionStrategy, type Page } from './page.js';

export interface ContainerSelector {
  tag: string;
  /** Tested against the element's class attribute. */
  className: RegExp;
}

export const DEFAULT_CONTAINERS: readonly ContainerSelector[] = [
  { tag: 'div', className: /job|posting|listing|position|opportunity/i },
  { tag: 'article', className: /job|posting|listing/i },
  { tag: 'li', className: /job|posting|listing|position/i },
  { tag: 'tr', className: /job|posting|listing/i },
];

const TITLE_CLASS = /title|name|position/i;
const COMPANY_CLASS = /company|employer|department|org/i;
const LOCATION_CLASS = /location|city|campus/i;
const DESCRIPTION_CLASS = /description|summary|details/i;
const TYPE_CLASS = /type|category|employment/i;
const DATE_CLASS = /date|posted|time/i;

export interface HtmlPatternOptions {
  containers?: readonly ContainerSelector[];
  /** Capture group 1, matched against the posting URL, becomes the source id. */
  idPattern?: RegExp;
  /** Used only when no container yields a posting: the closest div, article or li of each matching anchor. */
  linkPattern?: RegExp;
  /** Read a date element and resolve relative phrases ("3 days ago"). */
  postedDate?: boolean;
  maxDescriptionLength?: number;
  now?: () => Date;
}

function textOfClass(container: Cheerio<Element>, tags: string, pattern: RegExp): string {
  return textOf(findByClass(container, tags, pattern));
}

function titleElementOf(container: Cheerio<Element>): Cheerio<Element> {
  const classed = findByClass(container, 'h1, h2, h3, h4, a', TITLE_CLASS);
  if (classed.length > 0) return classed;

  const heading = container.find('h1, h2, h3, h4').first();
  if (heading.length > 0) return heading;

  return container.find('a[href]').first();
}

function postedDateOf(container: Cheerio<Element>, now: Date): string | undefined {
  const element = findByClass(container, 'span, time, div', DATE_CLASS);
  if (element.length === 0) return undefined;

  return parseIsoDate(element.attr('datetime')) ?? parseRelativeDate(element.text(), { now });
}

export function createHtmlPatternStrategy(options: HtmlPatternOptions = {}): ExtractionStrategy {
  const containers = options.containers ?? DEFAULT_CONTAINERS;
  const maxDescriptionLength = options.maxDescriptionLength ?? DEFAULT_DESCRIPTION_LENGTH;

  function parseContainer(container: Cheerio<Element>, page: Page): JobPosting | null {
    const titleElement = titleElementOf(container);
    const title = cleanText(titleElement.text());
    if (title.length < 3) return null;

    const anchor = titleElement.is('a') ? titleElement : container.find('a[href]').first();
    const link = resolveUrl(anchor.attr('href'), page.url);
    const company = textOfClass(container, 'span, div, td, p', COMPANY_CLASS) || defaultCompany(page);

    const idMatch = link && options.idPattern ? link.match(options.idPattern) : null;
    const sourceId = idMatch?.[1] ?? generateSourceId(title, company, link);

    return {
      source: page.source,
      sourceId,
      title,
      company,
      location: textOfClass(container, 'span, div, td, p', LOCATION_CLASS),
      description: truncate(textOfClass(container, 'p, div', DESCRIPTION_CLASS), maxDescriptionLength),
      jobType: jobTypeFromText(textOfClass(container, 'span, div, td', TYPE_CLASS)),
      url: link ?? page.url,
      postedDate: options.postedDate ? postedDateOf(container, options.now?.() ?? new Date()) : undefined,
    };
  }

  return {
    name: 'html-pattern',
    extract(page) {
      const $ = page.dom();

      // First selector that yields anything wins; later ones are not consulted.
      for (const selector of containers) {
        const postings: JobPosting[] = [];
        for (const element of $(selector.tag).toArray().filter(isTag)) {
          if (!selector.className.test(element.attribs.class ?? '')) continue;
          const posting = parseContainer($(element), page);
          if (posting) postings.push(posting);
        }

        if (postings.length > 0) return postings;
      }

      const linkPattern = options.linkPattern;
      if (!linkPattern) return [];

      const seen = new Set<Element>();
      const postings: JobPosting[] = [];
      for (const anchor of $('a[href]').toArray()) {
        if (!linkPattern.test(anchor.attribs.href ?? '')) continue;

        const element = $(anchor).closest('div, article, li').toArray().find(isTag);
        if (!element || seen.has(element)) continue;
        seen.add(element);

        const posting = parseContainer($(element), page);
        if (posting) postings.push(posting);
      }

      return postings;
    },
  };
}

export const htmlPatternStrategy = createHtmlPatternStrategy();
