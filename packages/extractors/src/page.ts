import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { isText, type Element } from 'domhandler';
import type { JobPosting } from '@jobsweep/scraper-sdk';

export interface PageInput {
  /** Adapter id stamped on every posting extracted from this page. */
  source: string;
  /** Fetched URL; relative links resolve against it. */
  url: string;
  body: string;
  /** Fallback company for listings that do not name one. */
  organization?: string;
}

export interface Page extends PageInput {
  /** Parsed document, loaded on first use and shared by every strategy. */
  dom(): CheerioAPI;
}

export interface ExtractionStrategy {
  name: string;
  extract(page: Page): JobPosting[];
}

export function createPage(input: PageInput): Page {
  let loaded: CheerioAPI | undefined;

  return {
    ...input,
    dom() {
      if (!loaded) {
        loaded = cheerio.load(input.body);
      }
      return loaded;
    },
  };
}

export function defaultCompany(page: Page): string {
  return page.organization ?? 'Unknown';
}

/** Raw text of a script element; cheerio's text() is not used so entities stay untouched. */
export function scriptContent(element: Element): string {
  return element.children.map((child) => (isText(child) ? child.data : '')).join('');
}
