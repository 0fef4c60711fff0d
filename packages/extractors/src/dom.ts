import type { Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import { cleanText } from '@jobsweep/scraper-sdk';

/** First descendant matching `selector` whose class attribute matches `className`. */
export function findByClass(scope: Cheerio<Element>, selector: string, className: RegExp): Cheerio<Element> {
  return scope
    .find(selector)
    .filter((_, element) => className.test(element.attribs.class ?? ''))
    .first();
}

/** First non-empty selection, tried in order. */
export function firstPresent(...candidates: Array<() => Cheerio<Element>>): Cheerio<Element> | undefined {
  for (const candidate of candidates) {
    const selection = candidate();
    if (selection.length > 0) return selection;
  }
  return undefined;
}

export function textOf(selection: Cheerio<Element> | undefined): string {
  return selection ? cleanText(selection.text()) : '';
}
