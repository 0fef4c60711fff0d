import { XMLParser } from 'fast-xml-parser';
import { cleanText, generateSourceId, resolveUrl, stripHtml, truncate, type JobPosting } from '@jobsweep/scraper-sdk';
import { parseFeedDate } from './dates.js';
import { asString, firstDefined, isRecord, toArray, type JsonRecord } from './json.js';
import { defaultCompany, type ExtractionStrategy, type Page } from './page.js';

const FEED_INDICATORS = ['.rss', '.xml', '/feed', '/rss', 'format=rss', 'format=atom'];

export function isFeedUrl(url: string): boolean {
  const lower = url.toLowerCase();
  return FEED_INDICATORS.some((indicator) => lower.includes(indicator));
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  parseTagValue: false,
});

function textOf(value: unknown): string | undefined {
  if (isRecord(value)) return asString(value['#text']);
  return asString(value);
}

/** RSS links are text; Atom links are elements, the alternate one preferred. */
function linkOf(item: JsonRecord): string | undefined {
  const links = toArray(item.link);
  const alternate = links.find((link) => isRecord(link) && (link['@_rel'] === undefined || link['@_rel'] === 'alternate'));

  for (const link of alternate === undefined ? links : [alternate, ...links]) {
    const href = isRecord(link) ? asString(link['@_href']) ?? textOf(link) : asString(link);
    if (href) return href;
  }

  return textOf(item.guid) ?? textOf(item.id);
}

function feedItems(document: unknown): JsonRecord[] {
  if (!isRecord(document)) return [];

  const rss = isRecord(document.rss) ? document.rss.channel : document.channel;
  const atom = isRecord(document.feed) ? document.feed.entry : undefined;
  const rdf = isRecord(document['rdf:RDF']) ? document['rdf:RDF'].item : undefined;
  const channelItems = isRecord(rss) ? rss.item : undefined;

  return [...toArray(channelItems), ...toArray(atom), ...toArray(rdf)].filter(isRecord);
}

function postingFromItem(item: JsonRecord, page: Page): JobPosting | null {
  const title = cleanText(textOf(item.title));
  if (!title) return null;

  const link = resolveUrl(linkOf(item), page.url);
  const rawDescription = textOf(firstDefined(item, ['description', 'summary', 'content', 'content:encoded']));

  return {
    source: page.source,
    sourceId: generateSourceId(title, link),
    title,
    company: defaultCompany(page),
    location: '',
    description: truncate(stripHtml(rawDescription ?? '')),
    url: link ?? page.url,
    postedDate: parseFeedDate(textOf(firstDefined(item, ['pubDate', 'published', 'updated', 'dc:date']))),
  };
}

export const feedStrategy: ExtractionStrategy = {
  name: 'feed',
  extract(page) {
    let parsed: unknown;
    try {
      parsed = parser.parse(page.body);
    } catch {
      // Unparseable XML yields nothing.
      return [];
    }

    const postings: JobPosting[] = [];
    for (const item of feedItems(parsed)) {
      const posting = postingFromItem(item, page);
      if (posting) postings.push(posting);
    }
    return postings;
  },
};
