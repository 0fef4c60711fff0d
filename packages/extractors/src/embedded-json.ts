import {
  cleanText,
  generateSourceId,
  resolveUrl,
  stripHtml,
  truncate,
  type JobPosting,
} from '@jobsweep/scraper-sdk';
import { parseIsoDate } from './dates.js';
import { jobTypeFromEmploymentType } from './job-type.js';
import { asString, firstDefined, isRecord, type JsonRecord } from './json.js';
import { defaultCompany, scriptContent, type ExtractionStrategy, type Page } from './page.js';
import { parseSalary } from './salary.js';

export const EMBEDDED_SCRIPT_IDS = ['__NEXT_DATA__', '__NUXT__'] as const;
const MAX_DEPTH = 5;

const CONTAINER_KEYS = [
  'jobs',
  'listings',
  'results',
  'items',
  'data',
  'pageProps',
  'props',
  'state',
  'searchResults',
  'initialJobs',
] as const;

const TITLE_KEYS = ['title', 'jobTitle'] as const;
const COMPANY_KEYS = ['company', 'employer', 'companyName', 'company_name'] as const;

function looksLikeJob(record: JsonRecord): boolean {
  return TITLE_KEYS.some((key) => key in record) && COMPANY_KEYS.some((key) => key in record);
}

/** Depth-limited walk over the keys frameworks usually nest listings under. */
export function findJobRecords(data: unknown, depth = 0): JsonRecord[] {
  if (depth > MAX_DEPTH) return [];

  if (Array.isArray(data)) {
    return data.flatMap((item) => findJobRecords(item, depth + 1));
  }

  if (!isRecord(data)) return [];

  const found: JsonRecord[] = [];
  if (looksLikeJob(data)) {
    found.push(data);
  }

  for (const key of CONTAINER_KEYS) {
    if (key in data) {
      found.push(...findJobRecords(data[key], depth + 1));
    }
  }

  return found;
}

function companyOf(record: JsonRecord): string | undefined {
  const value = firstDefined(record, COMPANY_KEYS);
  if (isRecord(value)) return asString(value.name);
  return asString(value);
}

function locationOf(record: JsonRecord): string {
  const value = firstDefined(record, ['location', 'city']);
  if (isRecord(value)) {
    return [asString(value.city), asString(value.state) ?? asString(value.region)]
      .map((part) => cleanText(part))
      .filter(Boolean)
      .join(', ');
  }
  return cleanText(asString(value));
}

export function postingFromEmbeddedRecord(record: JsonRecord, page: Page): JobPosting | null {
  const title = cleanText(asString(firstDefined(record, ['title', 'jobTitle', 'name'])));
  if (!title) return null;

  const company = cleanText(companyOf(record)) || defaultCompany(page);
  const link = resolveUrl(asString(firstDefined(record, ['url', 'applyUrl', 'apply_url', 'jobUrl'])), page.url);
  const description = truncate(stripHtml(asString(firstDefined(record, ['description', 'summary'])) ?? ''));
  const id = asString(firstDefined(record, ['id', 'jobId']));

  const salaryText = cleanText(asString(record.salary)) || undefined;
  const salary = parseSalary(salaryText);

  return {
    source: page.source,
    sourceId: id ?? generateSourceId(title, company, link),
    title,
    company,
    location: locationOf(record),
    description,
    salaryText,
    salaryMin: salary?.min,
    salaryMax: salary?.max,
    salaryType: salary?.type,
    jobType: jobTypeFromEmploymentType(firstDefined(record, ['employmentType', 'employment_type', 'jobType', 'job_type'])),
    url: link ?? page.url,
    postedDate: parseIsoDate(firstDefined(record, ['datePosted', 'postedDate', 'createdAt'])),
  };
}

export interface EmbeddedJsonOptions {
  scriptIds?: readonly string[];
}

export function createEmbeddedJsonStrategy(options: EmbeddedJsonOptions = {}): ExtractionStrategy {
  const scriptIds: readonly string[] = options.scriptIds ?? EMBEDDED_SCRIPT_IDS;

  return {
    name: 'embedded-json',
    extract(page) {
      const $ = page.dom();
      const postings: JobPosting[] = [];

      for (const element of $('script[id]').toArray()) {
        if (!scriptIds.includes(element.attribs.id ?? '')) continue;

        let data: unknown;
        try {
          data = JSON.parse(scriptContent(element));
        } catch {
          // Not JSON (e.g. an inline assignment); the page simply has no embedded state.
          continue;
        }

        for (const record of findJobRecords(data)) {
          const posting = postingFromEmbeddedRecord(record, page);
          if (posting) postings.push(posting);
        }
      }

      return postings;
    },
  };
}

export const embeddedJsonStrategy = createEmbeddedJsonStrategy();
