import {
  cleanText,
  DEFAULT_DESCRIPTION_LENGTH,
  generateSourceId,
  resolveUrl,
  stripHtml,
  truncate,
  type JobPosting,
  type SalaryType,
} from '@jobsweep/scraper-sdk';
import { parseIsoDate } from './dates.js';
import { jobTypeFromEmploymentType } from './job-type.js';
import { asNumber, asString, isRecord, toArray, type JsonRecord } from './json.js';
import { defaultCompany, scriptContent, type ExtractionStrategy, type Page } from './page.js';

function hasType(record: JsonRecord, type: string): boolean {
  return toArray(record['@type']).includes(type);
}

/** Flattens the shapes sites publish: single object, array, ItemList, @graph. */
export function collectJobPostingNodes(data: unknown): JsonRecord[] {
  if (Array.isArray(data)) {
    return data.flatMap((item) => collectJobPostingNodes(item));
  }

  if (!isRecord(data)) return [];

  if (hasType(data, 'JobPosting')) return [data];

  if (hasType(data, 'ItemList')) {
    return toArray(data.itemListElement).flatMap((entry) => {
      const node = isRecord(entry) && entry.item !== undefined ? entry.item : entry;
      return collectJobPostingNodes(node);
    });
  }

  if (data['@graph'] !== undefined) {
    return collectJobPostingNodes(data['@graph']);
  }

  return [];
}

function companyOf(node: JsonRecord): string | undefined {
  const organization = node.hiringOrganization;
  if (isRecord(organization)) return asString(organization.name);
  return asString(organization);
}

function locationOf(node: JsonRecord): string {
  const first = toArray(node.jobLocation)[0];
  if (!isRecord(first)) return cleanText(asString(first));

  const address = first.address;
  if (!isRecord(address)) return cleanText(asString(address));

  return [asString(address.addressLocality), asString(address.addressRegion)]
    .map((part) => cleanText(part))
    .filter(Boolean)
    .join(', ');
}

function formatAmount(value: number): string {
  return `$${value.toLocaleString('en-US', { maximumFractionDigits: 0 })}`;
}

interface SalaryFields {
  salaryText?: string;
  salaryMin?: number;
  salaryMax?: number;
  salaryType?: SalaryType;
}

function salaryOf(node: JsonRecord): SalaryFields {
  const base = node.baseSalary;
  if (!isRecord(base)) return {};

  const value = base.value;
  let min: number | undefined;
  let max: number | undefined;
  let unit: string | undefined = asString(base.unitText);

  if (isRecord(value)) {
    min = asNumber(value.minValue);
    max = asNumber(value.maxValue);
    const single = asNumber(value.value);
    if (min === undefined && max === undefined && single !== undefined) {
      min = single;
      max = single;
    }
    unit = asString(value.unitText) ?? unit;
  } else {
    const single = asNumber(value);
    min = single;
    max = single;
  }

  if (min === undefined && max === undefined) return {};

  const salaryType: SalaryType = (unit ?? 'YEAR').toUpperCase().includes('YEAR') ? 'yearly' : 'hourly';
  const per = salaryType === 'yearly' ? 'year' : 'hour';

  let salaryText: string;
  if (min !== undefined && max !== undefined && min !== max) {
    salaryText = `${formatAmount(min)} - ${formatAmount(max)} per ${per}`;
  } else {
    salaryText = `${formatAmount(min ?? max ?? 0)} per ${per}`;
  }

  return { salaryText, salaryMin: min, salaryMax: max, salaryType };
}

function identifierOf(node: JsonRecord): string | undefined {
  const identifier = node.identifier;
  const raw = isRecord(identifier) ? asString(identifier.value) : asString(identifier);
  const cleaned = cleanText(raw);
  return cleaned || undefined;
}

export interface JsonLdOptions {
  maxDescriptionLength?: number;
}

export function postingFromJsonLd(node: JsonRecord, page: Page, options: JsonLdOptions = {}): JobPosting | null {
  const title = cleanText(asString(node.title));
  if (!title) return null;

  const company = cleanText(companyOf(node)) || defaultCompany(page);
  const link = resolveUrl(asString(node.url), page.url);

  return {
    source: page.source,
    sourceId: identifierOf(node) ?? generateSourceId(title, company, link),
    title,
    company,
    location: locationOf(node),
    description: truncate(stripHtml(asString(node.description) ?? ''), options.maxDescriptionLength ?? DEFAULT_DESCRIPTION_LENGTH),
    ...salaryOf(node),
    jobType: jobTypeFromEmploymentType(node.employmentType),
    url: link ?? page.url,
    postedDate: parseIsoDate(node.datePosted),
  };
}

export function createJsonLdStrategy(options: JsonLdOptions = {}): ExtractionStrategy {
  return {
    name: 'json-ld',
    extract(page) {
      const $ = page.dom();
      const postings: JobPosting[] = [];

      for (const element of $('script[type="application/ld+json"]').toArray()) {
        let data: unknown;
        try {
          data = JSON.parse(scriptContent(element));
        } catch {
          // One broken block does not hide the others.
          continue;
        }

        for (const node of collectJobPostingNodes(data)) {
          const posting = postingFromJsonLd(node, page, options);
          if (posting) postings.push(posting);
        }
      }

      return postings;
    },
  };
}

export const jsonLdStrategy = createJsonLdStrategy();
