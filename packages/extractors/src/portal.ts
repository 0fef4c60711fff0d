import { readFileSync } from 'node:fs';
import type { CheerioAPI } from 'cheerio';
import { z } from 'zod';
import { portalSourceId, resolveUrl, type JobPosting } from '@jobsweep/scraper-sdk';
import type { ExtractionStrategy, Page } from './page.js';

export const portalDefinitionSchema = z.object({
  system: z.string().min(1),
  /** Matched against iframe sources, and against anchors when scanAnchors is set. */
  keywords: z.array(z.string().min(1)).min(1),
  domains: z.array(z.string().min(1)).default([]),
  scanAnchors: z.boolean().default(false),
  scanText: z.boolean().default(false),
  textAliases: z.array(z.string().min(1)).default([]),
  /** `{slug}` is replaced by the organization slug. */
  urlTemplate: z.string().optional(),
  requiresAuth: z.boolean().default(true),
});

export type PortalDefinition = z.infer<typeof portalDefinitionSchema>;
export type PortalDefinitionInput = z.input<typeof portalDefinitionSchema>;

export interface PortalMatch {
  system: string;
  url: string;
  requiresAuth: boolean;
}

export function parsePortalDefinitions(input: unknown): PortalDefinition[] {
  return z.array(portalDefinitionSchema).parse(input);
}

let bundled: PortalDefinition[] | undefined;

/** Portal vocabulary shipped in data/portals.json. */
export function loadPortalDefinitions(): PortalDefinition[] {
  if (!bundled) {
    const raw = readFileSync(new URL('../data/portals.json', import.meta.url), 'utf8');
    bundled = parsePortalDefinitions(JSON.parse(raw));
  }
  return bundled;
}

export function organizationSlug(organization: string): string {
  return organization.toLowerCase().replace(/\s+/g, '').replace(/university/g, '');
}

function match(portal: PortalDefinition, url: string): PortalMatch {
  return { system: portal.system, url, requiresAuth: portal.requiresAuth };
}

/**
 * Embedded iframes are checked first, then outbound links (by href, or by
 * link text for absolute links), then plain mentions in the visible page text.
 */
export function detectPortal(
  $: CheerioAPI,
  pageUrl: string,
  organization: string,
  portals: readonly PortalDefinition[],
): PortalMatch | undefined {
  for (const iframe of $('iframe[src]').toArray()) {
    const src = (iframe.attribs.src ?? '').trim();
    const lower = src.toLowerCase();
    const portal = portals.find((candidate) => candidate.keywords.some((keyword) => lower.includes(keyword)));
    if (portal) return match(portal, resolveUrl(src, pageUrl) ?? src);
  }

  const anchorPortals = portals.filter((portal) => portal.scanAnchors);
  for (const anchor of $('a[href]').toArray()) {
    const raw = (anchor.attribs.href ?? '').trim();
    const href = resolveUrl(raw, pageUrl);
    if (!href) continue;

    const lowerHref = href.toLowerCase();
    const lowerText = $(anchor).text().toLowerCase();
    const absolute = /^https?:/i.test(raw);
    for (const portal of anchorPortals) {
      const known = [...portal.domains, ...portal.keywords];
      if (known.some((pattern) => lowerHref.includes(pattern))) return match(portal, href);
      // A sign-in link labelled with the portal name is the real entry point.
      if (absolute && portal.keywords.some((keyword) => lowerText.includes(keyword))) return match(portal, href);
    }
  }

  const visible = $.root().clone();
  visible.find('script, style, noscript, template').remove();
  const pageText = visible.text().toLowerCase();
  for (const portal of portals) {
    if (!portal.scanText || !portal.urlTemplate) continue;

    const mentions = [...portal.keywords, ...portal.textAliases];
    if (mentions.some((mention) => pageText.includes(mention))) {
      return match(portal, portal.urlTemplate.replace('{slug}', organizationSlug(organization)));
    }
  }

  return undefined;
}

export function portalGuidance(organization: string, portal: PortalMatch): string {
  const access = portal.requiresAuth
    ? `Sign in with your ${organization} student account to browse and apply.`
    : 'Open the portal to browse and apply.';
  return `${organization} lists its jobs on ${portal.system}, which this tool cannot search directly. ${access} Visit ${portal.url} to see current openings.`;
}

export function portalRedirectPosting(page: Page, organization: string, portal: PortalMatch): JobPosting {
  return {
    source: page.source,
    sourceId: portalSourceId(organization),
    title: `Access ${organization} jobs on ${portal.system}`,
    company: organization,
    location: '',
    description: portalGuidance(organization, portal),
    url: portal.url,
  };
}

export interface PortalStrategyOptions {
  portals?: readonly PortalDefinition[];
}

/** At most one posting: a pointer to the external portal the page hands off to. */
export function createPortalStrategy(options: PortalStrategyOptions = {}): ExtractionStrategy {
  return {
    name: 'portal',
    extract(page) {
      const organization = page.organization ?? page.source;
      const portals = options.portals ?? loadPortalDefinitions();
      const found = detectPortal(page.dom(), page.url, organization, portals);
      return found ? [portalRedirectPosting(page, organization, found)] : [];
    },
  };
}
