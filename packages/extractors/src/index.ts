export { createPage, defaultCompany } from './page.js';
export type { Page, PageInput, ExtractionStrategy } from './page.js';
export { runStrategies, mergeStrategies } from './runner.js';
export type { RunStrategiesOptions, StrategyMode } from './runner.js';
export { createEmbeddedJsonStrategy, embeddedJsonStrategy, findJobRecords, EMBEDDED_SCRIPT_IDS } from './embedded-json.js';
export type { EmbeddedJsonOptions } from './embedded-json.js';
export { createJsonLdStrategy, jsonLdStrategy, collectJobPostingNodes } from './json-ld.js';
export type { JsonLdOptions } from './json-ld.js';
export { createHtmlPatternStrategy, htmlPatternStrategy, DEFAULT_CONTAINERS } from './html-pattern.js';
export type { ContainerSelector, HtmlPatternOptions } from './html-pattern.js';
export { tableStrategy } from './table.js';
export { feedStrategy, isFeedUrl } from './feed.js';
export {
  createPortalStrategy,
  detectPortal,
  loadPortalDefinitions,
  parsePortalDefinitions,
  portalRedirectPosting,
  organizationSlug,
} from './portal.js';
export type { PortalDefinition, PortalDefinitionInput, PortalMatch, PortalStrategyOptions } from './portal.js';
export { parseSalary } from './salary.js';
export type { ParsedSalary, ParseSalaryOptions } from './salary.js';
export { parseRelativeDate, parseIsoDate, parseFeedDate, formatLocalDate } from './dates.js';
export type { RelativeDateOptions } from './dates.js';
export { jobTypeFromText, jobTypeFromEmploymentType } from './job-type.js';
export { isRecord, asString, asNumber } from './json.js';
export type { JsonRecord } from './json.js';
export { fetchPage } from './fetch-page.js';
export type { FetchPageOptions } from './fetch-page.js';
export { findByClass, firstPresent, textOf } from './dom.js';
