export { defineAdapter } from './factory.js';
export { JOB_TYPES, SALARY_TYPES } from './types.js';
export type { JobPosting, JobType, SalaryType, SearchRequest, AdapterManifest, SourceAdapter } from './types.js';
export { jobPostingSchema, validatePostings } from './schema.js';
export type { ValidatedJobPosting, ValidatePostingsOptions } from './schema.js';
export { cleanText, decodeHtmlEntities, stripHtml, truncate, resolveUrl, DEFAULT_DESCRIPTION_LENGTH } from './text.js';
export { generateSourceId, portalSourceId, PORTAL_MARKER, SOURCE_ID_LENGTH } from './identity.js';
export { isValidPosting, filterValidPostings, finalizePostings, isPortalRedirect } from './validity.js';
export {
  resolveSearchRequest,
  matchesJobTypes,
  DEFAULT_MAX_RESULTS,
  DEFAULT_RADIUS_MILES,
  DEFAULT_MAX_PAGES,
} from './request.js';
export type { ResolvedSearchRequest } from './request.js';
export { HttpFetcher, BROWSER_HEADERS, buildUrl } from './fetcher.js';
export type { Fetcher, FetchOutcome, FetchFailure, FetchFailureKind, HttpFetcherOptions, QueryParams } from './fetcher.js';
export { collectPages } from './pagination.js';
export type { CollectPagesOptions } from './pagination.js';
export { defaultLogger, serializeError } from './logger.js';
export type { ScrapeLogger, SerializedError } from './logger.js';
