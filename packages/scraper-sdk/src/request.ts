import type { JobType, SearchRequest } from './types.js';

export const DEFAULT_MAX_RESULTS = 50;
export const DEFAULT_RADIUS_MILES = 10;
export const DEFAULT_MAX_PAGES = 10;

export interface ResolvedSearchRequest {
  query: string;
  location: string;
  radiusMiles: number;
  jobTypes: JobType[];
  maxResults: number;
  signal?: AbortSignal;
}

export function resolveSearchRequest(request: SearchRequest): ResolvedSearchRequest {
  return {
    query: request.query.trim(),
    location: request.location.trim(),
    radiusMiles: request.radiusMiles ?? DEFAULT_RADIUS_MILES,
    jobTypes: request.jobTypes ?? [],
    maxResults: Math.max(0, request.maxResults ?? DEFAULT_MAX_RESULTS),
    signal: request.signal,
  };
}

/** Postings without a type are kept; the source did not say. */
export function matchesJobTypes(posting: { jobType?: JobType }, jobTypes: readonly JobType[]): boolean {
  return jobTypes.length === 0 || posting.jobType === undefined || jobTypes.includes(posting.jobType);
}
