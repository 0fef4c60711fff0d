export const JOB_TYPES = [
  'Full-time',
  'Part-time',
  'Internship',
  'Contract',
  'Temporary',
  'Work-study',
  'On-campus',
] as const;

export type JobType = (typeof JOB_TYPES)[number];

export const SALARY_TYPES = ['hourly', 'weekly', 'monthly', 'yearly'] as const;

export type SalaryType = (typeof SALARY_TYPES)[number];

export interface JobPosting {
  source: string;
  sourceId: string;
  title: string;
  company: string;
  location: string;
  description: string;
  salaryText?: string;
  salaryMin?: number;
  salaryMax?: number;
  salaryType?: SalaryType;
  jobType?: JobType;
  url: string;
  /** Calendar date, `YYYY-MM-DD`. */
  postedDate?: string;
}

export interface SearchRequest {
  query: string;
  location: string;
  radiusMiles?: number;
  jobTypes?: JobType[];
  maxResults?: number;
  /** Checked between page requests; an aborted signal stops pagination. */
  signal?: AbortSignal;
}

export interface AdapterManifest {
  id: string;
  name: string;
  version: string;
  baseUrl: string;
  /** Minimum delay between two requests issued by one adapter instance. */
  delayMs: number;
  /** Expected postings per page; a shorter page ends pagination. 0 for single-page sources. */
  pageSize: number;
  maxPages: number;
}

export interface SourceAdapter {
  manifest: AdapterManifest;
  /** Resolves to an empty list when nothing could be fetched; never rejects for page-level failures. */
  search(request: SearchRequest): Promise<JobPosting[]>;
}
