import type { JobType } from '@jobsweep/scraper-sdk';

/** Free-text label such as "Part Time" or "Summer Internship". */
export function jobTypeFromText(text: string | undefined): JobType | undefined {
  if (!text) return undefined;

  const lower = text.toLowerCase();
  if (lower.includes('full-time') || lower.includes('full time')) return 'Full-time';
  if (lower.includes('part-time') || lower.includes('part time')) return 'Part-time';
  if (lower.includes('intern')) return 'Internship';
  if (lower.includes('work-study') || lower.includes('work study')) return 'Work-study';
  if (lower.includes('on-campus') || lower.includes('on campus')) return 'On-campus';
  if (lower.includes('contract')) return 'Contract';
  if (lower.includes('temporary')) return 'Temporary';

  return undefined;
}

/** Structured employmentType value: a string or a list whose first entry counts. */
export function jobTypeFromEmploymentType(value: unknown): JobType | undefined {
  const raw = Array.isArray(value) ? value[0] : value;
  if (typeof raw !== 'string') return undefined;

  const upper = raw.toUpperCase();
  if (upper.includes('FULL')) return 'Full-time';
  if (upper.includes('PART')) return 'Part-time';
  if (upper.includes('INTERN')) return 'Internship';
  if (upper.includes('WORK-STUDY') || upper.includes('WORK_STUDY')) return 'Work-study';
  if (upper.includes('ON-CAMPUS') || upper.includes('ON_CAMPUS')) return 'On-campus';
  if (upper.includes('CONTRACT')) return 'Contract';
  if (upper.includes('TEMPORARY')) return 'Temporary';

  return undefined;
}
