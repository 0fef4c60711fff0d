import { PORTAL_MARKER } from './identity.js';
import type { JobPosting } from './types.js';

const MIN_TITLE_LENGTH = 3;
const MAX_ASTERISK_RATIO = 0.3;

const PLACEHOLDER_PATTERNS = [
  '****',
  '----',
  '....',
  'xxxx',
  'confidential',
  'hidden',
  'private',
  'position title',
  'job title',
  'title here',
] as const;

function asteriskRatio(text: string): number {
  const chars = [...text];
  if (chars.length === 0) return 0;
  return chars.filter((char) => char === '*').length / chars.length;
}

/**
 * Reject postings whose title (or company) was masked by the source, or
 * whose title is a placeholder rather than a real position name.
 */
export function isValidPosting(posting: Pick<JobPosting, 'title' | 'company'>): boolean {
  const { title, company } = posting;
  if (!title || title.length < MIN_TITLE_LENGTH) {
    return false;
  }

  if (asteriskRatio(title) > MAX_ASTERISK_RATIO) {
    return false;
  }

  const lowered = title.toLowerCase();
  if (PLACEHOLDER_PATTERNS.some((pattern) => lowered.includes(pattern))) {
    return false;
  }

  if (company && asteriskRatio(company) > MAX_ASTERISK_RATIO) {
    return false;
  }

  return true;
}

export function filterValidPostings<T extends Pick<JobPosting, 'title' | 'company'>>(postings: T[]): T[] {
  return postings.filter(isValidPosting);
}

export function isPortalRedirect(posting: Pick<JobPosting, 'sourceId'>): boolean {
  return posting.sourceId.includes(PORTAL_MARKER);
}

/** Last step of every adapter search: drop masked postings, then cap. */
export function finalizePostings<T extends Pick<JobPosting, 'title' | 'company'>>(postings: T[], maxResults: number): T[] {
  return filterValidPostings(postings).slice(0, maxResults);
}
