import { createHash } from 'node:crypto';

export const SOURCE_ID_LENGTH = 16;
export const PORTAL_MARKER = 'portal';

/**
 * Stable short id from content parts: empty parts are dropped, the rest are
 * joined with `|` and hashed with SHA-256. The same parts always give the
 * same id, in any process.
 */
export function generateSourceId(...parts: Array<string | number | null | undefined>): string {
  const input = parts
    .filter((part): part is string | number => part !== null && part !== undefined && part !== '')
    .map(String)
    .join('|');

  return createHash('sha256').update(input).digest('hex').slice(0, SOURCE_ID_LENGTH);
}

/**
 * Id for a synthetic portal-redirect record. Carries the portal marker so
 * downstream filters can recognize it.
 */
export function portalSourceId(organization: string): string {
  return `${PORTAL_MARKER}:${generateSourceId(organization, PORTAL_MARKER)}`;
}
