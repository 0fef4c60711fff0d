const UNIT_DAYS: Record<string, number> = {
  minute: 0,
  hour: 0,
  day: 1,
  week: 7,
  month: 30,
  m: 30,
  h: 0,
  d: 1,
  w: 7,
};

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Calendar date in local time, YYYY-MM-DD. */
export function formatLocalDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

function formatUtcDate(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

function daysBefore(now: Date, days: number): string {
  const shifted = new Date(now.getFullYear(), now.getMonth(), now.getDate() - days);
  return formatLocalDate(shifted);
}

export interface RelativeDateOptions {
  now?: Date;
  /** Also accept short ages like "3d", "24h", "2w", "1m". */
  compact?: boolean;
}

export function parseRelativeDate(text: string | undefined, options: RelativeDateOptions = {}): string | undefined {
  if (!text) return undefined;

  const now = options.now ?? new Date();
  const lower = text.toLowerCase().trim();

  if (lower.includes('yesterday')) return daysBefore(now, 1);
  if (lower.includes('today') || lower.includes('just') || lower.includes('now')) return daysBefore(now, 0);

  const phrase = lower.match(/(\d+)\+?\s*(day|week|month|hour|minute)s?\s*ago/);
  if (phrase) {
    return daysBefore(now, Number(phrase[1]) * (UNIT_DAYS[phrase[2] ?? ''] ?? 0));
  }

  if (options.compact) {
    const age = lower.match(/(\d+)\+?\s*(d|h|w|m)/);
    if (age) {
      return daysBefore(now, Number(age[1]) * (UNIT_DAYS[age[2] ?? ''] ?? 0));
    }
  }

  return undefined;
}

/** "2026-03-01T09:00:00Z" -> "2026-03-01". Anything not starting with a valid date is dropped. */
export function parseIsoDate(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;

  const match = value.trim().match(/^(\d{4})-(\d{2})-(\d{2})/);
  if (!match) return undefined;

  const [, year, month, day] = match.map(Number);
  if (year === undefined || month === undefined || day === undefined) return undefined;

  const check = new Date(Date.UTC(year, month - 1, day));
  if (check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) return undefined;

  return formatUtcDate(check);
}

/**
 * Feed timestamps: ISO 8601 or RFC 822. The calendar date is taken in the
 * offset the timestamp states.
 */
export function parseFeedDate(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;

  const raw = value.trim();
  const iso = parseIsoDate(raw);
  if (iso) return iso;

  const ms = Date.parse(raw);
  if (Number.isNaN(ms)) return undefined;

  const offset = raw.match(/([+-])(\d{2}):?(\d{2})$/);
  if (offset) {
    const sign = offset[1] === '-' ? -1 : 1;
    const minutes = sign * (Number(offset[2]) * 60 + Number(offset[3]));
    return formatUtcDate(new Date(ms + minutes * 60_000));
  }

  if (/\b(gmt|utc|z)$/i.test(raw)) {
    return formatUtcDate(new Date(ms));
  }

  return formatLocalDate(new Date(ms));
}
