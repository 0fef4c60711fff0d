import type { SalaryType } from '@jobsweep/scraper-sdk';

export interface ParsedSalary {
  min: number;
  max: number;
  type: SalaryType;
}

export interface ParseSalaryOptions {
  /** Accept an "m" suffix as millions. */
  allowMillions?: boolean;
}

const MULTIPLIERS: Record<string, number> = { k: 1_000, m: 1_000_000 };

function salaryTypeOf(text: string): SalaryType {
  if (text.includes('hour') || text.includes('/hr')) return 'hourly';
  if (text.includes('week')) return 'weekly';
  if (text.includes('month')) return 'monthly';
  return 'yearly';
}

/**
 * "$15.00 - $20.00 per hour" -> 15..20 hourly, "$45K" -> 45000..45000 yearly.
 * Returns null when the text carries no positive amount.
 */
export function parseSalary(text: string | undefined, options: ParseSalaryOptions = {}): ParsedSalary | null {
  if (!text) return null;

  const normalized = text.toLowerCase().replace(/[$£€,]/g, '');
  const pattern = options.allowMillions ? /(\d+(?:\.\d+)?)(?:([km])(?![a-z]))?/g : /(\d+(?:\.\d+)?)(?:(k)(?![a-z]))?/g;

  const amounts: number[] = [];
  for (const match of normalized.matchAll(pattern)) {
    const value = Number(match[1]);
    if (!Number.isFinite(value) || value <= 0) continue;

    const suffix = match[2];
    amounts.push(suffix ? value * (MULTIPLIERS[suffix] ?? 1) : value);
  }

  if (amounts.length === 0) return null;

  return {
    min: Math.min(...amounts),
    max: Math.max(...amounts),
    type: salaryTypeOf(normalized),
  };
}
