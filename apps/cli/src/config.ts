import { z } from 'zod';
import { parseSourceList, type SourceId } from '@jobsweep/aggregation';
import type { UniversityBoardConfig } from '@jobsweep/adapter-university';

const DEFAULT_UNIVERSITY_NAME = 'University';

const optionalText = z
  .string()
  .optional()
  .transform((raw) => raw?.trim() || undefined);

const optionalPositiveInt = z
  .string()
  .optional()
  .transform((raw, ctx) => {
    const value = raw?.trim();
    if (!value) {
      return undefined;
    }

    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a positive integer' });
      return z.NEVER;
    }

    return parsed;
  });

const booleanFlag = z
  .string()
  .optional()
  .transform((raw, ctx) => {
    const value = raw?.trim().toLowerCase();
    if (!value) {
      return false;
    }

    if (value === '1' || value === 'true' || value === 'yes' || value === 'on') {
      return true;
    }

    if (value === '0' || value === 'false' || value === 'no' || value === 'off') {
      return false;
    }

    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a boolean' });
    return z.NEVER;
  });

const sourceList = z
  .string()
  .optional()
  .transform((raw, ctx) => {
    try {
      return parseSourceList(raw);
    } catch (error) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: error instanceof Error ? error.message : String(error) });
      return z.NEVER;
    }
  });

const envSchema = z.object({
  JOBSWEEP_SOURCES: sourceList,
  JOBSWEEP_MAX_RESULTS: optionalPositiveInt,
  JOBSWEEP_MAX_RESULTS_PER_SOURCE: optionalPositiveInt,
  UNIVERSITY_NAME: optionalText,
  UNIVERSITY_JOB_BOARD_URL: optionalText.pipe(z.string().url().optional()),
  UNIVERSITY_USE_AUTH: booleanFlag,
  UNIVERSITY_AUTH_COOKIE: optionalText,
});

export interface CliConfig {
  sources: SourceId[];
  maxResults?: number;
  perSourceMaxResults?: number;
  university: UniversityBoardConfig;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const parsed = result.data;
  return {
    sources: parsed.JOBSWEEP_SOURCES,
    maxResults: parsed.JOBSWEEP_MAX_RESULTS,
    perSourceMaxResults: parsed.JOBSWEEP_MAX_RESULTS_PER_SOURCE,
    university: {
      name: parsed.UNIVERSITY_NAME ?? DEFAULT_UNIVERSITY_NAME,
      url: parsed.UNIVERSITY_JOB_BOARD_URL,
      useAuth: parsed.UNIVERSITY_USE_AUTH,
      authCookie: parsed.UNIVERSITY_AUTH_COOKIE,
    },
  };
}
