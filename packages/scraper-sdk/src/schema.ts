import { z } from 'zod';
import { JOB_TYPES, SALARY_TYPES } from './types.js';

export const jobPostingSchema = z.object({
  source: z.string().min(1),
  sourceId: z.string().min(1),
  title: z.string().min(1),
  company: z.string().min(1),
  location: z.string(),
  description: z.string(),
  salaryText: z.string().optional(),
  salaryMin: z.number().nonnegative().optional(),
  salaryMax: z.number().nonnegative().optional(),
  salaryType: z.enum(SALARY_TYPES).optional(),
  jobType: z.enum(JOB_TYPES).optional(),
  url: z.string().url(),
  postedDate: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/)
    .optional(),
});

export type ValidatedJobPosting = z.infer<typeof jobPostingSchema>;

export interface ValidatePostingsOptions {
  onInvalid?: (issues: z.ZodIssue[], posting: unknown) => void;
}

export function validatePostings(postings: unknown[], options?: ValidatePostingsOptions): ValidatedJobPosting[] {
  const valid: ValidatedJobPosting[] = [];

  for (const posting of postings) {
    const result = jobPostingSchema.safeParse(posting);
    if (result.success) {
      valid.push(result.data);
    } else {
      options?.onInvalid?.(result.error.issues, posting);
    }
  }

  return valid;
}
