import { z } from 'zod';

export const TIKTOKEN_ENCODINGS = [
  'gpt2',
  'r50k_base',
  'p50k_base',
  'p50k_edit',
  'cl100k_base',
  'o200k_base',
] as const;

export const pricingModelSchema = z.object({
  name: z.string().min(1),
  pricePer1000: z.number().nonnegative(),
  encoding: z.enum(TIKTOKEN_ENCODINGS),
});

export const appConfigSchema = z.object({
  pricing: z.object({
    // Reports key token counts by model name
    models: z.array(pricingModelSchema).superRefine((models, ctx) => {
      const seen = new Set<string>();
      models.forEach((model, index) => {
        if (seen.has(model.name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [index, 'name'],
            message: `duplicate model name "${model.name}"`,
          });
        }
        seen.add(model.name);
      });
    }),
  }),
  report: z.object({
    format: z.enum(['text', 'markdown']),
    frequencyLimit: z.number().int().nonnegative(),
  }),
  extraction: z.object({
    chapterHeading: z.string().refine(isValidPattern, 'must be a valid regular expression'),
  }),
});

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

/**
 * Flattens zod issues into "path: message" strings
 * @param error - The validation error
 * @returns One line per issue
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}
