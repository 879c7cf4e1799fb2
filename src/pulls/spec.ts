import { z } from 'zod';
import { ValidationError, formatZodIssues } from '../errors.js';
import { readStructuredFile } from '../config/loader.js';

export const PullRequestSpecSchema = z.object({
  repo: z
    .string()
    .regex(/^[^/\s]+\/[^/\s]+$/, "Repository must be in format 'owner/repo'"),
  number: z.number().int().positive(),
  description: z.string().optional(),
  focusAreas: z.array(z.string()).default([]),
});

export const PullRequestBatchSchema = z
  .array(PullRequestSpecSchema)
  .min(1, 'At least one pull request is required')
  .superRefine((specs, ctx) => {
    const seen = new Set<string>();
    specs.forEach((spec, index) => {
      const key = `${spec.repo}#${spec.number}`;
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate pull request: ${key}`,
          path: [index],
        });
      }
      seen.add(key);
    });
  });

export type PullRequestSpec = z.infer<typeof PullRequestSpecSchema>;
export type PullRequestSpecInput = z.input<typeof PullRequestSpecSchema>;

const SpecFileSchema = z.union([
  z.object({ prs: z.array(z.unknown()) }).transform((f) => f.prs),
  z.array(z.unknown()),
]);

export function validatePullRequestSpecs(input: unknown): PullRequestSpec[] {
  const result = PullRequestBatchSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError('Invalid pull request specification', formatZodIssues(result.error));
  }
  return result.data;
}

/** Parses `owner/repo#123`. */
export function parsePullRequestRef(ref: string): PullRequestSpecInput {
  const match = ref.trim().match(/^([^/\s#]+\/[^/\s#]+)#(\d+)$/);
  if (!match) {
    throw new ValidationError(`Invalid pull request reference '${ref}'`, "expected 'owner/repo#number'");
  }
  return { repo: match[1], number: Number(match[2]) };
}

/** Reads a JSON or YAML file holding either `prs: [...]` or a bare list of specs. */
export function loadPullRequestSpecs(filePath: string): PullRequestSpec[] {
  const result = SpecFileSchema.safeParse(readStructuredFile(filePath));
  if (!result.success) {
    throw new ValidationError(`Invalid pull request file ${filePath}`, "expected a 'prs' list");
  }
  return validatePullRequestSpecs(result.data);
}
