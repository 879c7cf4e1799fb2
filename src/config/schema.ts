import { z } from 'zod';
import { DEFAULTS } from './defaults.js';

export const ArchscribeConfigSchema = z.object({
  /** Branch to diff against; resolved from the repository when absent. */
  baseBranch: z.string().min(1).optional(),
  /** Subfolder of the project to restrict the analysis to. */
  folder: z.string().min(1).optional(),
  output: z.enum(['text', 'json']).default(DEFAULTS.output),
  /** Extra glob exclusions for local changes and tracked files. */
  exclude: z.array(z.string()).optional(),
  /** Seconds allowed for each `gh pr diff`. */
  prTimeout: z.number().int().positive().default(DEFAULTS.prTimeout),
  ghCommand: z.string().min(1).default(DEFAULTS.ghCommand),
  verbose: z.boolean().default(DEFAULTS.verbose),
});

export type ArchscribeConfig = z.infer<typeof ArchscribeConfigSchema>;
export type OutputFormat = ArchscribeConfig['output'];
