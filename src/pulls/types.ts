import type { Change } from '../diff/types.js';
import type { PullRequestFailureReason } from '../errors.js';

export type PRChange = Change & {
  readonly prNumber: number;
  /** `owner/name` */
  readonly repo: string;
};

export type PullRequestOutcome =
  | { status: 'fetched' }
  | { status: 'failed'; reason: PullRequestFailureReason; message: string };

export interface PRDiff {
  repo: string;
  number: number;
  changes: PRChange[];
  totalChanges: number;
  summary: string;
  description?: string;
  focusAreas: string[];
  /** Full unified diff, kept for the cross-service scan. Empty for failed fetches. */
  rawDiff: string;
  outcome: PullRequestOutcome;
}

export type PatternCategory = 'api_specifications' | 'api_endpoints' | 'database_changes' | 'config_changes';

export type CrossServicePatterns = Partial<Record<PatternCategory, string[]>>;

/** service -> referenced service -> evidence */
export type ServiceInteractions = Record<string, Record<string, string[]>>;

export interface MultiPRAnalysis {
  prDiffs: PRDiff[];
  totalServices: number;
  totalChanges: number;
  failedPullRequests: number;
  crossServicePatterns: CrossServicePatterns;
  serviceInteractions: ServiceInteractions;
}
