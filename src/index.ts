export { analyzeRepository, pathFilterFor } from './analysis/repository-analysis.js';
export type { RepositoryAnalysisOptions } from './analysis/repository-analysis.js';
export { analyzePullRequests } from './analysis/pull-request-analysis.js';
export { summarizeChanges } from './analysis/summary.js';
export type { RepositoryAnalysis } from './analysis/types.js';
export { loadConfig } from './config/loader.js';
export { ArchscribeConfigSchema } from './config/schema.js';
export type { ArchscribeConfig, OutputFormat } from './config/schema.js';
export {
  createExclusionMatcher,
  PULL_REQUEST_EXCLUSIONS,
  TRACKED_FILE_EXCLUSIONS,
} from './diff/exclusions.js';
export type { ExclusionKind, ExclusionMatcher, ExclusionRule } from './diff/exclusions.js';
export { parseUnifiedDiff } from './diff/parser.js';
export type { Change, ChangeType, DiffFileEntry } from './diff/types.js';
export {
  ArchscribeError,
  ConfigError,
  GitError,
  PullRequestFetchError,
  ValidationError,
} from './errors.js';
export type { PullRequestFailureReason } from './errors.js';
export { GitRepository } from './git/repository.js';
export { fetchPullRequestDiff } from './pulls/fetcher.js';
export type { FetchOptions } from './pulls/fetcher.js';
export { parsePullRequestDiff, serviceNameOf } from './pulls/parser.js';
export {
  CATEGORY_RULES,
  INTERACTION_RULES,
  detectCrossServicePatterns,
  detectServiceInteractions,
} from './pulls/patterns.js';
export type { CategoryRule, InteractionRule } from './pulls/patterns.js';
export { validatePullRequestSpecs } from './pulls/spec.js';
export type { PullRequestSpec, PullRequestSpecInput } from './pulls/spec.js';
export type {
  CrossServicePatterns,
  MultiPRAnalysis,
  PatternCategory,
  PRChange,
  PRDiff,
  PullRequestOutcome,
  ServiceInteractions,
} from './pulls/types.js';
export type { Reporter } from './reporter/reporter.js';
export { createReporter } from './reporter/reporter.js';
