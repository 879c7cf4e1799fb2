import { PULL_REQUEST_EXCLUSIONS, createExclusionMatcher } from '../diff/exclusions.js';
import { parseUnifiedDiff, toChange } from '../diff/parser.js';
import { PullRequestFetchError, errorMessage } from '../errors.js';
import type { PullRequestSpec } from './spec.js';
import type { PRChange, PRDiff } from './types.js';

const isExcluded = createExclusionMatcher(PULL_REQUEST_EXCLUSIONS);

/** `acme/billing-service` -> `billing-service` */
export function serviceNameOf(repo: string): string {
  const segments = repo.split('/').filter(Boolean);
  return segments[segments.length - 1] ?? repo;
}

export function parsePullRequestDiff(spec: PullRequestSpec, rawDiff: string): PRDiff {
  const changes: PRChange[] = parseUnifiedDiff(rawDiff)
    .filter((entry) => !isExcluded(entry.filePath))
    .map((entry) => ({ ...toChange(entry), prNumber: spec.number, repo: spec.repo }));

  return {
    repo: spec.repo,
    number: spec.number,
    changes,
    totalChanges: changes.length,
    summary: spec.description ?? `Changes in ${serviceNameOf(spec.repo)}: ${changes.length} files modified`,
    description: spec.description,
    focusAreas: spec.focusAreas,
    rawDiff,
    outcome: { status: 'fetched' },
  };
}

/** Stand-in for a pull request whose diff could not be fetched or parsed. */
export function failedPullRequestDiff(spec: PullRequestSpec, err: unknown): PRDiff {
  const reason = err instanceof PullRequestFetchError ? err.reason : 'parse';
  const message = errorMessage(err);

  return {
    repo: spec.repo,
    number: spec.number,
    changes: [],
    totalChanges: 0,
    summary: `Failed to fetch PR ${spec.repo}#${spec.number}: ${message}`,
    description: spec.description,
    focusAreas: spec.focusAreas,
    rawDiff: '',
    outcome: { status: 'failed', reason, message },
  };
}
