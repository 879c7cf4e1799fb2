import { fetchPullRequestDiff, type FetchOptions } from '../pulls/fetcher.js';
import { failedPullRequestDiff, parsePullRequestDiff, serviceNameOf } from '../pulls/parser.js';
import { detectCrossServicePatterns, detectServiceInteractions } from '../pulls/patterns.js';
import { validatePullRequestSpecs, type PullRequestSpecInput } from '../pulls/spec.js';
import type { MultiPRAnalysis, PRDiff } from '../pulls/types.js';
import { errorMessage } from '../errors.js';
import { logger } from '../utils/logger.js';

/**
 * Fetches and parses each pull request in order, one at a time. A pull
 * request that cannot be fetched becomes a failed placeholder; the batch
 * itself only throws for an invalid list of pull requests.
 */
export async function analyzePullRequests(
  specs: readonly PullRequestSpecInput[],
  options: FetchOptions = {},
): Promise<MultiPRAnalysis> {
  const validated = validatePullRequestSpecs(specs);
  const prDiffs: PRDiff[] = [];

  for (const spec of validated) {
    logger.info(`Fetching ${spec.repo}#${spec.number}...`);
    try {
      const rawDiff = await fetchPullRequestDiff(spec.repo, spec.number, options);
      const prDiff = parsePullRequestDiff(spec, rawDiff);
      logger.info(`  ${prDiff.totalChanges} file(s) changed`);
      prDiffs.push(prDiff);
    } catch (err) {
      logger.warn(`Skipping ${spec.repo}#${spec.number}: ${errorMessage(err)}`);
      prDiffs.push(failedPullRequestDiff(spec, err));
    }
  }

  return {
    prDiffs,
    totalServices: new Set(prDiffs.map((d) => serviceNameOf(d.repo))).size,
    totalChanges: prDiffs.reduce((sum, d) => sum + d.totalChanges, 0),
    failedPullRequests: prDiffs.filter((d) => d.outcome.status === 'failed').length,
    crossServicePatterns: detectCrossServicePatterns(prDiffs),
    serviceInteractions: detectServiceInteractions(prDiffs),
  };
}
