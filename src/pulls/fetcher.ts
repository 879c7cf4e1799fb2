import { PullRequestFetchError } from '../errors.js';
import { runCommand } from '../runner/process.js';
import { logger } from '../utils/logger.js';

export const DEFAULT_PR_TIMEOUT_SECONDS = 30;
export const DEFAULT_GH_COMMAND = 'gh';

export interface FetchOptions {
  timeoutSeconds?: number;
  ghCommand?: string;
}

/** Returns the unified diff of `repo#number` as printed by `gh pr diff`. */
export async function fetchPullRequestDiff(
  repo: string,
  number: number,
  options: FetchOptions = {},
): Promise<string> {
  const command = options.ghCommand ?? DEFAULT_GH_COMMAND;
  const timeoutSeconds = options.timeoutSeconds ?? DEFAULT_PR_TIMEOUT_SECONDS;
  const args = ['pr', 'diff', String(number), '-R', repo];

  logger.debug(`Running ${command} ${args.join(' ')}`);
  const result = await runCommand(command, args, timeoutSeconds);

  if (result.notFound) {
    throw new PullRequestFetchError(
      `'${command}' was not found on PATH`,
      'not-installed',
      'install the GitHub CLI from https://cli.github.com',
    );
  }
  if (result.timedOut) {
    throw new PullRequestFetchError(`Timed out after ${timeoutSeconds}s fetching ${repo}#${number}`, 'timeout');
  }
  if (result.exitCode !== 0) {
    const stderr = result.stderr.trim();
    throw new PullRequestFetchError(
      `${command} pr diff exited with code ${result.exitCode ?? 'unknown'}`,
      'exit-code',
      stderr ? stderr : undefined,
    );
  }

  return result.stdout;
}
