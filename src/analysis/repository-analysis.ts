import fs from 'node:fs';
import path from 'node:path';
import { TRACKED_FILE_EXCLUSIONS, createExclusionMatcher, type ExclusionRule } from '../diff/exclusions.js';
import { ConfigError } from '../errors.js';
import type { GitRepository } from '../git/repository.js';
import { logger } from '../utils/logger.js';
import type { RepositoryAnalysis } from './types.js';

export interface RepositoryAnalysisOptions {
  /** Path prefix relative to the repository root, e.g. `services/api/`. */
  pathFilter?: string;
  baseBranch?: string;
  exclusions?: readonly ExclusionRule[];
}

export function analyzeRepository(
  repo: GitRepository,
  options: RepositoryAnalysisOptions = {},
): RepositoryAnalysis {
  const isExcluded = createExclusionMatcher(options.exclusions ?? TRACKED_FILE_EXCLUSIONS);

  const defaultBranch = options.baseBranch ?? repo.getDefaultBranch();
  const currentBranch = repo.getCurrentBranch();
  logger.debug(`Analyzing ${repo.root} (${currentBranch} against ${defaultBranch})`);

  const changedFiles = repo
    .getChangedFiles(defaultBranch, options.pathFilter)
    .filter((change) => !isExcluded(change.filePath));
  const allTrackedFiles = repo.getTrackedFiles(options.pathFilter).filter((p) => !isExcluded(p));

  return {
    changedFiles,
    allTrackedFiles,
    defaultBranch,
    currentBranch,
    repositoryRoot: repo.root,
    totalChanges: changedFiles.length,
    hasChanges: changedFiles.length > 0,
  };
}

/**
 * Turns a folder (relative to `projectPath`) into a repository-relative
 * prefix such as `services/api/`. Returns `undefined` for the repository root.
 */
export function pathFilterFor(repositoryRoot: string, projectPath: string, folder?: string): string | undefined {
  const target = path.resolve(projectPath, folder ?? '.');
  if (!fs.existsSync(target)) {
    throw new ConfigError(`Folder does not exist: ${folder ?? projectPath}`);
  }

  // git reports the root with symlinks resolved; compare like with like.
  const relative = path.relative(fs.realpathSync(repositoryRoot), fs.realpathSync(target));
  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new ConfigError(`Folder is outside the repository: ${target}`);
  }
  return relative ? relative.split(path.sep).join('/') + '/' : undefined;
}
