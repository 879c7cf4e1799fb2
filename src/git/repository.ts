import fs from 'node:fs';
import path from 'node:path';
import { parseUnifiedDiff, toChange } from '../diff/parser.js';
import type { Change, DiffFileEntry } from '../diff/types.js';
import { GitError, errorMessage } from '../errors.js';
import { gitRoot, runGit, tryGit } from '../utils/git.js';
import { logger } from '../utils/logger.js';

export const PREFERRED_DEFAULT_BRANCHES = ['main', 'master', 'develop'] as const;
export const FALLBACK_DEFAULT_BRANCH = 'main';

const ORIGIN_REF_PREFIX = 'refs/remotes/origin/';

function toLocalChange(entry: DiffFileEntry): Change {
  const change = toChange(entry);
  // Binary sections carry no +/- lines; count them as touched.
  if (entry.binary && entry.linesAdded === 0 && entry.linesRemoved === 0) {
    return { ...change, linesAdded: 1 };
  }
  return change;
}

function locateRoot(startPath: string): string {
  try {
    return gitRoot(path.resolve(startPath));
  } catch (err) {
    throw new GitError(`Not a git repository: ${startPath}`, undefined, { cause: err });
  }
}

/**
 * Read-only view of a local git repository.
 *
 * The default branch is resolved once per instance; everything else is
 * recomputed on each call.
 */
export class GitRepository {
  readonly root: string;
  private defaultBranch: string | null = null;

  constructor(startPath: string) {
    this.root = locateRoot(startPath);
  }

  private checkedOutBranch(): string | null {
    const name = tryGit(['symbolic-ref', '--quiet', '--short', 'HEAD'], this.root)?.trim();
    return name ? name : null;
  }

  private preferredLocalBranch(): string | null {
    const output = tryGit(['for-each-ref', '--format=%(refname:short)', 'refs/heads/'], this.root) ?? '';
    const local = new Set(output.split('\n').map((l) => l.trim()));
    return PREFERRED_DEFAULT_BRANCHES.find((b) => local.has(b)) ?? null;
  }

  private originHeadBranch(): string | null {
    const ref = tryGit(['symbolic-ref', '--quiet', `${ORIGIN_REF_PREFIX}HEAD`], this.root)?.trim();
    if (!ref?.startsWith(ORIGIN_REF_PREFIX)) return null;
    const name = ref.slice(ORIGIN_REF_PREFIX.length);
    return name ? name : null;
  }

  /**
   * Resolution order: origin/HEAD, then the first of main/master/develop that
   * exists locally, then the checked-out branch, then `main`.
   */
  getDefaultBranch(): string {
    if (this.defaultBranch !== null) return this.defaultBranch;

    const resolved =
      this.originHeadBranch() ??
      this.preferredLocalBranch() ??
      this.checkedOutBranch() ??
      FALLBACK_DEFAULT_BRANCH;

    logger.debug(`Default branch resolved to ${resolved}`);
    this.defaultBranch = resolved;
    return resolved;
  }

  /** Name of the checked-out branch, or `HEAD` when detached. */
  getCurrentBranch(): string {
    return this.checkedOutBranch() ?? 'HEAD';
  }

  /** Commit id for `origin/<base>`, `<base>` or `HEAD~1`, whichever resolves first. */
  resolveBaseRevision(baseBranch: string): string | null {
    for (const candidate of [`origin/${baseBranch}`, baseBranch, 'HEAD~1']) {
      const sha = tryGit(['rev-parse', '--verify', '--quiet', `${candidate}^{commit}`], this.root)?.trim();
      if (sha) {
        logger.debug(`Diff base ${candidate} (${sha.slice(0, 8)})`);
        return sha;
      }
    }
    return null;
  }

  getChangedFiles(baseBranch?: string, pathFilter?: string): Change[] {
    const base = baseBranch ?? this.getDefaultBranch();
    const baseSha = this.resolveBaseRevision(base);
    if (!baseSha) {
      logger.debug(`No revision to diff against for ${base}; treating as no changes`);
      return [];
    }

    let diffText: string;
    try {
      diffText = runGit(['diff', '--no-color', '--no-ext-diff', '-M', baseSha, 'HEAD', '--'], this.root);
    } catch (err) {
      throw new GitError('Failed to get changed files', errorMessage(err), { cause: err });
    }

    return parseUnifiedDiff(diffText)
      .filter((entry) => !pathFilter || entry.filePath.startsWith(pathFilter))
      .map(toLocalChange);
  }

  /** Tracked paths that still exist in the working tree, deduplicated, in index order. */
  getTrackedFiles(pathFilter?: string): string[] {
    let output: string;
    try {
      output = runGit(['ls-files', '-z'], this.root);
    } catch (err) {
      throw new GitError('Failed to get tracked files', errorMessage(err), { cause: err });
    }

    const tracked = new Set<string>();
    for (const filePath of output.split('\0')) {
      if (!filePath || tracked.has(filePath)) continue;
      if (pathFilter && !filePath.startsWith(pathFilter)) continue;
      if (!fs.existsSync(path.join(this.root, filePath))) continue;
      tracked.add(filePath);
    }
    return [...tracked];
  }
}
