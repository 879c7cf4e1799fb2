import { execFileSync } from 'node:child_process';
import { GitError } from '../errors.js';

/**
 * CI-safe environment for git commands.
 *
 * GIT_DISCOVERY_ACROSS_FILESYSTEM: lets git traverse mount boundaries
 * (needed in Docker containers where the workspace is bind-mounted).
 *
 * GIT_CONFIG_*: sets safe.directory=* for the child process only,
 * avoiding "dubious ownership" errors in CI containers, and turns off
 * core.quotePath so non-ASCII paths come back verbatim.
 */
const GIT_ENV: NodeJS.ProcessEnv = {
  ...process.env,
  GIT_DISCOVERY_ACROSS_FILESYSTEM: '1',
  GIT_CONFIG_COUNT: '2',
  GIT_CONFIG_KEY_0: 'safe.directory',
  GIT_CONFIG_VALUE_0: '*',
  GIT_CONFIG_KEY_1: 'core.quotePath',
  GIT_CONFIG_VALUE_1: 'false',
};

function stderrOf(err: unknown): string {
  if (err && typeof err === 'object' && 'stderr' in err) {
    const stderr = String(err.stderr ?? '').trim();
    if (stderr) return stderr;
  }
  return err instanceof Error ? err.message : String(err);
}

/** Runs git in `cwd` and returns stdout. Failures surface as {@link GitError}. */
export function runGit(args: string[], cwd: string): string {
  try {
    return execFileSync('git', args, {
      cwd,
      encoding: 'utf-8',
      maxBuffer: 50 * 1024 * 1024,
      stdio: ['ignore', 'pipe', 'pipe'],
      env: GIT_ENV,
    });
  } catch (err) {
    throw new GitError(`git ${args[0]} failed`, stderrOf(err), { cause: err });
  }
}

/** Like {@link runGit}, but a failing command yields `null`. For probes only. */
export function tryGit(args: string[], cwd: string): string | null {
  try {
    return runGit(args, cwd);
  } catch {
    return null;
  }
}

export function gitRoot(cwd: string): string {
  return runGit(['rev-parse', '--show-toplevel'], cwd).trim();
}
