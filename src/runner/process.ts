import { spawn } from 'node:child_process';

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  timedOut: boolean;
  /** The executable could not be found on PATH. */
  notFound: boolean;
}

const MAX_STDERR_LENGTH = 5000;

function truncateOutput(output: string): string {
  if (output.length <= MAX_STDERR_LENGTH) return output;
  return '...(truncated)\n' + output.slice(-MAX_STDERR_LENGTH);
}

/**
 * Runs `command` with `args` (no shell) and resolves once it exits.
 * Never rejects: spawn failures and timeouts are reported on the result.
 */
export function runCommand(
  command: string,
  args: readonly string[],
  timeoutSeconds: number,
): Promise<CommandResult> {
  return new Promise((resolve) => {
    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let settled = false;

    const child = spawn(command, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    // Decode as a stream so multi-byte characters split across chunks survive.
    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');

    child.stdout.on('data', (data: string) => {
      stdout += data;
    });

    child.stderr.on('data', (data: string) => {
      stderr += data;
    });

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
      // Force kill after 5s grace period
      setTimeout(() => {
        if (!settled) {
          child.kill('SIGKILL');
        }
      }, 5000).unref();
    }, timeoutSeconds * 1000);

    child.on('close', (code) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve({
        stdout,
        stderr: truncateOutput(stderr),
        exitCode: code,
        timedOut,
        notFound: false,
      });
    });

    child.on('error', (err: NodeJS.ErrnoException) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve({
        stdout,
        stderr: err.message,
        exitCode: null,
        timedOut: false,
        notFound: err.code === 'ENOENT',
      });
    });
  });
}
