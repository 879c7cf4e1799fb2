import type { ZodError } from 'zod';

export class ArchscribeError extends Error {
  constructor(
    message: string,
    public readonly details?: string,
    options?: ErrorOptions,
  ) {
    super(details ? `${message}: ${details}` : message, options);
    this.name = 'ArchscribeError';
  }
}

export class ConfigError extends ArchscribeError {
  constructor(message: string, details?: string, options?: ErrorOptions) {
    super(message, details, options);
    this.name = 'ConfigError';
  }
}

/** Repository lookup or a git command failed. Fatal to a single-repository analysis. */
export class GitError extends ArchscribeError {
  constructor(message: string, details?: string, options?: ErrorOptions) {
    super(message, details, options);
    this.name = 'GitError';
  }
}

export class ValidationError extends ArchscribeError {
  constructor(message: string, details?: string, options?: ErrorOptions) {
    super(message, details, options);
    this.name = 'ValidationError';
  }
}

export type PullRequestFailureReason = 'not-installed' | 'exit-code' | 'timeout' | 'parse';

export class PullRequestFetchError extends ArchscribeError {
  constructor(
    message: string,
    public readonly reason: PullRequestFailureReason,
    details?: string,
    options?: ErrorOptions,
  ) {
    super(message, details, options);
    this.name = 'PullRequestFetchError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
