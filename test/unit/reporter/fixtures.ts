import type { RepositoryAnalysis } from '../../../src/analysis/types.js';
import type { MultiPRAnalysis } from '../../../src/pulls/types.js';

export function stripAnsi(text: string): string {
  return text.replace(/\u001b\[[0-9;]*m/g, '');
}

export function makeRepositoryAnalysis(overrides: Partial<RepositoryAnalysis> = {}): RepositoryAnalysis {
  return {
    changedFiles: [{ filePath: 'src/app.ts', changeType: 'modified', linesAdded: 4, linesRemoved: 2 }],
    allTrackedFiles: ['src/app.ts', 'README.md'],
    defaultBranch: 'main',
    currentBranch: 'feature-x',
    repositoryRoot: '/work/repo',
    totalChanges: 1,
    hasChanges: true,
    ...overrides,
  };
}

export function makeMultiPRAnalysis(overrides: Partial<MultiPRAnalysis> = {}): MultiPRAnalysis {
  return {
    prDiffs: [
      {
        repo: 'acme/users',
        number: 1,
        changes: [
          { filePath: 'src/pager.ts', changeType: 'added', linesAdded: 10, linesRemoved: 0, prNumber: 1, repo: 'acme/users' },
          {
            filePath: 'src/new.ts',
            changeType: 'renamed',
            oldPath: 'src/old.ts',
            linesAdded: 0,
            linesRemoved: 0,
            prNumber: 1,
            repo: 'acme/users',
          },
        ],
        totalChanges: 2,
        summary: 'Add pagination',
        description: 'Add pagination',
        focusAreas: ['api', 'db'],
        rawDiff: 'diff --git a/src/pager.ts b/src/pager.ts\n+orders\n',
        outcome: { status: 'fetched' },
      },
      {
        repo: 'acme/orders',
        number: 2,
        changes: [],
        totalChanges: 0,
        summary: 'Failed to fetch PR acme/orders#2: boom',
        focusAreas: [],
        rawDiff: '',
        outcome: { status: 'failed', reason: 'exit-code', message: 'boom' },
      },
    ],
    totalServices: 2,
    totalChanges: 2,
    failedPullRequests: 1,
    crossServicePatterns: { api_endpoints: ['users: src/api/pager.ts'] },
    serviceInteractions: { users: { orders: ['Code references to orders'] } },
    ...overrides,
  };
}
