import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../../src/pulls/fetcher.js', () => ({
  fetchPullRequestDiff: vi.fn(),
}));

import { analyzePullRequests } from '../../../src/analysis/pull-request-analysis.js';
import { PullRequestFetchError, ValidationError } from '../../../src/errors.js';
import { fetchPullRequestDiff } from '../../../src/pulls/fetcher.js';
import { logger } from '../../../src/utils/logger.js';

const mockedFetch = vi.mocked(fetchPullRequestDiff);

const ORDERS_DIFF = `diff --git a/src/users_client.py b/src/users_client.py
index 1111111..2222222 100644
--- a/src/users_client.py
+++ b/src/users_client.py
@@ -1 +1,2 @@
 BASE_URL = "http://users"
+TIMEOUT = 5
`;

const USERS_DIFF = `diff --git a/api/openapi.json b/api/openapi.json
index 3333333..4444444 100644
--- a/api/openapi.json
+++ b/api/openapi.json
@@ -1,2 +1,2 @@
-  "version": "1.0"
+  "version": "1.1"
 }
`;

describe('analyzePullRequests', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(logger, 'info').mockImplementation(() => {});
    vi.spyOn(logger, 'warn').mockImplementation(() => {});
  });

  it('keeps going when one pull request cannot be fetched', async () => {
    mockedFetch
      .mockRejectedValueOnce(new PullRequestFetchError('gh pr diff exited with code 1', 'exit-code'))
      .mockResolvedValueOnce(ORDERS_DIFF);

    const analysis = await analyzePullRequests([
      { repo: 'acme/users', number: 1 },
      { repo: 'acme/orders', number: 2 },
    ]);

    expect(analysis.prDiffs).toHaveLength(2);
    expect(analysis.prDiffs[0].totalChanges).toBe(0);
    expect(analysis.prDiffs[0].summary).toContain('Failed to fetch PR');
    expect(analysis.prDiffs[0].outcome).toEqual({
      status: 'failed',
      reason: 'exit-code',
      message: 'gh pr diff exited with code 1',
    });
    expect(analysis.totalServices).toBe(2);
    expect(analysis.totalChanges).toBe(1);
    expect(analysis.failedPullRequests).toBe(1);
    expect(logger.warn).toHaveBeenCalledWith('Skipping acme/users#1: gh pr diff exited with code 1');
  });

  it('fetches in input order with the given options', async () => {
    mockedFetch.mockResolvedValue('');

    const analysis = await analyzePullRequests(
      [
        { repo: 'acme/orders', number: 9 },
        { repo: 'acme/users', number: 3 },
      ],
      { timeoutSeconds: 10, ghCommand: 'gh' },
    );

    expect(mockedFetch.mock.calls).toEqual([
      ['acme/orders', 9, { timeoutSeconds: 10, ghCommand: 'gh' }],
      ['acme/users', 3, { timeoutSeconds: 10, ghCommand: 'gh' }],
    ]);
    expect(analysis.prDiffs.map((d) => `${d.repo}#${d.number}`)).toEqual(['acme/orders#9', 'acme/users#3']);
  });

  it('totals changes and runs the cross-service detectors', async () => {
    mockedFetch.mockResolvedValueOnce(USERS_DIFF).mockResolvedValueOnce(ORDERS_DIFF);

    const analysis = await analyzePullRequests([
      { repo: 'acme/users', number: 1, focusAreas: ['api'] },
      { repo: 'acme/orders', number: 2 },
    ]);

    expect(analysis.totalChanges).toBe(2);
    expect(analysis.failedPullRequests).toBe(0);
    expect(analysis.crossServicePatterns).toEqual({ api_specifications: ['users: api/openapi.json (+1/-1)'] });
    expect(analysis.serviceInteractions).toEqual({
      orders: { users: ['File reference: src/users_client.py', 'Code references to users'] },
    });
  });

  it('counts services by name, not by pull request', async () => {
    mockedFetch.mockResolvedValue('');

    const analysis = await analyzePullRequests([
      { repo: 'acme/users', number: 1 },
      { repo: 'acme/users', number: 2 },
    ]);

    expect(analysis.totalServices).toBe(1);
  });

  it('rejects an invalid batch before fetching anything', async () => {
    await expect(analyzePullRequests([{ repo: 'users', number: 1 }])).rejects.toThrow(ValidationError);
    expect(mockedFetch).not.toHaveBeenCalled();
  });
});
