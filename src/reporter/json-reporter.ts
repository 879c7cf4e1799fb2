import type { RepositoryAnalysis } from '../analysis/types.js';
import { serviceNameOf } from '../pulls/parser.js';
import type { MultiPRAnalysis } from '../pulls/types.js';
import type { Reporter } from './reporter.js';

export class JsonReporter implements Reporter {
  reportRepository(analysis: RepositoryAnalysis): string {
    return JSON.stringify(analysis, null, 2);
  }

  // Raw diffs stay out of the report; they can run to megabytes.
  reportPullRequests(analysis: MultiPRAnalysis): string {
    const prDiffs = analysis.prDiffs.map(({ rawDiff: _rawDiff, ...diff }) => ({
      ...diff,
      serviceName: serviceNameOf(diff.repo),
    }));
    return JSON.stringify({ ...analysis, prDiffs }, null, 2);
  }
}
