import type { RepositoryAnalysis } from '../analysis/types.js';
import type { OutputFormat } from '../config/schema.js';
import type { MultiPRAnalysis } from '../pulls/types.js';
import { TextReporter } from './text-reporter.js';
import { JsonReporter } from './json-reporter.js';

export interface Reporter {
  reportRepository(analysis: RepositoryAnalysis): string;
  reportPullRequests(analysis: MultiPRAnalysis): string;
}

export function createReporter(format: OutputFormat): Reporter {
  switch (format) {
    case 'text':
      return new TextReporter();
    case 'json':
      return new JsonReporter();
  }
}
