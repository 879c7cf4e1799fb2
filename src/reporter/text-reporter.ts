import pc from 'picocolors';
import { summarizeChanges } from '../analysis/summary.js';
import type { RepositoryAnalysis } from '../analysis/types.js';
import type { ChangeType } from '../diff/types.js';
import { serviceNameOf } from '../pulls/parser.js';
import type { MultiPRAnalysis, PRDiff } from '../pulls/types.js';
import type { Reporter } from './reporter.js';

function changeLabel(changeType: ChangeType): string {
  switch (changeType) {
    case 'added':
      return pc.green('[ADDED]    ');
    case 'modified':
      return pc.yellow('[MODIFIED] ');
    case 'deleted':
      return pc.red('[DELETED]  ');
    case 'renamed':
      return pc.cyan('[RENAMED]  ');
  }
}

function renderPullRequest(diff: PRDiff): string[] {
  const lines = [pc.bold(pc.underline(`${diff.repo}#${diff.number}`)) + pc.dim(` (${serviceNameOf(diff.repo)})`)];

  if (diff.outcome.status === 'failed') {
    lines.push(pc.red(`  ✖ ${diff.summary}`));
    return lines;
  }

  lines.push(`  ${diff.summary}`);
  if (diff.focusAreas.length > 0) {
    lines.push(pc.dim(`  Focus: ${diff.focusAreas.join(', ')}`));
  }
  for (const change of diff.changes) {
    const from = change.changeType === 'renamed' ? pc.dim(` (from ${change.oldPath})`) : '';
    lines.push(
      `  ${changeLabel(change.changeType)}${change.filePath}${from} ${pc.dim(`(+${change.linesAdded}/-${change.linesRemoved})`)}`,
    );
  }
  return lines;
}

export class TextReporter implements Reporter {
  reportRepository(analysis: RepositoryAnalysis): string {
    const lines: string[] = [];

    lines.push('');
    lines.push(pc.bold('Repository Analysis'));
    lines.push('═'.repeat(50));
    lines.push(`Repository: ${analysis.repositoryRoot}`);
    lines.push(`Branch: ${analysis.currentBranch} ${pc.dim(`(base: ${analysis.defaultBranch})`)}`);
    lines.push(`Tracked files: ${analysis.allTrackedFiles.length}`);
    lines.push(`Changed files: ${analysis.totalChanges}`);
    lines.push('');
    lines.push(summarizeChanges(analysis.changedFiles));
    lines.push('');

    return lines.join('\n');
  }

  reportPullRequests(analysis: MultiPRAnalysis): string {
    const lines: string[] = [];

    lines.push('');
    lines.push(pc.bold('Pull Request Analysis'));
    lines.push('═'.repeat(50));
    lines.push(
      `Services: ${analysis.totalServices}  Pull requests: ${analysis.prDiffs.length}  Files changed: ${analysis.totalChanges}`,
    );
    if (analysis.failedPullRequests > 0) {
      lines.push(pc.red(`Failed to fetch: ${analysis.failedPullRequests}`));
    }
    lines.push('');

    for (const diff of analysis.prDiffs) {
      lines.push(...renderPullRequest(diff));
      lines.push('');
    }

    const categories = Object.entries(analysis.crossServicePatterns);
    if (categories.length > 0) {
      lines.push(pc.bold('Cross-service patterns'));
      for (const [category, entries = []] of categories) {
        lines.push(`  ${category}:`);
        for (const entry of entries) {
          lines.push(`    - ${entry}`);
        }
      }
      lines.push('');
    }

    const sources = Object.entries(analysis.serviceInteractions);
    if (sources.length > 0) {
      lines.push(pc.bold('Service interactions'));
      for (const [source, targets] of sources) {
        for (const [target, evidence] of Object.entries(targets)) {
          lines.push(`  ${source} → ${target}`);
          for (const item of evidence) {
            lines.push(pc.dim(`    - ${item}`));
          }
        }
      }
      lines.push('');
    }

    return lines.join('\n');
  }
}
