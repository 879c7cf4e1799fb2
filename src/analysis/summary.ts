import { CHANGE_TYPE_LABELS, type Change, type ChangeType } from '../diff/types.js';

const MAX_DETAILED_CHANGES = 10;

function describeChange(change: Change): string {
  const label = CHANGE_TYPE_LABELS[change.changeType];
  const from = change.changeType === 'renamed' ? ` (from ${change.oldPath})` : '';
  return `- ${label}: ${change.filePath}${from} (+${change.linesAdded}/-${change.linesRemoved})`;
}

/** Markdown digest of local changes. */
export function summarizeChanges(changes: readonly Change[]): string {
  if (changes.length === 0) {
    return 'No changes detected.';
  }

  const lines = ['## Git Changes Summary', '', `**Total Files Changed:** ${changes.length}`, '', '**Changes by Type:**'];

  const byType = new Map<ChangeType, number>();
  for (const change of changes) {
    byType.set(change.changeType, (byType.get(change.changeType) ?? 0) + 1);
  }
  for (const [changeType, count] of byType) {
    lines.push(`- ${CHANGE_TYPE_LABELS[changeType]}: ${count} files`);
  }

  lines.push('', '**Detailed Changes:**');
  for (const change of changes.slice(0, MAX_DETAILED_CHANGES)) {
    lines.push(describeChange(change));
  }
  if (changes.length > MAX_DETAILED_CHANGES) {
    lines.push(`... and ${changes.length - MAX_DETAILED_CHANGES} more files`);
  }

  return lines.join('\n');
}
