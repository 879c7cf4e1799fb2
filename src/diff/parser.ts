import type { Change, ChangeType, DiffFileEntry } from './types.js';

const NULL_DEVICE = '/dev/null';

interface SectionHeaders {
  headerBefore?: string;
  headerAfter?: string;
  minusPath?: string;
  plusPath?: string;
  renameFrom?: string;
  renameTo?: string;
  newFile: boolean;
  deletedFile: boolean;
  binary: boolean;
}

const C_ESCAPES: Record<string, number> = {
  a: 0x07,
  b: 0x08,
  t: 0x09,
  n: 0x0a,
  v: 0x0b,
  f: 0x0c,
  r: 0x0d,
  '"': 0x22,
  '\\': 0x5c,
};

const QUOTED_PATH = String.raw`"(?:[^"\\]|\\.)*"`;
const QUOTED_HEADER = new RegExp(`^(${QUOTED_PATH}|\\S+) (${QUOTED_PATH}|\\S+)$`);

/**
 * Undoes git's C-style quoting (`"a/x\"y.py"`, `"caf\303\251"`). Octal
 * escapes are raw bytes, so the result is decoded as UTF-8.
 */
export function unquotePath(raw: string): string {
  if (raw.length < 2 || !raw.startsWith('"') || !raw.endsWith('"')) return raw;

  const chars = Array.from(raw.slice(1, -1));
  const bytes: number[] = [];
  for (let i = 0; i < chars.length; i++) {
    const ch = chars[i];
    if (ch !== '\\' || i + 1 >= chars.length) {
      bytes.push(...Buffer.from(ch, 'utf8'));
      continue;
    }
    const octal = chars.slice(i + 1, i + 4).join('');
    if (/^[0-7]{3}$/.test(octal)) {
      bytes.push(parseInt(octal, 8));
      i += 3;
      continue;
    }
    const next = chars[i + 1];
    const escaped = C_ESCAPES[next];
    if (escaped === undefined) {
      bytes.push(...Buffer.from(next, 'utf8'));
    } else {
      bytes.push(escaped);
    }
    i += 1;
  }
  return Buffer.from(bytes).toString('utf8');
}

// `diff --git a/x b/y`. Unquoted paths may contain spaces, so only the
// quoted form is split token by token.
function splitHeaderPaths(header: string): [string, string] | null {
  if (!header.includes('"')) {
    const match = header.match(/^a\/(.+) b\/(.+)$/);
    return match ? [match[1], match[2]] : null;
  }

  const match = header.match(QUOTED_HEADER);
  if (!match) return null;
  const before = unquotePath(match[1]);
  const after = unquotePath(match[2]);
  if (!before.startsWith('a/') || !after.startsWith('b/')) return null;
  return [before.slice(2), after.slice(2)];
}

// `--- a/path` and `+++ b/path`; git appends a tab when the path contains spaces.
function stripSidePath(raw: string, prefix: 'a/' | 'b/'): string {
  const value = unquotePath(raw.replace(/\t$/, ''));
  if (value === NULL_DEVICE) return value;
  return value.startsWith(prefix) ? value.slice(prefix.length) : value;
}

function classify(headers: SectionHeaders, before: string, after: string): ChangeType {
  if (headers.minusPath === NULL_DEVICE || headers.newFile) return 'added';
  if (headers.plusPath === NULL_DEVICE || headers.deletedFile) return 'deleted';
  if (before !== after) return 'renamed';
  return 'modified';
}

function parseSection(section: string): DiffFileEntry | null {
  const lines = section.split(/\r?\n/);
  const headers: SectionHeaders = { newFile: false, deletedFile: false, binary: false };

  const headerPaths = splitHeaderPaths(lines[0] ?? '');
  if (headerPaths) {
    [headers.headerBefore, headers.headerAfter] = headerPaths;
  }

  let linesAdded = 0;
  let linesRemoved = 0;
  let inHunk = false;

  for (const line of lines.slice(1)) {
    if (line.startsWith('@@')) {
      inHunk = true;
      continue;
    }
    if (inHunk) {
      if (line.startsWith('+')) linesAdded++;
      else if (line.startsWith('-')) linesRemoved++;
      continue;
    }

    if (line.startsWith('--- ')) headers.minusPath = stripSidePath(line.slice(4), 'a/');
    else if (line.startsWith('+++ ')) headers.plusPath = stripSidePath(line.slice(4), 'b/');
    else if (line.startsWith('rename from ')) headers.renameFrom = unquotePath(line.slice('rename from '.length));
    else if (line.startsWith('rename to ')) headers.renameTo = unquotePath(line.slice('rename to '.length));
    else if (line.startsWith('new file mode')) headers.newFile = true;
    else if (line.startsWith('deleted file mode')) headers.deletedFile = true;
    else if (line.startsWith('Binary files ') || line === 'GIT binary patch') headers.binary = true;
  }

  const sidePath = (p: string | undefined) => (p === NULL_DEVICE ? undefined : p);
  const before = headers.renameFrom ?? sidePath(headers.minusPath) ?? headers.headerBefore;
  const after = headers.renameTo ?? sidePath(headers.plusPath) ?? headers.headerAfter;
  if (!before || !after) return null;

  const changeType = classify(headers, before, after);
  const counts = { linesAdded, linesRemoved, binary: headers.binary };

  if (changeType === 'renamed') {
    return { filePath: after, changeType, oldPath: before, ...counts };
  }
  return { filePath: changeType === 'deleted' ? before : after, changeType, ...counts };
}

/**
 * Parses `git diff` / `gh pr diff` output into one entry per file, in diff order.
 *
 * Only lines inside hunks are counted, so the `---`/`+++` file headers never
 * contribute to the totals.
 */
export function parseUnifiedDiff(diffText: string): DiffFileEntry[] {
  const entries: DiffFileEntry[] = [];
  const fileSections = diffText.split(/^diff --git /m).filter(Boolean);

  for (const section of fileSections) {
    const entry = parseSection(section);
    if (entry) entries.push(entry);
  }

  return entries;
}

/** Drops the parser-only `binary` flag. */
export function toChange(entry: DiffFileEntry): Change {
  const counts = { filePath: entry.filePath, linesAdded: entry.linesAdded, linesRemoved: entry.linesRemoved };
  return entry.changeType === 'renamed'
    ? { ...counts, changeType: 'renamed', oldPath: entry.oldPath }
    : { ...counts, changeType: entry.changeType };
}
