import path from 'node:path';
import { minimatch } from 'minimatch';

export type ExclusionKind = 'substring' | 'regex' | 'glob';

export interface ExclusionRule {
  kind: ExclusionKind;
  pattern: string;
  ignoreCase?: boolean;
}

export type ExclusionMatcher = (filePath: string) => boolean;

function compileRule(rule: ExclusionRule): ExclusionMatcher {
  switch (rule.kind) {
    case 'substring': {
      if (rule.ignoreCase) {
        const needle = rule.pattern.toLowerCase();
        return (p) => p.toLowerCase().includes(needle);
      }
      return (p) => p.includes(rule.pattern);
    }
    case 'regex': {
      const re = new RegExp(rule.pattern, rule.ignoreCase ? 'i' : '');
      return (p) => re.test(p);
    }
    case 'glob': {
      // Slash-free globs such as `*.min.js` match against the basename.
      const matchBase = !rule.pattern.includes('/');
      const options = { dot: true, nocase: rule.ignoreCase ?? false };
      return (p) =>
        matchBase ? minimatch(path.posix.basename(p), rule.pattern, options) : minimatch(p, rule.pattern, options);
    }
  }
}

/** Compiles an ordered rule list into a single predicate; a path is excluded when any rule matches. */
export function createExclusionMatcher(rules: readonly ExclusionRule[]): ExclusionMatcher {
  const matchers = rules.map(compileRule);
  return (filePath) => matchers.some((m) => m(filePath));
}

const substring = (pattern: string): ExclusionRule => ({ kind: 'substring', pattern });
const glob = (pattern: string): ExclusionRule => ({ kind: 'glob', pattern });
const regex = (pattern: string): ExclusionRule => ({ kind: 'regex', pattern, ignoreCase: true });

/** Applied to local changes and tracked files. Case-sensitive. */
export const TRACKED_FILE_EXCLUSIONS: readonly ExclusionRule[] = [
  // Lock files
  substring('package-lock.json'),
  substring('yarn.lock'),
  substring('pnpm-lock.yaml'),
  substring('Pipfile.lock'),
  substring('poetry.lock'),
  substring('Cargo.lock'),
  substring('composer.lock'),
  substring('Gemfile.lock'),
  substring('go.sum'),
  // Build artifacts & minified files
  glob('*.min.js'),
  glob('*.min.css'),
  glob('*.bundle.js'),
  glob('*.bundle.css'),
  glob('*.pyc'),
  glob('*.class'),
  glob('*.o'),
  glob('*.so'),
  glob('*.dll'),
  glob('*.exe'),
];

/** Applied to every pull-request diff. Not configurable. */
export const PULL_REQUEST_EXCLUSIONS: readonly ExclusionRule[] = [
  // Lock files
  regex('\\.lock$'),
  regex('(^|/)yarn\\.lock$'),
  regex('(^|/)package-lock\\.json$'),
  regex('(^|/)pnpm-lock\\.yaml$'),
  regex('(^|/)Pipfile\\.lock$'),
  regex('(^|/)poetry\\.lock$'),
  regex('(^|/)Gemfile\\.lock$'),
  regex('(^|/)composer\\.lock$'),
  regex('(^|/)go\\.sum$'),
  regex('(^|/)Cargo\\.lock$'),
  // Generated and minified
  regex('\\.min\\.(js|css)$'),
  regex('\\.bundle\\.(js|css)$'),
  regex('\\.d\\.ts$'),
  regex('\\.map$'),
  regex('\\.(pyc|pyo|class|o|so|dll)$'),
  // Binary and media
  regex('\\.(png|jpg|jpeg|gif|ico|svg|pdf|zip|tar|gz)$'),
  // Editor and IDE
  regex('(^|/)\\.idea/'),
  regex('(^|/)\\.vscode/'),
  regex('(^|/)\\.DS_Store$'),
  regex('\\.(swp|swo)$'),
  regex('~$'),
  // Test snapshots, fixtures and mocks
  regex('(^|/)__snapshots__/'),
  regex('\\.snap$'),
  regex('(^|/)(fixtures?|__fixtures__|mocks?|__mocks__)/.*\\.json$'),
  regex('\\.(fixture|mock)\\.json$'),
];

export function globRules(patterns: readonly string[]): ExclusionRule[] {
  return patterns.map(glob);
}
