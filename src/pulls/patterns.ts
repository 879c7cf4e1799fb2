import { serviceNameOf } from './parser.js';
import type { CrossServicePatterns, PatternCategory, PRChange, PRDiff, ServiceInteractions } from './types.js';

// Keyword heuristics over file paths and diff text. They guess; false
// positives such as a file name that happens to contain another service's
// name are expected.

export interface CategoryRule {
  category: PatternCategory;
  /** Receives the lower-cased path. */
  matches(filePath: string): boolean;
  describe(serviceName: string, change: PRChange): string;
}

export interface InteractionRule {
  name: string;
  /** Evidence that `source` diffs reference `targetService`. */
  collect(source: readonly PRDiff[], targetService: string): string[];
}

const includesAny = (value: string, keywords: readonly string[]) => keywords.some((k) => value.includes(k));

const describePath = (serviceName: string, change: PRChange) => `${serviceName}: ${change.filePath}`;

/** Evaluated in order; the first rule that matches claims the file. */
export const CATEGORY_RULES: readonly CategoryRule[] = [
  {
    category: 'api_specifications',
    matches: (p) => includesAny(p, ['swagger', 'openapi', 'api-docs']) || (p.endsWith('.json') && p.includes('api')),
    describe: (serviceName, change) =>
      `${serviceName}: ${change.filePath} (+${change.linesAdded}/-${change.linesRemoved})`,
  },
  {
    category: 'api_endpoints',
    matches: (p) => includesAny(p, ['api', 'router', 'controller', 'endpoint', 'route']),
    describe: describePath,
  },
  {
    category: 'database_changes',
    matches: (p) => includesAny(p, ['model', 'schema', 'migration', 'db', 'sql']),
    describe: describePath,
  },
  {
    category: 'config_changes',
    matches: (p) => includesAny(p, ['config', 'env', 'setting', 'constant']),
    describe: describePath,
  },
];

export const INTERACTION_RULES: readonly InteractionRule[] = [
  {
    name: 'file-reference',
    collect: (source, target) => {
      const needle = target.toLowerCase();
      return source.flatMap((diff) =>
        diff.changes
          .filter((change) => change.filePath.toLowerCase().includes(needle))
          .map((change) => `File reference: ${change.filePath}`),
      );
    },
  },
  {
    name: 'code-reference',
    collect: (source, target) => {
      const needle = target.toLowerCase();
      return source.some((diff) => diff.rawDiff.toLowerCase().includes(needle))
        ? [`Code references to ${target}`]
        : [];
    },
  },
];

export function classifyPath(
  filePath: string,
  rules: readonly CategoryRule[] = CATEGORY_RULES,
): CategoryRule | undefined {
  const lowered = filePath.toLowerCase();
  return rules.find((rule) => rule.matches(lowered));
}

export function detectCrossServicePatterns(
  prDiffs: readonly PRDiff[],
  rules: readonly CategoryRule[] = CATEGORY_RULES,
): CrossServicePatterns {
  const byCategory = new Map<PatternCategory, string[]>(rules.map((rule) => [rule.category, []]));

  for (const diff of prDiffs) {
    const serviceName = serviceNameOf(diff.repo);
    for (const change of diff.changes) {
      const rule = classifyPath(change.filePath, rules);
      if (rule) {
        byCategory.get(rule.category)?.push(rule.describe(serviceName, change));
      }
    }
  }

  const patterns: CrossServicePatterns = {};
  for (const [category, entries] of byCategory) {
    if (entries.length > 0) patterns[category] = entries;
  }
  return patterns;
}

export function detectServiceInteractions(
  prDiffs: readonly PRDiff[],
  rules: readonly InteractionRule[] = INTERACTION_RULES,
): ServiceInteractions {
  const diffsByService = new Map<string, PRDiff[]>();
  for (const diff of prDiffs) {
    const serviceName = serviceNameOf(diff.repo);
    diffsByService.set(serviceName, [...(diffsByService.get(serviceName) ?? []), diff]);
  }

  const interactions: ServiceInteractions = {};
  for (const [source, sourceDiffs] of diffsByService) {
    for (const target of diffsByService.keys()) {
      if (target === source) continue;

      const evidence = rules.flatMap((rule) => rule.collect(sourceDiffs, target));
      if (evidence.length > 0) {
        interactions[source] = { ...interactions[source], [target]: evidence };
      }
    }
  }
  return interactions;
}
