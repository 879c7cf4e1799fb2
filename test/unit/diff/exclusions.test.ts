import { describe, it, expect } from 'vitest';
import {
  createExclusionMatcher,
  globRules,
  PULL_REQUEST_EXCLUSIONS,
  TRACKED_FILE_EXCLUSIONS,
} from '../../../src/diff/exclusions.js';

describe('createExclusionMatcher', () => {
  it('should match substring rules case-sensitively by default', () => {
    const isExcluded = createExclusionMatcher([{ kind: 'substring', pattern: 'vendor/' }]);
    expect(isExcluded('src/vendor/lib.js')).toBe(true);
    expect(isExcluded('src/Vendor/lib.js')).toBe(false);
  });

  it('should honour ignoreCase on substring rules', () => {
    const isExcluded = createExclusionMatcher([{ kind: 'substring', pattern: 'vendor/', ignoreCase: true }]);
    expect(isExcluded('src/Vendor/lib.js')).toBe(true);
  });

  it('should match regex rules', () => {
    const isExcluded = createExclusionMatcher([{ kind: 'regex', pattern: '\\.gen\\.ts$', ignoreCase: true }]);
    expect(isExcluded('api/types.GEN.ts')).toBe(true);
    expect(isExcluded('api/types.ts')).toBe(false);
  });

  it('should match slash-free globs against the basename', () => {
    const isExcluded = createExclusionMatcher(globRules(['*.min.js']));
    expect(isExcluded('public/js/app.min.js')).toBe(true);
    expect(isExcluded('public/js/app.js')).toBe(false);
  });

  it('should match globs containing a slash against the whole path', () => {
    const isExcluded = createExclusionMatcher(globRules(['docs/**']));
    expect(isExcluded('docs/guide/intro.md')).toBe(true);
    expect(isExcluded('src/docs/intro.md')).toBe(false);
  });

  it('should exclude nothing with an empty rule list', () => {
    expect(createExclusionMatcher([])('anything')).toBe(false);
  });
});

describe('TRACKED_FILE_EXCLUSIONS', () => {
  const isExcluded = createExclusionMatcher(TRACKED_FILE_EXCLUSIONS);

  it.each([
    'package-lock.json',
    'web/yarn.lock',
    'pnpm-lock.yaml',
    'api/poetry.lock',
    'go.sum',
    'static/app.min.js',
    'static/site.bundle.css',
    'build/Main.class',
    'bin/tool.exe',
  ])('should exclude %s', (filePath) => {
    expect(isExcluded(filePath)).toBe(true);
  });

  it.each(['src/index.ts', 'README.md', 'go.mod', 'static/app.js'])('should keep %s', (filePath) => {
    expect(isExcluded(filePath)).toBe(false);
  });

  it('should be case-sensitive', () => {
    expect(isExcluded('YARN.LOCK')).toBe(false);
  });
});

describe('PULL_REQUEST_EXCLUSIONS', () => {
  const isExcluded = createExclusionMatcher(PULL_REQUEST_EXCLUSIONS);

  it.each([
    'yarn.lock',
    'Gemfile.lock',
    'services/api/package-lock.json',
    'go.sum',
    'dist/app.min.js',
    'dist/app.bundle.js',
    'types/index.d.ts',
    'dist/app.js.map',
    'pkg/__pycache__/mod.pyc',
    'assets/Logo.PNG',
    'docs/diagram.svg',
    'release.tar.gz',
    '.idea/workspace.xml',
    '.vscode/settings.json',
    'src/.DS_Store',
    'src/__snapshots__/view.test.ts.snap',
    'test/fixtures/user.json',
    'src/__mocks__/api.json',
  ])('should exclude %s', (filePath) => {
    expect(isExcluded(filePath)).toBe(true);
  });

  it.each([
    'src/routes/users.ts',
    'api/openapi.json',
    'db/migrations/001_init.sql',
    'config/settings.py',
    'test/fixtures/loader.ts',
  ])('should keep %s', (filePath) => {
    expect(isExcluded(filePath)).toBe(false);
  });
});
