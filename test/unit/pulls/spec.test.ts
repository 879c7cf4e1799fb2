import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ValidationError } from '../../../src/errors.js';
import { loadPullRequestSpecs, parsePullRequestRef, validatePullRequestSpecs } from '../../../src/pulls/spec.js';

describe('validatePullRequestSpecs', () => {
  it('fills in default focus areas', () => {
    expect(validatePullRequestSpecs([{ repo: 'acme/api', number: 1 }])).toEqual([
      { repo: 'acme/api', number: 1, focusAreas: [] },
    ]);
  });

  it('keeps description and focus areas', () => {
    const [spec] = validatePullRequestSpecs([
      { repo: 'acme/api', number: 3, description: 'Add pagination', focusAreas: ['api', 'db'] },
    ]);
    expect(spec).toEqual({ repo: 'acme/api', number: 3, description: 'Add pagination', focusAreas: ['api', 'db'] });
  });

  it('rejects a repository without an owner', () => {
    expect(() => validatePullRequestSpecs([{ repo: 'api', number: 1 }])).toThrow(
      "Invalid pull request specification: 0.repo: Repository must be in format 'owner/repo'",
    );
  });

  it.each([0, -4, 1.5])('rejects pull request number %s', (number) => {
    expect(() => validatePullRequestSpecs([{ repo: 'acme/api', number }])).toThrow(ValidationError);
  });

  it('rejects an empty batch', () => {
    expect(() => validatePullRequestSpecs([])).toThrow('At least one pull request is required');
  });

  it('rejects duplicate pull requests', () => {
    expect(() =>
      validatePullRequestSpecs([
        { repo: 'acme/api', number: 1 },
        { repo: 'acme/web', number: 1 },
        { repo: 'acme/api', number: 1 },
      ]),
    ).toThrow('Invalid pull request specification: 2: Duplicate pull request: acme/api#1');
  });
});

describe('parsePullRequestRef', () => {
  it('parses owner/repo#number', () => {
    expect(parsePullRequestRef('acme/api#12')).toEqual({ repo: 'acme/api', number: 12 });
  });

  it('trims surrounding whitespace', () => {
    expect(parsePullRequestRef(' acme/api#3 ')).toEqual({ repo: 'acme/api', number: 3 });
  });

  it.each(['acme/api', 'api#12', 'acme/api#x', 'a/b/c#1'])('rejects %s', (ref) => {
    expect(() => parsePullRequestRef(ref)).toThrow(`Invalid pull request reference '${ref}'`);
  });
});

describe('loadPullRequestSpecs', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'archscribe-prs-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('reads a YAML file with a prs list', () => {
    const filePath = join(tempDir, 'prs.yml');
    writeFileSync(
      filePath,
      'prs:\n  - repo: acme/users\n    number: 10\n    focusAreas: [auth]\n  - repo: acme/orders\n    number: 11\n',
      'utf-8',
    );

    expect(loadPullRequestSpecs(filePath)).toEqual([
      { repo: 'acme/users', number: 10, focusAreas: ['auth'] },
      { repo: 'acme/orders', number: 11, focusAreas: [] },
    ]);
  });

  it('reads a JSON file holding a bare list', () => {
    const filePath = join(tempDir, 'prs.json');
    writeFileSync(filePath, JSON.stringify([{ repo: 'acme/users', number: 5, description: 'Rename field' }]), 'utf-8');

    expect(loadPullRequestSpecs(filePath)).toEqual([
      { repo: 'acme/users', number: 5, description: 'Rename field', focusAreas: [] },
    ]);
  });

  it('rejects a file of another shape', () => {
    const filePath = join(tempDir, 'prs.json');
    writeFileSync(filePath, JSON.stringify({ pulls: [] }), 'utf-8');

    expect(() => loadPullRequestSpecs(filePath)).toThrow(`Invalid pull request file ${filePath}`);
  });

  it('validates the entries it reads', () => {
    const filePath = join(tempDir, 'prs.json');
    writeFileSync(filePath, JSON.stringify({ prs: [{ repo: 'acme/users', number: 'five' }] }), 'utf-8');

    expect(() => loadPullRequestSpecs(filePath)).toThrow(ValidationError);
  });
});
