#!/usr/bin/env node

import { Command } from 'commander';
import { analyzePullRequests } from './analysis/pull-request-analysis.js';
import { analyzeRepository, pathFilterFor } from './analysis/repository-analysis.js';
import { loadConfig, type CLIOptions } from './config/loader.js';
import type { ArchscribeConfig } from './config/schema.js';
import { TRACKED_FILE_EXCLUSIONS, globRules } from './diff/exclusions.js';
import { ArchscribeError } from './errors.js';
import { GitRepository } from './git/repository.js';
import { loadPullRequestSpecs, parsePullRequestRef, type PullRequestSpecInput } from './pulls/spec.js';
import { createReporter } from './reporter/reporter.js';
import { logger } from './utils/logger.js';

function emit(config: ArchscribeConfig, output: string): void {
  if (config.output === 'json') {
    process.stdout.write(output + '\n');
  } else {
    logger.info(output);
  }
}

function fail(err: unknown): never {
  if (err instanceof ArchscribeError) {
    logger.error(err.message);
  } else if (err instanceof Error) {
    logger.error(`Unexpected error: ${err.message}`);
  } else {
    logger.error(String(err));
  }
  process.exit(1);
}

async function prepare(opts: CLIOptions): Promise<ArchscribeConfig> {
  const config = await loadConfig(opts);
  if (config.verbose) logger.setLevel('debug');
  return config;
}

const program = new Command();

program
  .name('archscribe')
  .description('Collect git and pull-request changes for architecture documentation')
  .version('0.1.0');

program
  .command('changes')
  .description('Analyze changes between the default branch and HEAD')
  .argument('[project]', 'Path to the git project directory', '.')
  .option('-f, --folder <dir>', 'Subfolder to focus analysis on')
  .option('-b, --base <branch>', 'Branch to diff against (auto-detected by default)')
  .option('--exclude <glob...>', 'Additional files to exclude')
  .option('-o, --output <format>', 'Output format: text | json')
  .option('--config <path>', 'Path to config file')
  .option('-v, --verbose', 'Enable debug logging')
  .action(async (project: string, opts: CLIOptions) => {
    try {
      const config = await prepare(opts);
      const repo = new GitRepository(project);
      const pathFilter = pathFilterFor(repo.root, project, config.folder);

      const analysis = analyzeRepository(repo, {
        pathFilter,
        baseBranch: config.baseBranch,
        exclusions: [...TRACKED_FILE_EXCLUSIONS, ...globRules(config.exclude ?? [])],
      });
      emit(config, createReporter(config.output).reportRepository(analysis));
    } catch (err) {
      fail(err);
    }
  });

program
  .command('prs')
  .description('Analyze pull requests across repositories for cross-service changes')
  .argument('[refs...]', 'Pull requests as owner/repo#number')
  .option('--file <path>', 'JSON or YAML file listing pull requests')
  .option('-t, --timeout <seconds>', 'Timeout per pull request fetch')
  .option('--gh <command>', 'GitHub CLI executable')
  .option('-o, --output <format>', 'Output format: text | json')
  .option('--config <path>', 'Path to config file')
  .option('-v, --verbose', 'Enable debug logging')
  .action(async (refs: string[], opts: CLIOptions & { file?: string }) => {
    try {
      const config = await prepare(opts);

      const specs: PullRequestSpecInput[] = [
        ...(opts.file ? loadPullRequestSpecs(opts.file) : []),
        ...refs.map(parsePullRequestRef),
      ];
      if (specs.length === 0) {
        throw new ArchscribeError('No pull requests given', 'pass owner/repo#number or --file');
      }

      const analysis = await analyzePullRequests(specs, {
        timeoutSeconds: config.prTimeout,
        ghCommand: config.ghCommand,
      });
      emit(config, createReporter(config.output).reportPullRequests(analysis));
    } catch (err) {
      fail(err);
    }
  });

await program.parseAsync();
