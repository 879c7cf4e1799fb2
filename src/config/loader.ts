import fs from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import { ConfigError, errorMessage, formatZodIssues } from '../errors.js';
import { ArchscribeConfigSchema, type ArchscribeConfig } from './schema.js';
import { CONFIG_FILE_NAMES } from './defaults.js';

export interface CLIOptions {
  config?: string;
  // String version of a numeric field (from commander)
  timeout?: string;
  // Direct overrides matching schema fields
  base?: string;
  folder?: string;
  output?: string;
  exclude?: string[];
  gh?: string;
  verbose?: boolean;
}

export function findConfigFile(startDir: string): string | null {
  let dir = startDir;
  while (true) {
    for (const name of CONFIG_FILE_NAMES) {
      const filePath = path.join(dir, name);
      if (fs.existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return null;
}

/** Reads a `.json`, `.yml` or `.yaml` file into plain data. */
export function readStructuredFile(filePath: string): unknown {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read ${filePath}`, errorMessage(err), { cause: err });
  }
  try {
    if (filePath.endsWith('.json')) {
      return JSON.parse(content);
    }
    return YAML.parse(content) ?? {};
  } catch (err) {
    throw new ConfigError(`Failed to parse config file ${filePath}`, errorMessage(err), { cause: err });
  }
}

function parseTimeout(value: string): number {
  const seconds = Number(value);
  if (!Number.isInteger(seconds)) {
    throw new ConfigError(`Invalid timeout '${value}'`, 'expected a whole number of seconds');
  }
  return seconds;
}

export async function loadConfig(cliOpts: CLIOptions, cwd: string = process.cwd()): Promise<ArchscribeConfig> {
  // Load config file
  let fileConfig: unknown = {};
  const configPath = cliOpts.config ?? findConfigFile(cwd);
  if (configPath) {
    if (!fs.existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    fileConfig = readStructuredFile(configPath);
  }
  if (typeof fileConfig !== 'object' || fileConfig === null || Array.isArray(fileConfig)) {
    throw new ConfigError(`Config file ${configPath ?? ''} must contain an object`);
  }

  // CLI options override file config
  const merged = {
    ...fileConfig,
    ...(cliOpts.base !== undefined && { baseBranch: cliOpts.base }),
    ...(cliOpts.folder !== undefined && { folder: cliOpts.folder }),
    ...(cliOpts.output !== undefined && { output: cliOpts.output }),
    ...(cliOpts.exclude !== undefined && { exclude: cliOpts.exclude }),
    ...(cliOpts.timeout !== undefined && { prTimeout: parseTimeout(cliOpts.timeout) }),
    ...(cliOpts.gh !== undefined && { ghCommand: cliOpts.gh }),
    ...(cliOpts.verbose !== undefined && { verbose: cliOpts.verbose }),
  };

  // Validate
  const result = ArchscribeConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError('Invalid configuration', formatZodIssues(result.error));
  }
  return result.data;
}
