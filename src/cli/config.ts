import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { basename, extname, join, resolve } from 'node:path';
import yaml from 'js-yaml';
import type { HashMatch, LineFormat } from '../blame/types.js';
import type { ComparisonConfig } from '../compare/driver.js';
import { ConfigurationError } from '../errors.js';

export type OutputFormat = 'terminal' | 'json';

export const LINE_FORMATS: readonly LineFormat[] = ['compact', 'git'];
export const HASH_MATCHES: readonly HashMatch[] = ['exact', 'prefix'];
export const OUTPUT_FORMATS: readonly OutputFormat[] = ['terminal', 'json'];

export const WORK_TREE_ENV = 'GIT_WORK_TREE';

export const CONFIG_FILE_NAMES = [
  '.blamecomparerc.json',
  '.blamecomparerc.yaml',
  '.blamecomparerc.yml',
  '.blamecomparerc',
];

/** Settings an rc file may carry. Positional arguments always come from the command line. */
export interface FileConfig {
  blameArgs?: string[];
  baselineFormat?: LineFormat;
  candidateFormat?: LineFormat;
  hashMatch?: HashMatch;
  parallel?: boolean;
  format?: OutputFormat;
  strict?: boolean;
}

// Type alias, not interface: program.opts<T>() needs an index signature
export type CliOptions = {
  blameArgs?: string;
  baselineFormat?: LineFormat;
  candidateFormat?: LineFormat;
  hashMatch?: HashMatch;
  parallel?: boolean;
  format?: OutputFormat;
  strict?: boolean;
  config?: string;
};

export interface PositionalArgs {
  baseline: string;
  candidate: string;
  limit: number;
  offset: number;
}

export interface HarnessConfig extends ComparisonConfig {
  format: OutputFormat;
  strict: boolean;
}

export function splitArgs(value: string): string[] {
  return value.split(/\s+/).filter(Boolean);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function oneOf<T extends string>(value: unknown, allowed: readonly T[], key: string, source: string): T | undefined {
  if (value === undefined) return undefined;
  const match = allowed.find(a => a === value);
  if (match === undefined) {
    throw new ConfigurationError(`${source}: "${key}" must be one of ${allowed.join(', ')}`);
  }
  return match;
}

function flag(value: unknown, key: string, source: string): boolean | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    throw new ConfigurationError(`${source}: "${key}" must be true or false`);
  }
  return value;
}

function argList(value: unknown, source: string): string[] | undefined {
  if (value === undefined) return undefined;
  if (typeof value === 'string') return splitArgs(value);
  if (Array.isArray(value) && value.every((v): v is string => typeof v === 'string')) return value;
  throw new ConfigurationError(`${source}: "blameArgs" must be a string or a list of strings`);
}

export function parseFileConfig(raw: unknown, source: string): FileConfig {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) {
    throw new ConfigurationError(`${source}: expected a mapping of settings`);
  }

  return {
    blameArgs: argList(raw.blameArgs, source),
    baselineFormat: oneOf(raw.baselineFormat, LINE_FORMATS, 'baselineFormat', source),
    candidateFormat: oneOf(raw.candidateFormat, LINE_FORMATS, 'candidateFormat', source),
    hashMatch: oneOf(raw.hashMatch, HASH_MATCHES, 'hashMatch', source),
    parallel: flag(raw.parallel, 'parallel', source),
    format: oneOf(raw.format, OUTPUT_FORMATS, 'format', source),
    strict: flag(raw.strict, 'strict', source),
  };
}

export function findConfigFile(dir: string): string | undefined {
  return CONFIG_FILE_NAMES.map(name => join(dir, name)).find(path => existsSync(path));
}

export async function loadConfig(dir: string, explicitPath?: string): Promise<FileConfig> {
  const configFile = explicitPath ? resolve(dir, explicitPath) : findConfigFile(dir);
  if (!configFile) return {};

  let content: string;
  try {
    content = await readFile(configFile, 'utf-8');
  } catch (err) {
    throw new ConfigurationError(`Cannot read config file ${configFile}`, { cause: err });
  }

  const ext = extname(configFile);
  let raw: unknown;
  try {
    raw = ext === '.yaml' || ext === '.yml' ? yaml.load(content) : JSON.parse(content);
  } catch (err) {
    throw new ConfigurationError(`Invalid config file ${configFile}`, { cause: err });
  }

  return parseFileConfig(raw, configFile);
}

/** Stock git prints its own blame layout; every other executable defaults to compact. */
export function defaultLineFormat(executable: string): LineFormat {
  const name = basename(executable).replace(/\.exe$/i, '');
  return name.endsWith('git') ? 'git' : 'compact';
}

/**
 * Merge positional arguments, command-line options, the rc file and the
 * environment. Options win over the file; the file wins over defaults.
 */
export function resolveConfig(
  args: PositionalArgs,
  cli: CliOptions,
  file: FileConfig,
  env: NodeJS.ProcessEnv,
  cwd: string,
): HarnessConfig {
  const rawWorkTree = env[WORK_TREE_ENV];
  if (!rawWorkTree) {
    throw new ConfigurationError(`env variable ${WORK_TREE_ENV} not set`);
  }

  const workTree = resolve(cwd, rawWorkTree);

  return {
    repo: { workTree, gitDir: join(workTree, '.git') },
    baseline: {
      path: args.baseline,
      format: cli.baselineFormat ?? file.baselineFormat ?? defaultLineFormat(args.baseline),
    },
    candidate: {
      path: args.candidate,
      format: cli.candidateFormat ?? file.candidateFormat ?? defaultLineFormat(args.candidate),
    },
    limit: args.limit,
    offset: args.offset,
    blameArgs: cli.blameArgs !== undefined ? splitArgs(cli.blameArgs) : file.blameArgs ?? [],
    hashMatch: cli.hashMatch ?? file.hashMatch ?? 'exact',
    parallel: cli.parallel ?? file.parallel ?? false,
    format: cli.format ?? file.format ?? 'terminal',
    strict: cli.strict ?? file.strict ?? false,
  };
}
