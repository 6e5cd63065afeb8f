import { Command, InvalidArgumentError, Option } from 'commander';
import chalk from 'chalk';
import type { RunSummary } from '../compare/driver.js';
import { ConfigurationError, EnumerationError } from '../errors.js';
import { compareCommand } from './commands/compare.js';
import {
  HASH_MATCHES,
  LINE_FORMATS,
  OUTPUT_FORMATS,
  loadConfig,
  resolveConfig,
  type CliOptions,
  type HarnessConfig,
} from './config.js';

export interface ProgramContext {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  run?: (config: HarnessConfig) => Promise<RunSummary>;
  setExitCode?: (code: number) => void;
}

export function parseCount(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return Number(value);
}

export function createProgram(ctx: ProgramContext = {}): Command {
  const env = ctx.env ?? process.env;
  const cwd = ctx.cwd ?? process.cwd();
  const run = ctx.run ?? compareCommand;
  const setExitCode = ctx.setExitCode ?? ((code: number) => { process.exitCode = code; });

  const program = new Command();

  program
    .name('blame-compare')
    .description('Check that a candidate blame executable attributes every line of every text file like a baseline')
    .version('0.1.0')
    .argument('<baseline-executable>', 'Trusted blame executable')
    .argument('<candidate-executable>', 'Blame executable under test')
    .argument('<limit>', 'Maximum number of files to compare', parseCount)
    .argument('<offset>', 'Number of text files to skip', parseCount)
    .option('--blame-args <args>', 'Extra arguments passed to both executables after "blame"')
    .addOption(new Option('--baseline-format <format>', 'Line format of the baseline output').choices(LINE_FORMATS))
    .addOption(new Option('--candidate-format <format>', 'Line format of the candidate output').choices(LINE_FORMATS))
    .addOption(new Option('--hash-match <mode>', 'How commit hashes are compared').choices(HASH_MATCHES))
    .option('--parallel', 'Run both executables of a file concurrently')
    .option('--strict', 'Exit with code 1 when any file does not match')
    .addOption(new Option('-f, --format <format>', 'Output format: terminal or json').choices(OUTPUT_FORMATS))
    .option('-c, --config <path>', 'Config file to use instead of searching the current directory')
    .addHelpText('after', `\nThe ${chalk.bold('GIT_WORK_TREE')} environment variable must name the work tree to blame.`)
    .allowExcessArguments(false)
    .showHelpAfterError()
    .action(async (baseline: string, candidate: string, limit: number, offset: number) => {
      const opts = program.opts<CliOptions>();

      let config: HarnessConfig;
      try {
        const file = await loadConfig(cwd, opts.config);
        config = resolveConfig({ baseline, candidate, limit, offset }, opts, file, env, cwd);
      } catch (err) {
        if (err instanceof ConfigurationError) {
          program.error(err.message, { exitCode: 1, code: 'blame-compare.configuration' });
        }
        throw err;
      }

      try {
        const summary = await run(config);
        if (config.strict && summary.nonMatches > 0) setExitCode(1);
      } catch (err) {
        if (!(err instanceof EnumerationError)) throw err;

        console.error(chalk.red(`Error: ${err.message}`));
        if (err.cause instanceof Error) console.error(chalk.dim(`  ${err.cause.message}`));
        setExitCode(1);
      }
    });

  return program;
}
