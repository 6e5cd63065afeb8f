import { GitBridge } from '../../git/bridge.js';
import { invokeBlame } from '../../blame/invoker.js';
import { runComparison, type Reporter, type RunSummary } from '../../compare/driver.js';
import { EnumerationError } from '../../errors.js';
import type { HarnessConfig } from '../config.js';
import { TerminalReporter, type LineWriter } from '../formatters/terminal.js';
import { JsonReporter } from '../formatters/json.js';

export function createReporter(config: HarnessConfig, write?: LineWriter): Reporter {
  return config.format === 'json' ? new JsonReporter(write) : new TerminalReporter(write);
}

export async function compareCommand(config: HarnessConfig): Promise<RunSummary> {
  const git = new GitBridge(config.repo);

  if (!(await git.isRepo())) {
    throw new EnumerationError(`${config.repo.workTree} is not a Git work tree`);
  }

  return runComparison(config, {
    listFiles: () => git.listTrackedFiles(),
    invoke: request => invokeBlame(request),
    reporter: createReporter(config),
  });
}
