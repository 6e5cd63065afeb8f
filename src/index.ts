// Git
export { GitBridge } from './git/bridge.js';
export { parseLsFilesOutput, filterTextFiles, classifyAttribute } from './git/ls-files-reader.js';
export type { FileCandidate, TextAttribute, RepoLocation } from './git/types.js';

// Blame
export { parseBlameLine, parseCompactLine, parseGitLine } from './blame/line-parser.js';
export { invokeBlame, splitOutputLines } from './blame/invoker.js';
export type { BlameInvoker, BlameRequest, Spawner, SpawnedProcess } from './blame/invoker.js';
export type {
  BlameRecord,
  BlameComparison,
  HashMatch,
  InvocationResult,
  FailedInvocation,
  LineFormat,
  LineMismatch,
  ParseFailure,
  ParseResult,
  Side,
} from './blame/types.js';

// Comparison
export { windowFiles } from './compare/window.js';
export type { IndexedFile } from './compare/window.js';
export { compareBlames, classifyComparison, hashesAgree } from './compare/comparator.js';
export type { CompareOptions, ComparisonStatus } from './compare/comparator.js';
export { runComparison, fileStatus } from './compare/driver.js';
export type {
  ComparisonConfig,
  DriverDeps,
  ExecutableSpec,
  FileOutcome,
  FileReport,
  FileStatus,
  Reporter,
  RunStart,
  RunSummary,
} from './compare/driver.js';

// Reporting and configuration
export { TerminalReporter } from './cli/formatters/terminal.js';
export { JsonReporter } from './cli/formatters/json.js';
export { loadConfig, resolveConfig, parseFileConfig } from './cli/config.js';
export type { FileConfig, HarnessConfig } from './cli/config.js';

export { ConfigurationError, EnumerationError } from './errors.js';
