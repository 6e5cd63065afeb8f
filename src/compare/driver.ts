import { join } from 'node:path';
import type { FileCandidate, RepoLocation } from '../git/types.js';
import { filterTextFiles } from '../git/ls-files-reader.js';
import type { BlameInvoker, BlameRequest } from '../blame/invoker.js';
import { errorMessage } from '../errors.js';
import type {
  BlameComparison,
  FailedInvocation,
  HashMatch,
  InvocationResult,
  LineFormat,
  Side,
} from '../blame/types.js';
import { classifyComparison, compareBlames, type ComparisonStatus } from './comparator.js';
import { windowFiles, type IndexedFile } from './window.js';

export interface ExecutableSpec {
  path: string;
  format: LineFormat;
}

export interface ComparisonConfig {
  repo: RepoLocation;
  baseline: ExecutableSpec;
  candidate: ExecutableSpec;
  limit: number;
  offset: number;
  blameArgs: string[];
  hashMatch: HashMatch;
  parallel: boolean;   // Run the two executables of one file concurrently
}

export type FileOutcome =
  | { kind: 'compared'; comparison: BlameComparison }
  | { kind: 'failed'; side: Side; failure: FailedInvocation };

export interface FileReport extends IndexedFile {
  outcome: FileOutcome;
}

export type FileStatus = ComparisonStatus | 'failed';

export interface RunStart {
  trackedCount: number;
  comparableCount: number;
  limit: number;
  offset: number;
}

export interface RunSummary {
  compared: number;
  matches: number;
  nonMatches: number;
  byStatus: Record<FileStatus, number>;
}

export interface Reporter {
  begin(start: RunStart): void;
  fileStarted(entry: IndexedFile): void;
  fileFinished(report: FileReport): void;
  finish(summary: RunSummary): void;
}

export interface DriverDeps {
  listFiles: () => Promise<readonly FileCandidate[]>;
  invoke: BlameInvoker;
  reporter: Reporter;
}

export function fileStatus(report: FileReport): FileStatus {
  return report.outcome.kind === 'failed' ? 'failed' : classifyComparison(report.outcome.comparison);
}

export async function runComparison(config: ComparisonConfig, deps: DriverDeps): Promise<RunSummary> {
  const tracked = await deps.listFiles();
  const comparable = [...filterTextFiles(tracked)];

  deps.reporter.begin({
    trackedCount: tracked.length,
    comparableCount: comparable.length,
    limit: config.limit,
    offset: config.offset,
  });

  const summary: RunSummary = {
    compared: 0,
    matches: 0,
    nonMatches: 0,
    byStatus: { 'match': 0, 'length-mismatch': 0, 'hash-mismatch': 0, 'unparseable': 0, 'failed': 0 },
  };

  // One file at a time; a file's failure never stops the batch
  for (const entry of windowFiles(comparable, config.offset, config.limit)) {
    deps.reporter.fileStarted(entry);

    const report: FileReport = { ...entry, outcome: await compareFile(entry.file, config, deps.invoke) };
    const status = fileStatus(report);

    summary.compared++;
    summary.byStatus[status]++;
    if (status === 'match') summary.matches++;
    else summary.nonMatches++;

    deps.reporter.fileFinished(report);
  }

  deps.reporter.finish(summary);
  return summary;
}

async function compareFile(file: FileCandidate, config: ComparisonConfig, invoke: BlameInvoker): Promise<FileOutcome> {
  const request = (spec: ExecutableSpec): BlameRequest => ({
    executable: spec.path,
    filePath: join(config.repo.workTree, file.path),
    repo: config.repo,
    extraArgs: config.blameArgs,
  });

  let baseline: InvocationResult;
  let candidate: InvocationResult;

  if (config.parallel) {
    [baseline, candidate] = await Promise.all([
      safeInvoke(invoke, request(config.baseline)),
      safeInvoke(invoke, request(config.candidate)),
    ]);
  } else {
    baseline = await safeInvoke(invoke, request(config.baseline));
    if (baseline.status === 'failed') return { kind: 'failed', side: 'baseline', failure: baseline };
    candidate = await safeInvoke(invoke, request(config.candidate));
  }

  if (baseline.status === 'failed') return { kind: 'failed', side: 'baseline', failure: baseline };
  if (candidate.status === 'failed') return { kind: 'failed', side: 'candidate', failure: candidate };

  return {
    kind: 'compared',
    comparison: compareBlames(baseline.lines, candidate.lines, {
      baselineFormat: config.baseline.format,
      candidateFormat: config.candidate.format,
      hashMatch: config.hashMatch,
    }),
  };
}

async function safeInvoke(invoke: BlameInvoker, request: BlameRequest): Promise<InvocationResult> {
  try {
    return await invoke(request);
  } catch (err) {
    return { status: 'failed', exitCode: null, signal: null, stderr: '', error: errorMessage(err) };
  }
}
