import chalk, { type ChalkInstance } from 'chalk';
import type { FailedInvocation, Side } from '../../blame/types.js';
import type { IndexedFile } from '../../compare/window.js';
import type { FileReport, Reporter, RunStart, RunSummary } from '../../compare/driver.js';

export type LineWriter = (line: string) => void;

export function formatStart(start: RunStart, paint: ChalkInstance = chalk): string[] {
  return [
    paint.dim(`${start.trackedCount} files to run blame for, filtering out non-text files`),
    paint.dim(`${start.comparableCount} files to run blame for, limit ${start.limit}, offset ${start.offset}`),
    'comparing blames',
  ];
}

export function formatProgress(entry: IndexedFile, paint: ChalkInstance = chalk): string {
  return `${paint.dim(String(entry.index))} ${entry.file.path}`;
}

function describeFailure(side: Side, failure: FailedInvocation): string {
  if (failure.error) return `${side} executable could not be started: ${failure.error}`;
  if (failure.signal) return `${side} executable was terminated by ${failure.signal}`;
  return `${side} executable failed with exit code ${failure.exitCode}`;
}

export function formatFileReport(report: FileReport, paint: ChalkInstance = chalk): string[] {
  const lines: string[] = [];
  const { outcome } = report;

  if (outcome.kind === 'failed') {
    lines.push(paint.red(describeFailure(outcome.side, outcome.failure)));
    for (const line of outcome.failure.stderr.split('\n').filter(Boolean)) {
      lines.push(paint.dim(`  ${line}`));
    }
    return lines;
  }

  const { comparison } = outcome;
  if (comparison.lengthMismatch) {
    lines.push(paint.yellow(
      `blames have different number of lines (baseline ${comparison.baselineLineCount}, candidate ${comparison.candidateLineCount})`,
    ));
    return lines;
  }

  for (const failure of comparison.parseFailures) {
    lines.push(paint.yellow(`${failure.side} line ${failure.lineIndex}: \`${failure.line}\` does not look like a blame line`));
  }

  for (const mismatch of comparison.mismatches) {
    lines.push(paint.red(`hashes don't match for line ${mismatch.lineIndex}: ${mismatch.content}`));
    lines.push(`baseline blamed ${paint.yellow(mismatch.baselineHash)} while candidate blamed ${paint.yellow(mismatch.candidateHash)}`);
    lines.push('');
  }

  return lines;
}

export function formatSummary(summary: RunSummary, paint: ChalkInstance = chalk): string {
  if (summary.nonMatches === 0) {
    return paint.green('done, all blames matched');
  }
  return `done, number of matches: ${paint.green(String(summary.matches))}, number of non-matches: ${paint.red(String(summary.nonMatches))}`;
}

export class TerminalReporter implements Reporter {
  private write: LineWriter;
  private paint: ChalkInstance;

  constructor(write: LineWriter = line => console.log(line), paint: ChalkInstance = chalk) {
    this.write = write;
    this.paint = paint;
  }

  begin(start: RunStart): void {
    for (const line of formatStart(start, this.paint)) this.write(line);
  }

  fileStarted(entry: IndexedFile): void {
    this.write(formatProgress(entry, this.paint));
  }

  fileFinished(report: FileReport): void {
    for (const line of formatFileReport(report, this.paint)) this.write(line);
  }

  finish(summary: RunSummary): void {
    this.write(formatSummary(summary, this.paint));
  }
}
