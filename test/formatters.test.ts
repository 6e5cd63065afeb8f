import { describe, it, expect } from 'vitest';
import { Chalk } from 'chalk';
import {
  TerminalReporter,
  formatFileReport,
  formatProgress,
  formatStart,
  formatSummary,
} from '../src/cli/formatters/terminal.js';
import { JsonReporter } from '../src/cli/formatters/json.js';
import type { FileReport, RunSummary } from '../src/compare/driver.js';
import type { BlameComparison } from '../src/blame/types.js';

const plain = new Chalk({ level: 0 });
const file = { path: 'src/a.ts', eolInfo: 'lf', textAttribute: 'text' as const };

function compared(overrides: Partial<BlameComparison>): FileReport {
  return {
    index: 4,
    file,
    outcome: {
      kind: 'compared',
      comparison: {
        lengthMismatch: false,
        baselineLineCount: 3,
        candidateLineCount: 3,
        mismatches: [],
        parseFailures: [],
        ...overrides,
      },
    },
  };
}

const summary = (matches: number, nonMatches: number): RunSummary => ({
  compared: matches + nonMatches,
  matches,
  nonMatches,
  byStatus: { 'match': matches, 'length-mismatch': 0, 'hash-mismatch': nonMatches, 'unparseable': 0, 'failed': 0 },
});

describe('terminal formatter', () => {
  it('prints the run header', () => {
    expect(formatStart({ trackedCount: 12, comparableCount: 10, limit: 5, offset: 2 }, plain)).toEqual([
      '12 files to run blame for, filtering out non-text files',
      '10 files to run blame for, limit 5, offset 2',
      'comparing blames',
    ]);
  });

  it('prints progress as index and path', () => {
    expect(formatProgress({ index: 7, file }, plain)).toBe('7 src/a.ts');
  });

  it('prints nothing for a matching file', () => {
    expect(formatFileReport(compared({}), plain)).toEqual([]);
  });

  it('prints a length mismatch with both counts', () => {
    const report = compared({ lengthMismatch: true, candidateLineCount: 2 });
    expect(formatFileReport(report, plain)).toEqual([
      'blames have different number of lines (baseline 3, candidate 2)',
    ]);
  });

  it('prints parse failures and hash mismatches', () => {
    const report = compared({
      parseFailures: [{ lineIndex: 0, side: 'candidate', line: 'oops' }],
      mismatches: [{ lineIndex: 2, baselineHash: 'abc', candidateHash: 'def', content: 'return x;' }],
    });
    expect(formatFileReport(report, plain)).toEqual([
      'candidate line 0: `oops` does not look like a blame line',
      "hashes don't match for line 2: return x;",
      'baseline blamed abc while candidate blamed def',
      '',
    ]);
  });

  it('prints invocation failures with their stderr', () => {
    const report: FileReport = {
      index: 0,
      file,
      outcome: {
        kind: 'failed',
        side: 'candidate',
        failure: { status: 'failed', exitCode: 2, signal: null, stderr: 'panic: boom\nbacktrace' },
      },
    };
    expect(formatFileReport(report, plain)).toEqual([
      'candidate executable failed with exit code 2',
      '  panic: boom',
      '  backtrace',
    ]);
  });

  it('describes signals and spawn errors', () => {
    const failed = (signal: NodeJS.Signals | null, error?: string): FileReport => ({
      index: 0,
      file,
      outcome: { kind: 'failed', side: 'baseline', failure: { status: 'failed', exitCode: null, signal, stderr: '', error } },
    });
    expect(formatFileReport(failed('SIGTERM'), plain)).toEqual(['baseline executable was terminated by SIGTERM']);
    expect(formatFileReport(failed(null, 'spawn x ENOENT'), plain)).toEqual([
      'baseline executable could not be started: spawn x ENOENT',
    ]);
  });

  it('summarises the run', () => {
    expect(formatSummary(summary(3, 0), plain)).toBe('done, all blames matched');
    expect(formatSummary(summary(3, 2), plain)).toBe('done, number of matches: 3, number of non-matches: 2');
  });

  it('writes every event through the sink', () => {
    const lines: string[] = [];
    const reporter = new TerminalReporter(line => lines.push(line), plain);

    reporter.begin({ trackedCount: 1, comparableCount: 1, limit: 1, offset: 0 });
    reporter.fileStarted({ index: 0, file });
    reporter.fileFinished(compared({ lengthMismatch: true, candidateLineCount: 0 }));
    reporter.finish(summary(0, 1));

    expect(lines).toEqual([
      '1 files to run blame for, filtering out non-text files',
      '1 files to run blame for, limit 1, offset 0',
      'comparing blames',
      '0 src/a.ts',
      'blames have different number of lines (baseline 3, candidate 0)',
      'done, number of matches: 0, number of non-matches: 1',
    ]);
  });
});

describe('JsonReporter', () => {
  it('prints one document with the summary and every file', () => {
    const lines: string[] = [];
    const reporter = new JsonReporter(line => lines.push(line));

    reporter.begin({ trackedCount: 2, comparableCount: 2, limit: 2, offset: 0 });
    reporter.fileStarted();
    reporter.fileFinished(compared({
      mismatches: [{ lineIndex: 1, baselineHash: 'abc', candidateHash: 'def', content: 'x' }],
    }));
    reporter.fileFinished({
      index: 5,
      file: { ...file, path: 'b.ts' },
      outcome: { kind: 'failed', side: 'baseline', failure: { status: 'failed', exitCode: 1, signal: null, stderr: 'err' } },
    });
    expect(lines).toEqual([]);

    reporter.finish(summary(0, 2));

    expect(lines).toHaveLength(1);
    const doc = JSON.parse(lines[0]);
    expect(doc.summary).toEqual({
      trackedCount: 2,
      comparableCount: 2,
      limit: 2,
      offset: 0,
      compared: 2,
      matches: 0,
      nonMatches: 2,
      byStatus: { 'match': 0, 'length-mismatch': 0, 'hash-mismatch': 2, 'unparseable': 0, 'failed': 0 },
    });
    expect(doc.files).toEqual([
      {
        index: 4,
        path: 'src/a.ts',
        status: 'hash-mismatch',
        lengthMismatch: false,
        baselineLineCount: 3,
        candidateLineCount: 3,
        mismatches: [{ lineIndex: 1, baselineHash: 'abc', candidateHash: 'def', content: 'x' }],
        parseFailures: [],
      },
      { index: 5, path: 'b.ts', status: 'failed', side: 'baseline', exitCode: 1, signal: null, stderr: 'err' },
    ]);
  });
});
