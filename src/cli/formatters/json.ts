import type { FileReport, Reporter, RunStart, RunSummary } from '../../compare/driver.js';
import { fileStatus } from '../../compare/driver.js';
import type { LineWriter } from './terminal.js';

export function formatJson(start: RunStart | undefined, files: FileReport[], summary: RunSummary): string {
  return JSON.stringify({
    summary: {
      trackedCount: start?.trackedCount,
      comparableCount: start?.comparableCount,
      limit: start?.limit,
      offset: start?.offset,
      ...summary,
    },
    files: files.map(f => {
      const base = { index: f.index, path: f.file.path, status: fileStatus(f) };
      if (f.outcome.kind === 'failed') {
        const { exitCode, signal, stderr, error } = f.outcome.failure;
        return { ...base, side: f.outcome.side, exitCode, signal, error, stderr };
      }
      return { ...base, ...f.outcome.comparison };
    }),
  }, null, 2);
}

/** Buffers every report and prints one document when the run finishes. */
export class JsonReporter implements Reporter {
  private start: RunStart | undefined;
  private files: FileReport[] = [];
  private write: LineWriter;

  constructor(write: LineWriter = line => console.log(line)) {
    this.write = write;
  }

  begin(start: RunStart): void {
    this.start = start;
  }

  fileStarted(): void {}

  fileFinished(report: FileReport): void {
    this.files.push(report);
  }

  finish(summary: RunSummary): void {
    this.write(formatJson(this.start, this.files, summary));
  }
}
