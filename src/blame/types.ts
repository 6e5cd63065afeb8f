export type Side = 'baseline' | 'candidate';

/** `compact`: `<hash> <int> <int> <content>`. `git`: default `git blame` output. */
export type LineFormat = 'compact' | 'git';

export type HashMatch = 'exact' | 'prefix';

export interface BlameRecord {
  commitHash: string;
  sourceLine: number;
  finalLine: number;
  content: string;
  boundary: boolean;   // `^` marker in git output
}

export type ParseResult =
  | { kind: 'ok'; record: BlameRecord }
  | { kind: 'malformed'; line: string };

export interface LineMismatch {
  lineIndex: number;
  baselineHash: string;
  candidateHash: string;
  content: string;
}

export interface ParseFailure {
  lineIndex: number;
  side: Side;
  line: string;
}

export interface BlameComparison {
  lengthMismatch: boolean;
  baselineLineCount: number;
  candidateLineCount: number;
  mismatches: LineMismatch[];
  parseFailures: ParseFailure[];
}

export interface InvocationFailure {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stderr: string;
  error?: string;      // Set when the process never ran, e.g. ENOENT
}

export type FailedInvocation = { status: 'failed' } & InvocationFailure;

export type InvocationResult =
  | { status: 'completed'; lines: string[] }
  | FailedInvocation;
