import { parseBlameLine } from '../blame/line-parser.js';
import type { BlameComparison, HashMatch, LineFormat } from '../blame/types.js';

export interface CompareOptions {
  baselineFormat?: LineFormat;
  candidateFormat?: LineFormat;
  hashMatch?: HashMatch;
}

export type ComparisonStatus = 'match' | 'length-mismatch' | 'hash-mismatch' | 'unparseable';

export function hashesAgree(a: string, b: string, mode: HashMatch = 'exact'): boolean {
  if (mode === 'prefix') return a.startsWith(b) || b.startsWith(a);
  return a === b;
}

/**
 * Align both blames by line index and compare attributed commits only.
 * Line numbers and content are echoes of the input and are not compared.
 */
export function compareBlames(
  baselineLines: readonly string[],
  candidateLines: readonly string[],
  opts: CompareOptions = {},
): BlameComparison {
  const result: BlameComparison = {
    lengthMismatch: false,
    baselineLineCount: baselineLines.length,
    candidateLineCount: candidateLines.length,
    mismatches: [],
    parseFailures: [],
  };

  // No realignment: index-aligned comparison is meaningless once counts differ
  if (baselineLines.length !== candidateLines.length) {
    result.lengthMismatch = true;
    return result;
  }

  for (let i = 0; i < baselineLines.length; i++) {
    const baseline = parseBlameLine(baselineLines[i], opts.baselineFormat);
    if (baseline.kind === 'malformed') {
      result.parseFailures.push({ lineIndex: i, side: 'baseline', line: baseline.line });
      continue;
    }

    const candidate = parseBlameLine(candidateLines[i], opts.candidateFormat);
    if (candidate.kind === 'malformed') {
      result.parseFailures.push({ lineIndex: i, side: 'candidate', line: candidate.line });
      continue;
    }

    if (!hashesAgree(baseline.record.commitHash, candidate.record.commitHash, opts.hashMatch)) {
      result.mismatches.push({
        lineIndex: i,
        baselineHash: baseline.record.commitHash,
        candidateHash: candidate.record.commitHash,
        content: candidate.record.content,
      });
    }
  }

  return result;
}

export function classifyComparison(comparison: BlameComparison): ComparisonStatus {
  if (comparison.lengthMismatch) return 'length-mismatch';
  if (comparison.mismatches.length > 0) return 'hash-mismatch';
  if (comparison.parseFailures.length > 0) return 'unparseable';
  return 'match';
}
