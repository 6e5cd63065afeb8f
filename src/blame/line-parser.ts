import type { LineFormat, ParseResult } from './types.js';

// Lowercase alphanumerics: real hashes are hex, but short synthetic ids are accepted too.
const isHashChar = (ch: string) => (ch >= '0' && ch <= '9') || (ch >= 'a' && ch <= 'z');
const isHexChar = (ch: string) => (ch >= '0' && ch <= '9') || (ch >= 'a' && ch <= 'f');
const isDigit = (ch: string) => ch >= '0' && ch <= '9';

function scan(line: string, start: number, accept: (ch: string) => boolean): number {
  let pos = start;
  while (pos < line.length && accept(line[pos])) pos++;
  return pos;
}

function malformed(line: string): ParseResult {
  return { kind: 'malformed', line };
}

/** `<hash> <int> <int> <content>`, content taken verbatim (may be empty). */
export function parseCompactLine(line: string): ParseResult {
  const hashEnd = scan(line, 0, isHashChar);
  if (hashEnd === 0 || line[hashEnd] !== ' ') return malformed(line);

  const sourceStart = hashEnd + 1;
  const sourceEnd = scan(line, sourceStart, isDigit);
  if (sourceEnd === sourceStart || line[sourceEnd] !== ' ') return malformed(line);

  const finalStart = sourceEnd + 1;
  const finalEnd = scan(line, finalStart, isDigit);
  if (finalEnd === finalStart || line[finalEnd] !== ' ') return malformed(line);

  return {
    kind: 'ok',
    record: {
      commitHash: line.slice(0, hashEnd),
      sourceLine: Number(line.slice(sourceStart, sourceEnd)),
      finalLine: Number(line.slice(finalStart, finalEnd)),
      content: line.slice(finalEnd + 1),
      boundary: false,
    },
  };
}

/**
 * Default `git blame` output:
 *   ^1a2b3c4 path/to/file (Jane Doe 2024-01-01 12:00:00 +0100  12) content
 * The filename only appears when git decides to show it. The author block
 * ends at the first `<digits>) ` preceded by whitespace.
 */
export function parseGitLine(line: string): ParseResult {
  const boundary = line.startsWith('^');
  const hashStart = boundary ? 1 : 0;
  const hashEnd = scan(line, hashStart, isHexChar);
  if (hashEnd === hashStart || line[hashEnd] !== ' ') return malformed(line);

  const open = line.indexOf('(', hashEnd);
  if (open === -1) return malformed(line);

  let close = line.indexOf(') ', open + 1);
  while (close !== -1) {
    let numberStart = close;
    while (numberStart > open + 1 && isDigit(line[numberStart - 1])) numberStart--;

    if (numberStart < close && (line[numberStart - 1] === ' ' || line[numberStart - 1] === '\t')) {
      const lineNumber = Number(line.slice(numberStart, close));
      return {
        kind: 'ok',
        record: {
          commitHash: line.slice(hashStart, hashEnd),
          sourceLine: lineNumber,
          finalLine: lineNumber,
          content: line.slice(close + 2),
          boundary,
        },
      };
    }
    close = line.indexOf(') ', close + 1);
  }

  return malformed(line);
}

export function parseBlameLine(line: string, format: LineFormat = 'compact'): ParseResult {
  return format === 'git' ? parseGitLine(line) : parseCompactLine(line);
}
