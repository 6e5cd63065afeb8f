import { describe, it, expect } from 'vitest';
import { windowFiles } from '../src/compare/window.js';
import type { FileCandidate } from '../src/git/types.js';

function files(count: number): FileCandidate[] {
  return Array.from({ length: count }, (_, i) => ({
    path: `file-${i}.txt`,
    eolInfo: 'lf',
    textAttribute: 'text' as const,
  }));
}

describe('windowFiles', () => {
  it('skips offset files then takes limit, keeping original indices', () => {
    const result = [...windowFiles(files(10), 3, 4)];
    expect(result.map(e => e.index)).toEqual([3, 4, 5, 6]);
    expect(result.map(e => e.file.path)).toEqual(['file-3.txt', 'file-4.txt', 'file-5.txt', 'file-6.txt']);
  });

  it('returns min(limit, length - offset) entries', () => {
    for (const [length, offset, limit] of [[10, 0, 3], [10, 8, 5], [5, 5, 2], [5, 9, 2], [4, 0, 0]]) {
      const count = [...windowFiles(files(length), offset, limit)].length;
      expect(count).toBe(Math.min(limit, Math.max(0, length - offset)));
    }
  });

  it('is empty when the offset is past the end', () => {
    expect([...windowFiles(files(3), 3, 10)]).toEqual([]);
  });

  it('works on lazy input', () => {
    function* source(): Generator<FileCandidate> {
      yield* files(6);
    }
    expect([...windowFiles(source(), 4, 10)].map(e => e.index)).toEqual([4, 5]);
  });

  it('rejects negative arguments before iterating', () => {
    expect(() => windowFiles(files(3), -1, 2)).toThrow(RangeError);
    expect(() => windowFiles(files(3), 0, -2)).toThrow('limit must be a non-negative integer, got -2');
  });

  it('rejects fractional arguments', () => {
    expect(() => windowFiles(files(3), 1.5, 2)).toThrow(RangeError);
  });
});
