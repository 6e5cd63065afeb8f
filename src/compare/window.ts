import type { FileCandidate } from '../git/types.js';

export interface IndexedFile {
  index: number;         // Position in the filtered list, before windowing
  file: FileCandidate;
}

function assertCount(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
  }
}

/**
 * Skip `offset` files, then take up to `limit`. Arguments are checked
 * eagerly so a bad window fails before anything is yielded.
 */
export function windowFiles(
  files: Iterable<FileCandidate>,
  offset: number,
  limit: number,
): Generator<IndexedFile> {
  assertCount('offset', offset);
  assertCount('limit', limit);
  return take(files, offset, limit);
}

function* take(files: Iterable<FileCandidate>, offset: number, limit: number): Generator<IndexedFile> {
  if (limit === 0) return;

  let index = 0;
  let taken = 0;
  for (const file of files) {
    if (index >= offset) {
      yield { index, file };
      if (++taken >= limit) return;
    }
    index++;
  }
}
