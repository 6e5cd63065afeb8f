import type { FileCandidate, TextAttribute } from './types.js';

export const LS_FILES_FORMAT = '%(path) %(eolinfo:index)';

export function lsFilesArgs(): string[] {
  return ['ls-files', '-z', `--format=${LS_FILES_FORMAT}`];
}

export function classifyAttribute(eolInfo: string): TextAttribute {
  if (!eolInfo) return 'unspecified';
  return eolInfo.includes('-text') ? 'binary' : 'text';
}

/**
 * Parse NUL-separated `git ls-files --format` records. The attribute never
 * contains a space, so everything before the last space is the path.
 */
export function parseLsFilesOutput(output: string): FileCandidate[] {
  const files: FileCandidate[] = [];
  for (const record of output.split('\0')) {
    if (!record) continue;

    const sep = record.lastIndexOf(' ');
    const path = sep === -1 ? record : record.slice(0, sep);
    const eolInfo = sep === -1 ? '' : record.slice(sep + 1).trim();
    if (!path) continue;

    files.push({ path, eolInfo, textAttribute: classifyAttribute(eolInfo) });
  }
  return files;
}

export function* filterTextFiles(files: Iterable<FileCandidate>): Generator<FileCandidate> {
  for (const file of files) {
    if (file.textAttribute !== 'binary') yield file;
  }
}
