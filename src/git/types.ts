export type TextAttribute = 'text' | 'binary' | 'unspecified';

export interface RepoLocation {
  workTree: string;   // Absolute path of the working tree
  gitDir: string;     // Metadata store, <workTree>/.git
}

export interface FileCandidate {
  readonly path: string;
  readonly textAttribute: TextAttribute;
  readonly eolInfo: string;   // Raw %(eolinfo:index) value, '' when git printed none
}
