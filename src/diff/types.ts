export type ChangeLabel = 'test' | 'fix' | 'ignore';
export type FileStatus = 'added' | 'deleted' | 'modified' | 'renamed';

export interface Hunk {
  header: string;     // the literal "@@ -a,b +c,d @@ ..." line
  oldStart: number;
  oldLines: number;
  newStart: number;
  newLines: number;
  added: number;
  removed: number;
}

export interface FileDiff {
  path: string;             // new path, or the old path for deletions
  oldPath: string | null;   // null for /dev/null
  newPath: string | null;
  status: FileStatus;
  binary: boolean;
  hunks: Hunk[];
  text: string;             // the file's section of the diff, headers included
}

export interface ChangeSet {
  readonly files: readonly FileDiff[];
}

export interface ClassificationPolicy {
  testPatterns: RegExp[];
  fixPatterns: RegExp[];
  ignorePatterns: RegExp[];
  // Earlier labels win when a path matches conventions of more than one label.
  precedence: ChangeLabel[];
  requireFixChanges: boolean;
}

export interface SplitResult {
  test: ChangeSet;
  fix: ChangeSet;
  ignoredPaths: string[];
}
