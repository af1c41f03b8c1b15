import { OracleError, OracleErrorCode } from '../shared/errors.js';
import type { ChangeSet, FileDiff, FileStatus, Hunk } from './types.js';

const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;
const GIT_HEADER = /^diff --git "?a\/(.+?)"? "?b\/(.+?)"?$/;

interface Section {
  start: number;
  git: boolean;
  gitOld: string | null;
  gitNew: string | null;
  headerOld?: string | null;
  headerNew?: string | null;
  renameFrom?: string;
  renameTo?: string;
  created: boolean;
  deleted: boolean;
  binary: boolean;
  hunks: Hunk[];
}

/**
 * Parses git-style and plain unified diffs into a ChangeSet.
 *
 * Hunk bodies are consumed by the line counts in their `@@` header, so a
 * removed line that happens to read `--- foo` is never taken for a new file
 * header. Text before the first file section (a commit message, say) and
 * trailing text after a file's last hunk are dropped.
 */
export function parseUnifiedDiff(text: string): ChangeSet {
  const lines = text.split('\n');
  const count = text.endsWith('\n') ? lines.length - 1 : lines.length;
  const files: FileDiff[] = [];
  let current: Section | null = null;

  const close = (end: number): void => {
    if (current) files.push(finishSection(current, lines.slice(current.start, end)));
    current = null;
  };

  let i = 0;
  while (i < count) {
    const line = lines[i];
    const bare = line.replace(/\r$/, '');

    if (bare.startsWith('diff --git ')) {
      close(i);
      const match = bare.match(GIT_HEADER);
      current = newSection(i, true, match?.[1] ?? null, match?.[2] ?? null);
      i++;
      continue;
    }

    if (bare.startsWith('--- ') && i + 1 < count && lines[i + 1].startsWith('+++ ')) {
      // Inside a git section these are its file headers; anywhere else they open a plain section.
      let target: Section;
      if (current !== null && current.git && current.headerOld === undefined && current.hunks.length === 0) {
        target = current;
      } else {
        close(i);
        target = newSection(i, false, null, null);
        current = target;
      }
      target.headerOld = headerPath(bare.slice(4));
      target.headerNew = headerPath(lines[i + 1].replace(/\r$/, '').slice(4));
      i += 2;
      continue;
    }

    if (bare.startsWith('@@')) {
      if (current === null) {
        throw new OracleError(OracleErrorCode.INVALID_DIFF, `Hunk outside of a file section at line ${i + 1}`);
      }
      const section: Section = current;
      const { hunk, next } = readHunk(lines, count, i);
      section.hunks.push(hunk);
      i = next;
      continue;
    }

    if (current !== null) {
      const section: Section = current;
      if (section.git && section.hunks.length === 0 && section.headerOld === undefined) {
        readExtendedHeader(section, bare);
      } else if (bare.startsWith('Binary files ') || bare === 'GIT binary patch') {
        section.binary = true;
      } else if (!section.binary) {
        // Trailing text after the last hunk is not part of the file's diff.
        close(i);
      }
    }
    i++;
  }
  close(count);

  return { files };
}

export function renderChangeSet(changeSet: ChangeSet): string {
  return changeSet.files.map(file => file.text).join('');
}

export function changeSetPaths(changeSet: ChangeSet): string[] {
  return changeSet.files.map(file => file.path);
}

function newSection(start: number, git: boolean, gitOld: string | null, gitNew: string | null): Section {
  return { start, git, gitOld, gitNew, created: false, deleted: false, binary: false, hunks: [] };
}

function readExtendedHeader(section: Section, line: string): void {
  if (line.startsWith('new file mode')) section.created = true;
  else if (line.startsWith('deleted file mode')) section.deleted = true;
  else if (line.startsWith('rename from ')) section.renameFrom = unquote(line.slice('rename from '.length));
  else if (line.startsWith('rename to ')) section.renameTo = unquote(line.slice('rename to '.length));
  else if (line.startsWith('Binary files ') || line === 'GIT binary patch') section.binary = true;
}

function readHunk(lines: string[], count: number, at: number): { hunk: Hunk; next: number } {
  const header = lines[at].replace(/\r$/, '');
  const match = header.match(HUNK_HEADER);
  if (!match) {
    throw new OracleError(OracleErrorCode.INVALID_DIFF, `Malformed hunk header at line ${at + 1}: ${header}`);
  }
  const hunk: Hunk = {
    header,
    oldStart: Number(match[1]),
    oldLines: match[2] === undefined ? 1 : Number(match[2]),
    newStart: Number(match[3]),
    newLines: match[4] === undefined ? 1 : Number(match[4]),
    added: 0,
    removed: 0,
  };

  let oldLeft = hunk.oldLines;
  let newLeft = hunk.newLines;
  let j = at + 1;
  while (oldLeft > 0 || newLeft > 0) {
    if (j >= count) {
      throw new OracleError(OracleErrorCode.INVALID_DIFF, `Truncated hunk starting at line ${at + 1}: ${header}`);
    }
    const body = lines[j];
    const marker = body.charAt(0);
    if (marker === ' ' || body === '' || body === '\r') {
      oldLeft--;
      newLeft--;
    } else if (marker === '-') {
      oldLeft--;
      hunk.removed++;
    } else if (marker === '+') {
      newLeft--;
      hunk.added++;
    } else if (marker !== '\\') {
      throw new OracleError(OracleErrorCode.INVALID_DIFF, `Unexpected line ${j + 1} inside hunk: ${body}`);
    }
    if (oldLeft < 0 || newLeft < 0) {
      throw new OracleError(OracleErrorCode.INVALID_DIFF, `Hunk at line ${at + 1} does not match its header counts`);
    }
    j++;
  }
  // "\ No newline at end of file" after the last body line
  if (j < count && lines[j].startsWith('\\')) j++;

  return { hunk, next: j };
}

function finishSection(section: Section, body: string[]): FileDiff {
  let oldPath = section.headerOld !== undefined ? section.headerOld : section.renameFrom ?? section.gitOld;
  let newPath = section.headerNew !== undefined ? section.headerNew : section.renameTo ?? section.gitNew;
  if (section.created) oldPath = null;
  if (section.deleted) newPath = null;

  const filePath = newPath ?? oldPath;
  if (filePath === null) {
    throw new OracleError(OracleErrorCode.INVALID_DIFF, `File section at line ${section.start + 1} names no path`);
  }

  let status: FileStatus = 'modified';
  if (oldPath === null) status = 'added';
  else if (newPath === null) status = 'deleted';
  else if (oldPath !== newPath) status = 'renamed';

  return {
    path: filePath,
    oldPath,
    newPath,
    status,
    binary: section.binary,
    hunks: section.hunks,
    text: body.join('\n') + '\n',
  };
}

function headerPath(raw: string): string | null {
  // Drop the optional tab-separated timestamp that plain diff(1) appends.
  const name = unquote(raw.split('\t')[0].trimEnd());
  if (name === '/dev/null') return null;
  return name.replace(/^[ab]\//, '');
}

function unquote(name: string): string {
  return name.length >= 2 && name.startsWith('"') && name.endsWith('"') ? name.slice(1, -1) : name;
}
