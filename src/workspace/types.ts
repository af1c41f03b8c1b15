import type { ChangeSet } from '../diff/types.js';
import type { Logger } from '../shared/logger.js';

export type WorkspaceState = 'base' | 'buggy' | 'fixed';

export interface WorkspaceOptions {
  root: string;            // exclusive to this workspace; removed by dispose()
  source: string;          // clone URL or local repository path
  baseRevision: string;
  testChanges: ChangeSet;
  fixChanges: ChangeSet;
  cleanIgnored?: boolean;
  threeWayApply?: boolean;
  keep?: boolean;          // leave the root on disk after dispose()
  logger?: Logger;
}

export interface RunCommandOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  aborted: boolean;
  durationMs: number;
}
