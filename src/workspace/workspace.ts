import fs from 'fs/promises';
import path from 'path';
import { renderChangeSet } from '../diff/parser.js';
import type { ChangeSet } from '../diff/types.js';
import { runShell } from '../shared/exec.js';
import { OracleError, OracleErrorCode } from '../shared/errors.js';
import { childLogger, type Logger } from '../shared/logger.js';
import { applyPatch, checkoutDetached, cloneRepository, resetHard, resolveRevision } from './git.js';
import type { CommandResult, RunCommandOptions, WorkspaceOptions, WorkspaceState } from './types.js';

const SCRIPT_NAME = 'evaluation.sh';

/**
 * One checkout of a repository at a fixed base revision.
 *
 * The instance owns the only record of which state (base, buggy, fixed) is on
 * disk. States are reached by resetting to the base commit and replaying the
 * ChangeSets in order; a patch is never reversed. Operations are exclusive:
 * starting one while another is in flight throws WORKSPACE_BUSY.
 */
export class Workspace {
  readonly root: string;
  readonly repoPath: string;
  readonly baseCommit: string;
  private readonly testChanges: ChangeSet;
  private readonly fixChanges: ChangeSet;
  private readonly cleanIgnored: boolean;
  private readonly threeWayApply: boolean;
  private readonly keep: boolean;
  private readonly logger: Logger;

  private currentState: WorkspaceState = 'base';
  // True only between a reset and the next operation that touches the tree.
  private pristine = true;
  private busyWith: string | null = null;
  private disposed = false;

  private constructor(options: WorkspaceOptions, repoPath: string, baseCommit: string, logger: Logger) {
    this.root = options.root;
    this.repoPath = repoPath;
    this.baseCommit = baseCommit;
    this.testChanges = options.testChanges;
    this.fixChanges = options.fixChanges;
    this.cleanIgnored = options.cleanIgnored ?? false;
    this.threeWayApply = options.threeWayApply ?? true;
    this.keep = options.keep ?? false;
    this.logger = logger;
  }

  static async create(options: WorkspaceOptions): Promise<Workspace> {
    const logger = childLogger('workspace', options.logger);
    const repoPath = path.join(options.root, 'repo');
    const existing = await fs.readdir(options.root).catch(() => []);
    if (existing.length > 0) {
      throw new OracleError(OracleErrorCode.GIT_ERROR, `Workspace root is not empty: ${options.root}`);
    }
    await fs.mkdir(options.root, { recursive: true });

    try {
      logger.info({ source: options.source, revision: options.baseRevision, root: options.root }, 'cloning repository');
      await cloneRepository(options.source, repoPath);
      const baseCommit = await resolveRevision(repoPath, options.baseRevision);
      await checkoutDetached(repoPath, baseCommit);
      const workspace = new Workspace(options, repoPath, baseCommit, logger);
      await workspace.exclusive('reset', () => workspace.doReset());
      return workspace;
    } catch (err) {
      if (!options.keep) await fs.rm(options.root, { recursive: true, force: true });
      throw err;
    }
  }

  get state(): WorkspaceState {
    return this.currentState;
  }

  get scriptPath(): string {
    return path.join(this.root, 'oracle', SCRIPT_NAME);
  }

  reset(): Promise<void> {
    return this.exclusive('reset', () => this.doReset());
  }

  applyTestChanges(): Promise<void> {
    return this.exclusive('applyTestChanges', () => this.doApplyTestChanges());
  }

  applyFixChanges(): Promise<void> {
    return this.exclusive('applyFixChanges', () => this.doApplyFixChanges());
  }

  /** Resets to base and replays the ChangeSets that `target` requires. */
  transitionTo(target: WorkspaceState): Promise<void> {
    return this.exclusive(`transitionTo(${target})`, async () => {
      await this.doReset();
      if (target === 'base') return;
      await this.doApplyTestChanges();
      if (target === 'fixed') await this.doApplyFixChanges();
    });
  }

  run(command: string, options: RunCommandOptions): Promise<CommandResult> {
    return this.exclusive('run', () => this.doRun(command, options));
  }

  /** Writes the script outside the checkout and runs it with bash from the repository root. */
  runScript(script: string, options: RunCommandOptions): Promise<CommandResult> {
    return this.exclusive('runScript', async () => {
      const scriptPath = this.scriptPath;
      await fs.mkdir(path.dirname(scriptPath), { recursive: true });
      await fs.writeFile(scriptPath, script, { encoding: 'utf-8', mode: 0o755 });
      return this.doRun(`bash ${shellQuote(scriptPath)}`, options);
    });
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    await this.exclusive('dispose', async () => {
      if (!this.keep) await fs.rm(this.root, { recursive: true, force: true });
    });
    this.disposed = true;
    this.logger.debug({ root: this.root, kept: this.keep }, 'workspace disposed');
  }

  private async exclusive<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    if (this.disposed) {
      throw new OracleError(OracleErrorCode.WORKSPACE_DISPOSED, `Workspace at ${this.root} has been disposed`);
    }
    if (this.busyWith !== null) {
      throw new OracleError(
        OracleErrorCode.WORKSPACE_BUSY,
        `Cannot ${operation} while ${this.busyWith} is in progress`
      );
    }
    this.busyWith = operation;
    try {
      return await fn();
    } finally {
      this.busyWith = null;
    }
  }

  private async doReset(): Promise<void> {
    await resetHard(this.repoPath, this.baseCommit, { ignored: this.cleanIgnored });
    this.currentState = 'base';
    this.pristine = true;
  }

  private async doApplyTestChanges(): Promise<void> {
    if (this.currentState !== 'base' || !this.pristine) {
      throw new OracleError(
        OracleErrorCode.INVALID_TRANSITION,
        `Test changes apply only to a freshly reset base (state is ${this.currentState})`
      );
    }
    await this.applyChanges(this.testChanges, 'test');
    this.currentState = 'buggy';
  }

  private async doApplyFixChanges(): Promise<void> {
    if (this.currentState !== 'buggy') {
      throw new OracleError(
        OracleErrorCode.INVALID_TRANSITION,
        `Fix changes apply only on top of the buggy state (state is ${this.currentState})`
      );
    }
    await this.applyChanges(this.fixChanges, 'fix');
    this.currentState = 'fixed';
  }

  private async applyChanges(changes: ChangeSet, label: 'test' | 'fix'): Promise<void> {
    this.pristine = false;
    const patch = renderChangeSet(changes);
    if (patch === '') {
      this.logger.debug({ changes: label }, 'empty change set, nothing to apply');
      return;
    }

    let result = await applyPatch(this.repoPath, patch);
    if (result.exitCode !== 0 && this.threeWayApply) {
      this.logger.debug({ changes: label, stderr: result.stderr }, 'git apply failed, retrying with --3way');
      result = await applyPatch(this.repoPath, patch, { threeWay: true });
    }
    if (result.exitCode !== 0) {
      // Never leave a half-applied patch behind an unrecorded state.
      await this.doReset();
      throw new OracleError(OracleErrorCode.PATCH_CONFLICT, `The ${label} changes do not apply cleanly`, {
        changes: label,
        stderr: result.stderr,
      });
    }
    this.logger.info({ changes: label, files: changes.files.length }, 'applied changes');
  }

  private async doRun(command: string, options: RunCommandOptions): Promise<CommandResult> {
    this.pristine = false;
    const result = await runShell(command, {
      cwd: this.repoPath,
      timeoutMs: options.timeoutMs,
      signal: options.signal,
    });
    if (result.timedOut) {
      this.logger.warn({ command: command.slice(0, 200), timeoutMs: options.timeoutMs }, 'command timed out');
    }
    return {
      exitCode: result.exitCode,
      stdout: result.stdout,
      stderr: result.stderr,
      timedOut: result.timedOut,
      aborted: result.aborted,
      durationMs: result.durationMs,
    };
  }
}

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}
