import { OracleError, OracleErrorCode, describeError, isOracleError } from '../shared/errors.js';
import { childLogger, type Logger } from '../shared/logger.js';
import { truncate } from '../shared/text.js';
import type { Workspace } from '../workspace/workspace.js';
import type { RunSummary, ValidationOutcome, ValidationStage, ValidationVerdict } from './types.js';

// 127: command not found, 126: found but not executable
const SPAWN_FAILURE_EXIT_CODE = 127;

export interface ValidatorOptions {
  timeoutMs: number;
  environmentFailureExitCodes: number[];
  outputLimits: { stdout: number; stderr: number };
  logger?: Logger;
}

interface StageRun {
  summary: RunSummary;
  environmentFailure: boolean;
}

/**
 * Runs a candidate oracle against the buggy state (test changes only) and
 * then the fixed state (test and fix changes) of a workspace, and accepts it
 * only when it fails the first and passes the second.
 *
 * One call is authoritative: nothing is retried here. A ChangeSet that no
 * longer applies is a SETUP_FAILURE, since it means the task itself is
 * inconsistent rather than the oracle.
 */
export class DifferentialValidator {
  private readonly logger: Logger;

  constructor(
    private readonly workspace: Workspace,
    private readonly options: ValidatorOptions
  ) {
    this.logger = childLogger('validator', options.logger);
  }

  async validate(script: string, options?: { signal?: AbortSignal }): Promise<ValidationVerdict> {
    const signal = options?.signal;

    await this.setup('test', async () => {
      await this.workspace.reset();
      await this.workspace.applyTestChanges();
    });
    const buggy = await this.execute(script, 'buggy', signal);
    if (buggy.summary.timedOut) return this.verdict('timeout', 'buggy', buggy.summary, null);
    if (buggy.environmentFailure) return this.verdict('environment-failure', 'buggy', buggy.summary, null);

    // No reset: the fix lands on top of the test changes already on disk.
    await this.setup('fix', () => this.workspace.applyFixChanges());
    const fixed = await this.execute(script, 'fixed', signal);
    if (fixed.summary.timedOut) return this.verdict('timeout', 'fixed', buggy.summary, fixed.summary);
    if (fixed.environmentFailure) return this.verdict('environment-failure', 'fixed', buggy.summary, fixed.summary);

    return this.verdict(
      classifyExitCodes(buggy.summary.exitCode, fixed.summary.exitCode),
      null,
      buggy.summary,
      fixed.summary
    );
  }

  private async setup(changes: 'test' | 'fix', fn: () => Promise<void>): Promise<void> {
    try {
      await fn();
    } catch (err) {
      if (isOracleError(err, OracleErrorCode.PATCH_CONFLICT)) {
        throw new OracleError(OracleErrorCode.SETUP_FAILURE, `Could not apply the ${changes} changes during validation`, {
          cause: err.message,
          ...err.context,
        });
      }
      throw err;
    }
  }

  private async execute(script: string, stage: ValidationStage, signal?: AbortSignal): Promise<StageRun> {
    const limits = this.options.outputLimits;
    try {
      const result = await this.workspace.runScript(script, { timeoutMs: this.options.timeoutMs, signal });
      signal?.throwIfAborted();
      this.logger.info({ stage, exitCode: result.exitCode, durationMs: result.durationMs }, 'oracle run finished');
      return {
        summary: {
          exitCode: result.exitCode,
          timedOut: result.timedOut,
          durationMs: result.durationMs,
          stdout: truncate(result.stdout, limits.stdout),
          stderr: truncate(result.stderr, limits.stderr),
        },
        environmentFailure: !result.timedOut && this.options.environmentFailureExitCodes.includes(result.exitCode),
      };
    } catch (err) {
      if (!isOracleError(err, OracleErrorCode.ENVIRONMENT_FAILURE)) throw err;
      this.logger.warn({ stage, error: describeError(err) }, 'oracle could not be started');
      return {
        summary: { exitCode: SPAWN_FAILURE_EXIT_CODE, timedOut: false, durationMs: 0, stdout: '', stderr: err.message },
        environmentFailure: true,
      };
    }
  }

  private verdict(
    outcome: ValidationOutcome,
    failedStage: ValidationStage | null,
    buggyRun: RunSummary,
    fixedRun: RunSummary | null
  ): ValidationVerdict {
    const verdict: ValidationVerdict = {
      buggyExitCode: buggyRun.exitCode,
      fixedExitCode: fixedRun?.exitCode ?? null,
      accepted: outcome === 'accepted',
      outcome,
      failedStage,
      buggyRun,
      fixedRun,
    };
    this.logger.info(
      { outcome, buggyExitCode: verdict.buggyExitCode, fixedExitCode: verdict.fixedExitCode },
      verdict.accepted ? 'oracle accepted' : 'oracle rejected'
    );
    return verdict;
  }
}

export function classifyExitCodes(buggyExitCode: number, fixedExitCode: number): ValidationOutcome {
  if (buggyExitCode !== 0 && fixedExitCode === 0) return 'accepted';
  if (buggyExitCode === 0 && fixedExitCode === 0) return 'both-pass';
  if (buggyExitCode !== 0) return 'both-fail';
  return 'inverted';
}
