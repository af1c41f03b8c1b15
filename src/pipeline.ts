import path from 'path';
import type { ArtifactSink, ChangeSource } from './collaborators.js';
import type { OracleConfig } from './config/schema.js';
import { policyFromConfig } from './diff/classifier.js';
import { splitDiff } from './diff/splitter.js';
import type { SplitResult } from './diff/types.js';
import { createRecord, instanceId } from './output/artifact.js';
import { screeningOptionsFromConfig } from './screening/screen.js';
import { OracleSession } from './session/oracle-session.js';
import type { ProposingActor, SessionContext, SessionResult } from './session/types.js';
import { describeError, isOracleError, OracleErrorCode } from './shared/errors.js';
import { childLogger, type Logger } from './shared/logger.js';
import { DifferentialValidator } from './validation/validator.js';
import { Workspace } from './workspace/workspace.js';

export interface OracleTask {
  repo: string;                 // owner/name
  changeId: string;
  /** Clone source; defaults to workspace.repositoryUrlTemplate with {repo} filled in. */
  source?: string;
}

export interface PipelineDeps {
  config: OracleConfig;
  changeSource: ChangeSource;
  actor: ProposingActor;
  sink?: ArtifactSink;
  logger?: Logger;
  signal?: AbortSignal;
}

export type OracleBuildResult =
  | { instanceId: string; status: 'accepted'; turns: number; location: string | null; session: SessionResult }
  | { instanceId: string; status: 'abandoned' | 'exhausted' | 'cancelled'; turns: number; session: SessionResult }
  | { instanceId: string; status: 'rejected-input'; reason: string };

export type BatchEntry =
  | OracleBuildResult
  | { instanceId: string; status: 'failed'; error: string; code?: string };

/** Runs one change end to end: fetch, split, workspace, session, sink. */
export async function buildOracle(task: OracleTask, deps: PipelineDeps): Promise<OracleBuildResult> {
  const { config } = deps;
  const id = instanceId(task.repo, task.changeId);
  const logger = childLogger('pipeline', deps.logger).child({ instanceId: id });

  const change = await deps.changeSource.fetchChange(task.repo, task.changeId);
  let split: SplitResult;
  try {
    split = splitDiff(change.diff, policyFromConfig(config.classification), logger);
  } catch (err) {
    if (isOracleError(err, OracleErrorCode.NO_TEST_CHANGES) || isOracleError(err, OracleErrorCode.NO_FIX_CHANGES)) {
      logger.warn({ code: err.code }, 'change cannot yield an oracle');
      return { instanceId: id, status: 'rejected-input', reason: err.message };
    }
    throw err;
  }

  const context: SessionContext = {
    repo: task.repo,
    changeId: task.changeId,
    baseRevision: change.baseRevision,
    title: change.title,
    description: change.description,
    testChanges: split.test,
    fixChanges: split.fix,
    ignoredPaths: split.ignoredPaths,
  };

  const workspace = await Workspace.create({
    root: path.join(config.workspace.root, id),
    source: task.source ?? config.workspace.repositoryUrlTemplate.replace('{repo}', task.repo),
    baseRevision: change.baseRevision,
    testChanges: split.test,
    fixChanges: split.fix,
    cleanIgnored: config.workspace.cleanIgnored,
    threeWayApply: config.workspace.threeWayApply,
    keep: config.workspace.keep,
    logger,
  });

  try {
    const validator = new DifferentialValidator(workspace, {
      timeoutMs: config.execution.oracleTimeoutMs,
      environmentFailureExitCodes: config.execution.environmentFailureExitCodes,
      outputLimits: config.execution.outputLimits,
      logger,
    });
    const session = new OracleSession({
      workspace,
      validator,
      actor: deps.actor,
      options: {
        maxTurns: config.session.maxTurns,
        commandTimeoutMs: config.execution.commandTimeoutMs,
        fixedTimeoutRetries: config.session.fixedTimeoutRetries,
        reminders: config.session.reminders,
        outputLimits: config.execution.outputLimits,
        screening: screeningOptionsFromConfig(config.screening),
      },
      logger,
    });

    const result = await session.run(context, { signal: deps.signal });
    if (result.status !== 'accepted') {
      logger.info({ status: result.status, turns: result.turns }, 'no oracle produced');
      return { instanceId: id, status: result.status, turns: result.turns, session: result };
    }

    let location: string | null = null;
    if (deps.sink) {
      const record = createRecord(result.artifact, context, { instanceId: id, turns: result.turns });
      location = await deps.sink.store(record);
    }
    return { instanceId: id, status: 'accepted', turns: result.turns, location, session: result };
  } finally {
    await workspace.dispose();
  }
}

/** Processes tasks one after another; a task that throws is recorded and the batch moves on. */
export async function buildOracles(tasks: OracleTask[], deps: PipelineDeps): Promise<BatchEntry[]> {
  const logger = childLogger('pipeline', deps.logger);
  const results: BatchEntry[] = [];

  for (const task of tasks) {
    if (deps.signal?.aborted) break;
    const id = instanceId(task.repo, task.changeId);
    try {
      results.push(await buildOracle(task, deps));
    } catch (err) {
      logger.error({ instanceId: id, error: describeError(err) }, 'task failed');
      results.push({
        instanceId: id,
        status: 'failed',
        error: describeError(err),
        code: isOracleError(err) ? err.code : undefined,
      });
    }
  }

  const accepted = results.filter(result => result.status === 'accepted').length;
  logger.info({ tasks: tasks.length, accepted }, 'batch finished');
  return results;
}
