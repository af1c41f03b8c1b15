import { changeSetPaths, renderChangeSet } from '../diff/parser.js';
import type { SessionContext } from '../session/types.js';
import type { ValidationVerdict } from '../validation/types.js';
import type { OracleArtifact, OracleRecord } from './types.js';

export function createArtifact(script: string, verdict: ValidationVerdict, context: SessionContext): OracleArtifact {
  if (!verdict.accepted || verdict.fixedExitCode === null) {
    throw new Error(`Only an accepted verdict yields an artifact (outcome: ${verdict.outcome})`);
  }
  return {
    oracleScript: script,
    testChangeSet: renderChangeSet(context.testChanges),
    fixChangeSet: renderChangeSet(context.fixChanges),
    buggyExitCode: verdict.buggyExitCode,
    fixedExitCode: verdict.fixedExitCode,
  };
}

export function createRecord(
  artifact: OracleArtifact,
  context: SessionContext,
  meta: { instanceId: string; turns: number; generatedAt?: Date }
): OracleRecord {
  return {
    ...artifact,
    instanceId: meta.instanceId,
    repo: context.repo,
    changeId: context.changeId,
    baseRevision: context.baseRevision,
    title: context.title,
    testFiles: changeSetPaths(context.testChanges),
    fixFiles: changeSetPaths(context.fixChanges),
    ignoredPaths: [...context.ignoredPaths],
    turns: meta.turns,
    generatedAt: (meta.generatedAt ?? new Date()).toISOString(),
  };
}

export function instanceId(repo: string, changeId: string | number): string {
  return `${repo.replace(/\//g, '-')}-${changeId}`;
}
