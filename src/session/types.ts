import type { ChangeSet } from '../diff/types.js';
import type { OracleArtifact } from '../output/types.js';
import type { ScreeningReason, ScreeningResult } from '../screening/screen.js';
import type { ValidationOutcome, ValidationStage, ValidationVerdict } from '../validation/types.js';
import type { WorkspaceState } from '../workspace/types.js';

export interface SessionContext {
  repo: string;
  changeId: string;
  baseRevision: string;
  title?: string;
  description?: string;
  testChanges: ChangeSet;
  fixChanges: ChangeSet;
  ignoredPaths: string[];
}

export type Feedback =
  | {
      kind: 'command-result';
      command: string;
      exitCode: number;
      timedOut: boolean;
      stdout: string;
      stderr: string;
    }
  | { kind: 'state-changed'; state: WorkspaceState }
  | { kind: 'screening-rejection'; reason: ScreeningReason; detail: string }
  | {
      kind: 'validation-rejection';
      outcome: ValidationOutcome;
      failedStage: ValidationStage | null;
      buggyExitCode: number;
      fixedExitCode: number | null;
      buggyOutput: string;
      fixedOutput: string | null;
    }
  | { kind: 'invalid-action'; message: string }
  | { kind: 'reminder'; message: string };

export interface ActorRequest {
  turn: number;
  maxTurns: number;
  briefing: string;
  workspaceState: WorkspaceState;
  feedback: Feedback[];   // everything that happened since the previous request
}

/**
 * The external actor that explores the workspace and proposes oracle
 * scripts. Its reply is validated against actorResponseSchema, so an
 * adapter may return whatever its transport produced; see ActorResponse.
 */
export interface ProposingActor {
  propose(request: ActorRequest): Promise<unknown>;
}

export interface Attempt {
  turn: number;
  script: string;
  screening: ScreeningResult;
  verdict: ValidationVerdict | null;   // null when screening rejected the script
  recordedAt: string;                  // ISO 8601
}

export type SessionResult =
  | { status: 'accepted'; artifact: OracleArtifact; verdict: ValidationVerdict; turns: number; attempts: Attempt[] }
  | { status: 'abandoned'; reason: string; turns: number; attempts: Attempt[] }
  | { status: 'exhausted'; turns: number; attempts: Attempt[]; lastVerdict: ValidationVerdict | null }
  | { status: 'cancelled'; turns: number; attempts: Attempt[] };
