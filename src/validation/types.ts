export type ValidationOutcome =
  | 'accepted'
  | 'both-pass'            // the oracle never observes the bug
  | 'both-fail'            // the fix does not make the oracle pass, or the oracle is broken
  | 'inverted'             // passed buggy, failed fixed: most likely a non-deterministic oracle
  | 'timeout'
  | 'environment-failure'; // the script could not run at all

export type ValidationStage = 'buggy' | 'fixed';

export interface RunSummary {
  exitCode: number;
  timedOut: boolean;
  durationMs: number;
  stdout: string;   // truncated
  stderr: string;   // truncated
}

export interface ValidationVerdict {
  buggyExitCode: number;
  fixedExitCode: number | null;  // null when the fixed run was skipped
  accepted: boolean;
  outcome: ValidationOutcome;
  failedStage: ValidationStage | null;
  buggyRun: RunSummary;
  fixedRun: RunSummary | null;
}
