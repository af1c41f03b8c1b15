import { createArtifact } from '../output/artifact.js';
import { screenScript, type ScreeningOptions } from '../screening/screen.js';
import { describeError, isOracleError, OracleErrorCode } from '../shared/errors.js';
import { childLogger, type Logger } from '../shared/logger.js';
import { truncate } from '../shared/text.js';
import type { ValidationVerdict } from '../validation/types.js';
import type { DifferentialValidator } from '../validation/validator.js';
import type { Workspace } from '../workspace/workspace.js';
import { actorResponseSchema, type ActorResponse } from './actions.js';
import { AttemptTracker } from './attempts.js';
import { buildBriefing } from './briefing.js';
import { validationFeedback } from './feedback.js';
import type { Feedback, ProposingActor, SessionContext, SessionResult } from './types.js';

export interface SessionOptions {
  maxTurns: number;
  commandTimeoutMs: number;
  fixedTimeoutRetries: number;
  reminders: Array<{ turn: number; message: string }>;
  outputLimits: { stdout: number; stderr: number };
  screening?: ScreeningOptions;
}

export interface OracleSessionDeps {
  workspace: Workspace;
  validator: DifferentialValidator;
  actor: ProposingActor;
  options: SessionOptions;
  logger?: Logger;
}

type SubmissionOutcome =
  | { accepted: true; verdict: ValidationVerdict }
  | { accepted: false; verdict: ValidationVerdict | null; feedback: Feedback };

/**
 * Bounded loop between the proposing actor, the workspace and the validator.
 *
 * One actor reply is one turn. The actor explores a workspace held in the
 * buggy state, may switch it to fixed and back, and submits scripts; each
 * submission is screened, then validated, and any rejection comes back as
 * feedback on the next request. Running out of turns ends the session as
 * `exhausted`, which is an outcome, not an error. Only a ChangeSet that does
 * not apply escalates out of the loop.
 */
export class OracleSession {
  private readonly workspace: Workspace;
  private readonly validator: DifferentialValidator;
  private readonly actor: ProposingActor;
  private readonly options: SessionOptions;
  private readonly logger: Logger;

  constructor(deps: OracleSessionDeps) {
    this.workspace = deps.workspace;
    this.validator = deps.validator;
    this.actor = deps.actor;
    this.options = deps.options;
    this.logger = childLogger('session', deps.logger);
  }

  async run(context: SessionContext, options?: { signal?: AbortSignal }): Promise<SessionResult> {
    const signal = options?.signal;
    const { maxTurns } = this.options;
    const briefing = buildBriefing(context);
    const attempts = new AttemptTracker();
    let pending: Feedback[] = [];
    let lastVerdict: ValidationVerdict | null = null;
    let turn = 0;

    try {
      await this.workspace.transitionTo('buggy');

      while (turn < maxTurns) {
        if (signal?.aborted) return await this.cancel(turn, attempts);
        turn++;

        for (const reminder of this.options.reminders) {
          if (reminder.turn === turn) pending.push({ kind: 'reminder', message: reminder.message });
        }

        const raw = await this.actor.propose({
          turn,
          maxTurns,
          briefing,
          workspaceState: this.workspace.state,
          feedback: pending,
        });
        pending = [];

        const parsed = actorResponseSchema.safeParse(raw);
        if (!parsed.success) {
          const message = parsed.error.issues.map(issue => `${issue.path.join('.') || 'response'}: ${issue.message}`).join('; ');
          this.logger.warn({ turn, message }, 'actor returned an invalid response');
          pending.push({ kind: 'invalid-action', message });
          continue;
        }

        const action = parsed.data;
        this.logger.info({ turn, maxTurns, action: action.kind }, 'actor turn');
        switch (action.kind) {
          case 'abandon':
            this.logger.info({ turn, reason: action.reason }, 'actor abandoned the session');
            return { status: 'abandoned', reason: action.reason, turns: turn, attempts: attempts.getAll() };

          case 'command':
            pending.push(await this.explore(action, signal));
            break;

          case 'switch':
            await this.workspace.transitionTo(action.target);
            pending.push({ kind: 'state-changed', state: this.workspace.state });
            break;

          case 'submit': {
            const outcome = await this.submit(action.script, turn, attempts, signal);
            if (outcome.accepted) {
              this.logger.info({ turn, buggyExitCode: outcome.verdict.buggyExitCode }, 'discriminating oracle found');
              return {
                status: 'accepted',
                artifact: createArtifact(action.script, outcome.verdict, context),
                verdict: outcome.verdict,
                turns: turn,
                attempts: attempts.getAll(),
              };
            }
            lastVerdict = outcome.verdict ?? lastVerdict;
            pending.push(outcome.feedback);
            // Validation leaves the fixed state behind; exploration resumes from buggy.
            await this.workspace.transitionTo('buggy');
            break;
          }
        }
      }
    } catch (err) {
      if (signal?.aborted) return await this.cancel(turn, attempts);
      throw err;
    }

    this.logger.warn(
      {
        turns: turn,
        attempts: attempts.count(),
        screeningRejections: attempts.getScreeningRejections().length,
        outcomes: attempts.countByOutcome(),
        lastSubmittedTurn: attempts.getLatest()?.turn,
      },
      'turn budget exhausted'
    );
    return { status: 'exhausted', turns: turn, attempts: attempts.getAll(), lastVerdict };
  }

  private async explore(action: Extract<ActorResponse, { kind: 'command' }>, signal?: AbortSignal): Promise<Feedback> {
    const limits = this.options.outputLimits;
    const timeoutMs = Math.min(action.timeoutMs ?? this.options.commandTimeoutMs, this.options.commandTimeoutMs);
    this.logger.debug({ command: action.command.slice(0, 200) }, 'running exploration command');
    try {
      const result = await this.workspace.run(action.command, { timeoutMs, signal });
      signal?.throwIfAborted();
      return {
        kind: 'command-result',
        command: action.command,
        exitCode: result.exitCode,
        timedOut: result.timedOut,
        stdout: truncate(result.stdout, limits.stdout),
        stderr: truncate(result.stderr, limits.stderr),
      };
    } catch (err) {
      if (!isOracleError(err, OracleErrorCode.ENVIRONMENT_FAILURE)) throw err;
      return {
        kind: 'command-result',
        command: action.command,
        exitCode: 127,
        timedOut: false,
        stdout: '',
        stderr: describeError(err),
      };
    }
  }

  private async submit(
    script: string,
    turn: number,
    attempts: AttemptTracker,
    signal?: AbortSignal
  ): Promise<SubmissionOutcome> {
    const screening = screenScript(script, this.options.screening);
    if (!screening.accepted) {
      this.logger.warn({ turn, reason: screening.reason }, 'script rejected by screening');
      attempts.record({ turn, script, screening, verdict: null, recordedAt: new Date().toISOString() });
      return {
        accepted: false,
        verdict: null,
        feedback: { kind: 'screening-rejection', reason: screening.reason, detail: screening.detail },
      };
    }

    let verdict = await this.validator.validate(script, { signal });
    // A retry here is a visible decision of the loop, never part of validation itself.
    for (let retry = 1; retry <= this.options.fixedTimeoutRetries; retry++) {
      if (verdict.outcome !== 'timeout' || verdict.failedStage !== 'fixed') break;
      this.logger.warn({ turn, retry }, 'fixed-state run timed out, validating again');
      verdict = await this.validator.validate(script, { signal });
    }

    attempts.record({ turn, script, screening, verdict, recordedAt: new Date().toISOString() });
    if (verdict.accepted) return { accepted: true, verdict };
    return { accepted: false, verdict, feedback: validationFeedback(verdict) };
  }

  private async cancel(turns: number, attempts: AttemptTracker): Promise<SessionResult> {
    this.logger.warn({ turns }, 'session cancelled, resetting workspace');
    await this.workspace.reset();
    return { status: 'cancelled', turns, attempts: attempts.getAll() };
  }
}
