import type { ValidationVerdict } from '../validation/types.js';
import type { Feedback } from './types.js';

const EXPECTATION = 'The script must FAIL (non-zero exit) in the buggy state and PASS (exit 0) in the fixed state.';

const OUTCOME_HINTS: Record<ValidationVerdict['outcome'], string> = {
  'accepted': 'The script discriminates between the two states.',
  'both-pass': 'The script passes even without the fix, so it does not exercise the bug. Run the test that the test changes add.',
  'both-fail': 'The script fails even with the fix applied. Check that the test command is right and that dependencies install.',
  'inverted': 'The script passed without the fix but failed with it. This usually means the script is not deterministic.',
  'timeout': 'The script hit the time limit. Look for interactive prompts, watch modes or servers that never exit.',
  'environment-failure':
    'The script could not run: a command was not found or not executable (exit 126 or 127). These exit codes count as ' +
    'environment failures even in the buggy state, so a script that fails there only because a program added by the fix ' +
    'is missing is rejected too. Check for that program explicitly and exit 1 when it is absent.',
};

export function validationFeedback(verdict: ValidationVerdict): Extract<Feedback, { kind: 'validation-rejection' }> {
  return {
    kind: 'validation-rejection',
    outcome: verdict.outcome,
    failedStage: verdict.failedStage,
    buggyExitCode: verdict.buggyExitCode,
    fixedExitCode: verdict.fixedExitCode,
    buggyOutput: verdict.buggyRun.stdout + verdict.buggyRun.stderr,
    fixedOutput: verdict.fixedRun ? verdict.fixedRun.stdout + verdict.fixedRun.stderr : null,
  };
}

export function formatVerdictFeedback(verdict: ValidationVerdict): string {
  return formatFeedback(validationFeedback(verdict));
}

/** Renders one feedback item as the text a language-model actor reads. */
export function formatFeedback(feedback: Feedback): string {
  switch (feedback.kind) {
    case 'command-result': {
      const lines = [`Exit code: ${feedback.exitCode}${feedback.timedOut ? ' (timed out)' : ''}`];
      if (feedback.stdout) lines.push(`STDOUT:\n${feedback.stdout}`);
      if (feedback.stderr) lines.push(`STDERR:\n${feedback.stderr}`);
      return lines.join('\n');
    }
    case 'state-changed':
      return feedback.state === 'fixed'
        ? 'Switched to the FIXED state (test and fix changes applied).'
        : `Switched to the ${feedback.state.toUpperCase()} state${feedback.state === 'buggy' ? ' (only the test changes applied)' : ''}.`;
    case 'screening-rejection':
      return [
        `SCREENING FAILED (${feedback.reason}): ${feedback.detail}`,
        'evaluation.sh must execute the actual tests, not inspect files for expected strings. Revise it and submit again.',
      ].join('\n');
    case 'validation-rejection': {
      const lines = [
        `VALIDATION FAILED (${feedback.outcome}):`,
        `- Buggy state exit code: ${feedback.buggyExitCode} (expected non-zero)`,
        `- Fixed state exit code: ${feedback.fixedExitCode ?? 'not run'} (expected zero)`,
        EXPECTATION,
        OUTCOME_HINTS[feedback.outcome],
      ];
      if (feedback.buggyOutput) lines.push(`Buggy run output:\n${feedback.buggyOutput}`);
      if (feedback.fixedOutput) lines.push(`Fixed run output:\n${feedback.fixedOutput}`);
      lines.push('Revise evaluation.sh and submit it again.');
      return lines.join('\n');
    }
    case 'invalid-action':
      return `INVALID ACTION: ${feedback.message}`;
    case 'reminder':
      return feedback.message;
  }
}
