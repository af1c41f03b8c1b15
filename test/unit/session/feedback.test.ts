import { formatFeedback, formatVerdictFeedback, validationFeedback } from '../../../src/session/feedback.js';
import type { ValidationVerdict } from '../../../src/validation/types.js';

const bothPass: ValidationVerdict = {
  buggyExitCode: 0,
  fixedExitCode: 0,
  accepted: false,
  outcome: 'both-pass',
  failedStage: null,
  buggyRun: { exitCode: 0, timedOut: false, durationMs: 10, stdout: 'ok\n', stderr: 'warn\n' },
  fixedRun: { exitCode: 0, timedOut: false, durationMs: 12, stdout: 'ok\n', stderr: '' },
};

describe('validationFeedback', () => {
  it('carries both exit codes and the combined output of each run', () => {
    expect(validationFeedback(bothPass)).toEqual({
      kind: 'validation-rejection',
      outcome: 'both-pass',
      failedStage: null,
      buggyExitCode: 0,
      fixedExitCode: 0,
      buggyOutput: 'ok\nwarn\n',
      fixedOutput: 'ok\n',
    });
  });

  it('leaves the fixed output null when the fixed state never ran', () => {
    const timedOut: ValidationVerdict = { ...bothPass, outcome: 'timeout', failedStage: 'buggy', buggyExitCode: 124, fixedExitCode: null, fixedRun: null };
    expect(validationFeedback(timedOut).fixedOutput).toBeNull();
  });
});

describe('formatFeedback', () => {
  it('formats a command result', () => {
    expect(formatFeedback({ kind: 'command-result', command: 'ls', exitCode: 124, timedOut: true, stdout: 'a\n', stderr: '' })).toBe(
      'Exit code: 124 (timed out)\nSTDOUT:\na\n'
    );
  });

  it('states both exit codes against their expectation', () => {
    const text = formatFeedback(validationFeedback({ ...bothPass, fixedExitCode: null, fixedRun: null, outcome: 'timeout', failedStage: 'buggy' }));
    const lines = text.split('\n');
    expect(lines[0]).toBe('VALIDATION FAILED (timeout):');
    expect(lines[1]).toBe('- Buggy state exit code: 0 (expected non-zero)');
    expect(lines[2]).toBe('- Fixed state exit code: not run (expected zero)');
    expect(lines[lines.length - 1]).toBe('Revise evaluation.sh and submit it again.');
  });

  it('explains that 126 and 127 are environment failures even in the buggy state', () => {
    const text = formatVerdictFeedback({
      ...bothPass,
      buggyExitCode: 127,
      fixedExitCode: null,
      fixedRun: null,
      outcome: 'environment-failure',
      failedStage: 'buggy',
    });
    expect(text.split('\n')[4]).toBe(
      'The script could not run: a command was not found or not executable (exit 126 or 127). These exit codes count as ' +
        'environment failures even in the buggy state, so a script that fails there only because a program added by the fix ' +
        'is missing is rejected too. Check for that program explicitly and exit 1 when it is absent.'
    );
  });

  it('formats screening rejections, invalid actions, reminders and state changes', () => {
    expect(formatFeedback({ kind: 'screening-rejection', reason: 'empty', detail: 'Nothing runs.' }).split('\n')[0]).toBe(
      'SCREENING FAILED (empty): Nothing runs.'
    );
    expect(formatFeedback({ kind: 'invalid-action', message: 'kind: Required' })).toBe('INVALID ACTION: kind: Required');
    expect(formatFeedback({ kind: 'reminder', message: 'Submit now.' })).toBe('Submit now.');
    expect(formatFeedback({ kind: 'state-changed', state: 'buggy' })).toBe('Switched to the BUGGY state (only the test changes applied).');
    expect(formatFeedback({ kind: 'state-changed', state: 'fixed' })).toBe('Switched to the FIXED state (test and fix changes applied).');
  });
});

describe('formatVerdictFeedback', () => {
  it('quotes both literal exit codes', () => {
    const text = formatVerdictFeedback({ ...bothPass, buggyExitCode: 2, fixedExitCode: 3, outcome: 'both-fail' });
    expect(text.split('\n').slice(0, 3)).toEqual([
      'VALIDATION FAILED (both-fail):',
      '- Buggy state exit code: 2 (expected non-zero)',
      '- Fixed state exit code: 3 (expected zero)',
    ]);
  });
});
