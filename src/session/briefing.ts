import { renderChangeSet } from '../diff/parser.js';
import { truncate } from '../shared/text.js';
import type { SessionContext } from './types.js';

const TEST_DIFF_LIMIT = 3000;

/** The task description handed to the actor with every request. */
export function buildBriefing(context: SessionContext): string {
  const testDiff = renderChangeSet(context.testChanges);
  const shownDiff = testDiff.length > TEST_DIFF_LIMIT ? `${testDiff.slice(0, TEST_DIFF_LIMIT)}...` : testDiff;

  const lines = [
    'Write a bash script, evaluation.sh, that tells the buggy and fixed states of this repository apart.',
    '',
    `Repository:    ${context.repo}`,
    `Change:        ${context.changeId}${context.title ? `: ${context.title}` : ''}`,
    `Base revision: ${context.baseRevision}`,
    '',
  ];
  if (context.description) {
    lines.push('Description:', truncate(context.description, TEST_DIFF_LIMIT), '');
  }
  lines.push(
    'Test changes (already applied in the workspace):',
    '```diff',
    shownDiff.trimEnd(),
    '```',
    '',
    'Requirements for evaluation.sh:',
    '1. Exit 0 when the tests pass in the FIXED state.',
    '2. Exit non-zero when the tests fail in the BUGGY state.',
    '3. Run the real tests (pytest, npm test, go test, ...); checking file contents with grep is rejected.',
    '4. Be self-contained: install what the tests need, then run the specific tests.',
    '',
    'The repository starts in the BUGGY state. Explore briefly, find the test command, then submit.',
  );
  return lines.join('\n');
}
