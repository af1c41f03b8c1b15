import { OracleError, OracleErrorCode } from '../shared/errors.js';
import { logger as rootLogger, type Logger } from '../shared/logger.js';
import { classifyPath } from './classifier.js';
import { parseUnifiedDiff } from './parser.js';
import type { ChangeSet, ClassificationPolicy, FileDiff, SplitResult } from './types.js';

/**
 * Partitions a ChangeSet into test and fix ChangeSets by file path.
 *
 * Relative order is preserved within each set, the two sets never share a
 * path, and together with `ignoredPaths` they cover every input file.
 * Throws NO_TEST_CHANGES when no file is classified as a test, and
 * NO_FIX_CHANGES when the policy requires fix changes and there are none.
 */
export function splitChangeSet(
  changeSet: ChangeSet,
  policy: ClassificationPolicy,
  logger: Logger = rootLogger
): SplitResult {
  const test: FileDiff[] = [];
  const fix: FileDiff[] = [];
  const ignoredPaths: string[] = [];

  for (const file of changeSet.files) {
    const label = classifyPath(file.path, policy);
    logger.debug({ path: file.path, label }, 'classified changed file');
    if (label === 'test') test.push(file);
    else if (label === 'fix') fix.push(file);
    else ignoredPaths.push(file.path);
  }

  if (test.length === 0) {
    throw new OracleError(OracleErrorCode.NO_TEST_CHANGES, 'Change has no test component; an oracle cannot discriminate without new or modified tests', {
      paths: changeSet.files.map(file => file.path),
    });
  }
  if (fix.length === 0 && policy.requireFixChanges) {
    throw new OracleError(OracleErrorCode.NO_FIX_CHANGES, 'Change has no source fix component', {
      paths: changeSet.files.map(file => file.path),
    });
  }

  logger.info(
    { testFiles: test.length, fixFiles: fix.length, ignored: ignoredPaths.length },
    'split change into test and fix changes'
  );
  return { test: { files: test }, fix: { files: fix }, ignoredPaths };
}

export function splitDiff(diffText: string, policy: ClassificationPolicy, logger?: Logger): SplitResult {
  return splitChangeSet(parseUnifiedDiff(diffText), policy, logger);
}
