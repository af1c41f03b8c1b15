import { parseUnifiedDiff } from '../../../src/diff/parser.js';
import { createArtifact, createRecord, instanceId } from '../../../src/output/artifact.js';
import type { SessionContext } from '../../../src/session/types.js';
import type { ValidationVerdict } from '../../../src/validation/types.js';

const TEST_DIFF = '--- a/tests/t.sh\n+++ b/tests/t.sh\n@@ -1 +1 @@\n-a\n+b\n';
const FIX_DIFF = '--- a/src/s.sh\n+++ b/src/s.sh\n@@ -1 +1 @@\n-x\n+y\n';

const context: SessionContext = {
  repo: 'example/widgets',
  changeId: '42',
  baseRevision: 'abc123',
  title: 'Fix widgets',
  testChanges: parseUnifiedDiff(TEST_DIFF),
  fixChanges: parseUnifiedDiff(FIX_DIFF),
  ignoredPaths: ['NEWS'],
};

const run = { exitCode: 0, timedOut: false, durationMs: 1, stdout: '', stderr: '' };
const accepted: ValidationVerdict = {
  buggyExitCode: 2,
  fixedExitCode: 0,
  accepted: true,
  outcome: 'accepted',
  failedStage: null,
  buggyRun: { ...run, exitCode: 2 },
  fixedRun: run,
};

describe('createArtifact', () => {
  it('packages the script with both change sets and exit codes', () => {
    expect(createArtifact('bash tests/t.sh', accepted, context)).toEqual({
      oracleScript: 'bash tests/t.sh',
      testChangeSet: TEST_DIFF,
      fixChangeSet: FIX_DIFF,
      buggyExitCode: 2,
      fixedExitCode: 0,
    });
  });

  it('refuses a verdict that was not accepted', () => {
    const rejected: ValidationVerdict = { ...accepted, accepted: false, outcome: 'both-fail', fixedExitCode: 1 };
    expect(() => createArtifact('x', rejected, context)).toThrow('Only an accepted verdict yields an artifact (outcome: both-fail)');
  });
});

describe('createRecord', () => {
  it('adds the task identity and the file lists', () => {
    const artifact = createArtifact('bash tests/t.sh', accepted, context);
    const record = createRecord(artifact, context, {
      instanceId: 'example-widgets-42',
      turns: 6,
      generatedAt: new Date('2024-05-01T12:00:00Z'),
    });
    expect(record).toEqual({
      ...artifact,
      instanceId: 'example-widgets-42',
      repo: 'example/widgets',
      changeId: '42',
      baseRevision: 'abc123',
      title: 'Fix widgets',
      testFiles: ['tests/t.sh'],
      fixFiles: ['src/s.sh'],
      ignoredPaths: ['NEWS'],
      turns: 6,
      generatedAt: '2024-05-01T12:00:00.000Z',
    });
  });
});

describe('instanceId', () => {
  it('joins owner, name and change id with dashes', () => {
    expect(instanceId('example/widgets', '42')).toBe('example-widgets-42');
    expect(instanceId('example/widgets', 7)).toBe('example-widgets-7');
  });
});
