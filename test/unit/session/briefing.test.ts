import { parseUnifiedDiff } from '../../../src/diff/parser.js';
import { buildBriefing } from '../../../src/session/briefing.js';
import type { SessionContext } from '../../../src/session/types.js';

function contextWith(testDiff: string, extra: Partial<SessionContext> = {}): SessionContext {
  return {
    repo: 'example/widgets',
    changeId: '42',
    baseRevision: 'abc123',
    testChanges: parseUnifiedDiff(testDiff),
    fixChanges: { files: [] },
    ignoredPaths: [],
    ...extra,
  };
}

const SMALL_DIFF = '--- a/tests/t.sh\n+++ b/tests/t.sh\n@@ -1 +1 @@\n-a\n+b\n';

describe('buildBriefing', () => {
  it('names the repository, change and base revision', () => {
    const lines = buildBriefing(contextWith(SMALL_DIFF, { title: 'Fix widgets' })).split('\n');
    expect(lines).toContain('Repository:    example/widgets');
    expect(lines).toContain('Change:        42: Fix widgets');
    expect(lines).toContain('Base revision: abc123');
  });

  it('shows the test diff in full when it is short', () => {
    expect(buildBriefing(contextWith(SMALL_DIFF))).toContain('```diff\n--- a/tests/t.sh\n+++ b/tests/t.sh\n@@ -1 +1 @@\n-a\n+b\n```');
  });

  it('cuts a long test diff at 3000 characters', () => {
    const body = Array.from({ length: 400 }, (_, i) => `+line ${String(i).padStart(4, '0')}`);
    const diff = `--- /dev/null\n+++ b/tests/big.sh\n@@ -0,0 +1,400 @@\n${body.join('\n')}\n`;
    const briefing = buildBriefing(contextWith(diff));
    expect(briefing).toContain(`${diff.slice(0, 3000)}...\n\`\`\``);
    expect(briefing).not.toContain('+line 0399');
  });

  it('includes the description only when there is one', () => {
    expect(buildBriefing(contextWith(SMALL_DIFF))).not.toContain('Description:');
    expect(buildBriefing(contextWith(SMALL_DIFF, { description: 'Widgets break on Tuesdays.' }))).toContain(
      'Description:\nWidgets break on Tuesdays.\n'
    );
  });
});
