import { classifyPath, matchingLabels, policyFromConfig } from '../../../src/diff/classifier.js';
import { DEFAULT_CONFIG } from '../../../src/config/schema.js';

describe('classifyPath', () => {
  const policy = policyFromConfig(DEFAULT_CONFIG.classification);

  it.each([
    ['tests/test_url.py', 'test'],
    ['pkg/url/url_test.go', 'test'],
    ['src/__tests__/url.spec.ts', 'test'],
    ['lib/url.test.js', 'test'],
    ['conftest.py', 'test'],
    ['src/main/java/UrlTest.java', 'test'],
    ['pkg/parser/testdata/input.golden', 'test'],
    ['lib/fixtures/urls.json', 'test'],
    ['app/tests.py', 'test'],
    ['src/url.py', 'fix'],
    ['setup.py', 'fix'],
    ['CHANGELOG.md', 'ignore'],
    ['docs/usage.rst', 'ignore'],
    ['.github/workflows/ci.yml', 'ignore'],
  ])('classifies %s as %s', (filePath, label) => {
    expect(classifyPath(filePath, policy)).toBe(label);
  });

  it('recognizes capitalized test directories', () => {
    expect(classifyPath('Tests/TestUrl.cs', policy)).toBe('test');
    expect(classifyPath('Docs/Usage.txt', policy)).toBe('ignore');
  });

  it.each([
    'src/main/java/com/acme/Latest.java',
    'lib/Contest.kt',
    'src/Attest.php',
    'src/contests.py',
  ])('keeps %s, whose name merely ends in "test", with the fix', filePath => {
    expect(matchingLabels(filePath, policy)).toEqual(['fix']);
    expect(classifyPath(filePath, policy)).toBe('fix');
  });

  it('lets precedence decide between overlapping conventions', () => {
    // a markdown file inside a test directory matches both test and ignore
    expect(matchingLabels('tests/README.md', policy)).toEqual(['test', 'ignore']);
    expect(classifyPath('tests/README.md', policy)).toBe('test');

    const ignoreFirst = policyFromConfig({ ...DEFAULT_CONFIG.classification, precedence: ['ignore', 'test', 'fix'] });
    expect(classifyPath('tests/README.md', ignoreFirst)).toBe('ignore');
  });

  it('treats a path no convention matches as part of the fix', () => {
    expect(matchingLabels('Makefile', policy)).toEqual([]);
    expect(classifyPath('Makefile', policy)).toBe('fix');
  });
});
