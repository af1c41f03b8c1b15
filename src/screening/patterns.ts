// Recognized test-execution commands, matched against the start of a command
// segment once shell keywords, assignments and wrappers are stripped.
export const TEST_RUNNERS: readonly RegExp[] = [
  /^(python[\d.]*\s+-m\s+)?pytest\b/,
  /^py\.test\b/,
  /^python[\d.]*\s+-m\s+(unittest|nose2?|tox|nox|django\s+test)\b/,
  /^python[\d.]*\s+(\S*\/)?(manage\.py\s+test|runtests\.py|setup\.py\s+test)\b/,
  /^(tox|nox|nosetests|nose2|trial|green|ward)\b/,
  /^(npm|pnpm|yarn|bun)\s+(run\s+)?(test|tests|test:\S+)\b/,
  /^(npx\s+|yarn\s+|pnpm\s+(exec\s+)?)?(jest|vitest|mocha|ava|tap|jasmine|karma|playwright\s+test|ts-mocha)\b/,
  /^node\s+--test\b/,
  /^(deno|bun)\s+test\b/,
  /^cargo\s+(test|nextest)\b/,
  /^go\s+test\b/,
  /^(mvn|mvnw)\b.*\b(test|verify)\b/,
  /^(gradle|gradlew)\b.*\b(test|check)\b/,
  /^(make|gmake)\b.*\b(test|tests|check)\b/,
  /^(ctest|meson\s+test|ninja\s+test)\b/,
  /^phpunit\b/,
  /^(bundle\s+exec\s+)?(rspec|rake\s+(test|spec))\b/,
  /^ruby\s+-I\S*\s+\S*test/,
  /^dotnet\s+test\b/,
  /^mix\s+test\b/,
  /^swift\s+test\b/,
  /^sbt\b.*\btest\b/,
  /^(bazel|bazelisk)\s+test\b/,
  /^stack\s+test\b|^cabal\s+test\b/,
  /^(busted|prove|bats|shellspec)\b/,
  /^zig\s+build\s+test\b/,
  /^(lein|clojure\s+-M:test)\b/,
];

// Commands that only read or compare text; a script made of these and
// control flow cannot exercise the behavior under test.
export const TEXT_INSPECTION = new Set([
  'grep', 'egrep', 'fgrep', 'rg', 'ag', 'cat', 'head', 'tail', 'less', 'more',
  'diff', 'cmp', 'comm', 'awk', 'gawk', 'sed', 'wc', 'sort', 'uniq', 'cut', 'tr',
  'find', 'ls', 'strings', 'md5sum', 'sha1sum', 'sha256sum', 'test', '[', '[[', 'stat', 'file',
]);

// Builtins and control flow that neither run tests nor inspect source.
export const TRIVIAL_COMMANDS = new Set([
  'echo', 'printf', 'exit', 'true', 'false', 'set', 'cd', 'export', 'unset', 'source', '.',
  'shopt', 'trap', 'return', 'local', 'declare', 'readonly', 'pushd', 'popd', 'sleep', ':',
  'fi', 'done', 'esac', 'then', 'else', 'do', '{', '}', '(', ')', 'exec',
]);

export const LEADING_KEYWORDS = new Set([
  'if', 'then', 'else', 'elif', 'do', 'while', 'until', '!', '{', '(', 'time', 'command',
]);

export const WRAPPERS = new Set(['env', 'exec', 'nice', 'nohup', 'stdbuf', 'xvfb-run', 'sudo', 'unbuffer']);
