import { run, runOrThrow, type ExecResult } from '../shared/exec.js';
import { OracleError, OracleErrorCode, describeError } from '../shared/errors.js';

export async function cloneRepository(source: string, destination: string): Promise<void> {
  try {
    await runOrThrow('git', ['clone', '--quiet', '--no-checkout', source, destination]);
  } catch (err) {
    throw new OracleError(OracleErrorCode.GIT_ERROR, `Failed to clone ${source}`, {
      cause: describeError(err),
    });
  }
}

// Returns the full commit hash the revision names inside repoPath.
export async function resolveRevision(repoPath: string, revision: string): Promise<string> {
  const result = await run('git', ['rev-parse', '--verify', '--quiet', `${revision}^{commit}`], { cwd: repoPath });
  if (result.exitCode !== 0) {
    throw new OracleError(OracleErrorCode.GIT_ERROR, `Revision not found: ${revision}`);
  }
  return result.stdout.trim();
}

export async function checkoutDetached(repoPath: string, commit: string): Promise<void> {
  try {
    await runOrThrow('git', ['-c', 'advice.detachedHead=false', 'checkout', '--quiet', '--force', '--detach', commit], {
      cwd: repoPath,
    });
  } catch (err) {
    throw new OracleError(OracleErrorCode.GIT_ERROR, `Failed to check out ${commit}`, {
      cause: describeError(err),
    });
  }
}

// Discards tracked modifications and untracked files; with `ignored`, also
// the files .gitignore hides (installed dependencies, build output).
export async function resetHard(repoPath: string, commit: string, options?: { ignored?: boolean }): Promise<void> {
  try {
    await runOrThrow('git', ['reset', '--quiet', '--hard', commit], { cwd: repoPath });
    await runOrThrow('git', ['clean', '--quiet', options?.ignored ? '-fdx' : '-fd'], { cwd: repoPath });
  } catch (err) {
    throw new OracleError(OracleErrorCode.GIT_ERROR, `Failed to reset working tree to ${commit}`, {
      cause: describeError(err),
    });
  }
}

export async function applyPatch(
  repoPath: string,
  patch: string,
  options?: { threeWay?: boolean }
): Promise<ExecResult> {
  const args = ['apply', '--whitespace=nowarn'];
  if (options?.threeWay) args.push('--3way');
  args.push('-');
  return run('git', args, { cwd: repoPath, input: patch });
}
