import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { run, runOrThrow, runShell, TIMEOUT_EXIT_CODE } from '../../../src/shared/exec.js';
import { OracleErrorCode } from '../../../src/shared/errors.js';

describe('run', () => {
  it('returns the exit code instead of throwing', async () => {
    const result = await run('bash', ['-c', 'echo out; echo err >&2; exit 3']);
    expect(result.exitCode).toBe(3);
    expect(result.stdout).toBe('out');
    expect(result.stderr).toBe('err');
  });

  it('feeds input to stdin', async () => {
    const result = await run('cat', [], { input: 'from stdin' });
    expect(result.stdout).toBe('from stdin');
  });

  it('throws ENVIRONMENT_FAILURE when the command cannot be spawned', async () => {
    await expect(run('definitely-not-a-command-xyz', [])).rejects.toMatchObject({
      code: OracleErrorCode.ENVIRONMENT_FAILURE,
    });
  });
});

describe('runOrThrow', () => {
  it('throws with the captured output on a non-zero exit', async () => {
    await expect(runOrThrow('bash', ['-c', 'echo nope >&2; exit 1'])).rejects.toMatchObject({
      code: OracleErrorCode.GIT_ERROR,
      context: { stdout: '', stderr: 'nope' },
    });
  });
});

describe('runShell', () => {
  const cwd = os.tmpdir();

  it('runs the script through bash in the given directory', async () => {
    const result = await runShell('pwd; exit 2', { cwd, timeoutMs: 10_000 });
    expect(result.exitCode).toBe(2);
    expect(result.timedOut).toBe(false);
    expect(result.aborted).toBe(false);
  });

  it('kills the process group and reports 124 on timeout', async () => {
    const result = await runShell('sleep 30', { cwd, timeoutMs: 200 });
    expect(result.timedOut).toBe(true);
    expect(result.exitCode).toBe(TIMEOUT_EXIT_CODE);
    expect(result.durationMs).toBeLessThan(10_000);
  });

  it('kills background children of the script on timeout', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'exec-'));
    try {
      const result = await runShell('(sleep 1; touch marker) & sleep 30', { cwd: dir, timeoutMs: 200 });
      expect(result.timedOut).toBe(true);
      expect(result.exitCode).toBe(TIMEOUT_EXIT_CODE);

      await new Promise(resolve => setTimeout(resolve, 1_500));
      await expect(fs.access(path.join(dir, 'marker'))).rejects.toMatchObject({ code: 'ENOENT' });
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it('does not wait for background jobs left behind', async () => {
    const result = await runShell('sleep 30 & echo started', { cwd, timeoutMs: 20_000 });
    expect(result.exitCode).toBe(0);
    expect(result.timedOut).toBe(false);
    expect(result.stdout).toBe('started\n');
    expect(result.durationMs).toBeLessThan(10_000);
  });

  it('stops when the signal aborts and reports 124', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 100);
    const result = await runShell('sleep 30', { cwd, timeoutMs: 20_000, signal: controller.signal });
    expect(result.aborted).toBe(true);
    expect(result.timedOut).toBe(false);
    expect(result.exitCode).toBe(TIMEOUT_EXIT_CODE);
  });

  it('gives the script no stdin', async () => {
    const result = await runShell('read -r line; echo "status $?"', { cwd, timeoutMs: 10_000 });
    expect(result.stdout).toBe('status 1\n');
  });
});
