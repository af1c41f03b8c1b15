import os from 'os';
import execa from 'execa';
import { OracleError, OracleErrorCode, describeError } from './errors.js';
import { logger } from './logger.js';

// Mirrors coreutils `timeout`, which shell users already read as "hung".
export const TIMEOUT_EXIT_CODE = 124;

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  signal?: string;
}

export interface ShellResult extends ExecResult {
  timedOut: boolean;
  aborted: boolean;
  durationMs: number;
}

export interface RunOptions {
  cwd?: string;
  env?: Record<string, string>;
  timeoutMs?: number;
  input?: string;
}

export interface ShellOptions {
  cwd: string;
  timeoutMs: number;
  env?: Record<string, string>;
  signal?: AbortSignal;
}

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(os.constants.signals));

export async function run(command: string, args: string[], options?: RunOptions): Promise<ExecResult> {
  try {
    const result = await execa(command, args, {
      cwd: options?.cwd,
      env: options?.env,
      timeout: options?.timeoutMs,
      input: options?.input,
      reject: false,
    });
    if (result.failed && typeof result.exitCode !== 'number' && !result.signal) {
      throw new OracleError(OracleErrorCode.ENVIRONMENT_FAILURE, `Command failed to spawn: ${command}`, {
        command: result.command,
      });
    }
    return {
      stdout: result.stdout ?? '',
      stderr: result.stderr ?? '',
      exitCode: signalledExitCode(result.exitCode, result.signal),
      signal: result.signal ?? undefined,
    };
  } catch (err) {
    if (err instanceof OracleError) throw err;
    throw new OracleError(OracleErrorCode.ENVIRONMENT_FAILURE, `Command failed to spawn: ${command}`, {
      cause: describeError(err),
    });
  }
}

export async function runOrThrow(command: string, args: string[], options?: RunOptions): Promise<ExecResult> {
  const result = await run(command, args, options);
  if (result.exitCode !== 0) {
    throw new OracleError(
      OracleErrorCode.GIT_ERROR,
      `Command exited with ${result.exitCode}: ${command} ${args.join(' ')}`,
      {
        stdout: result.stdout,
        stderr: result.stderr,
      }
    );
  }
  return result;
}

/**
 * Runs `bash -c <script>` as the leader of a fresh process group with stdin
 * closed. When bash exits, times out or the signal aborts, the whole group
 * is killed so no background process outlives the call.
 */
export async function runShell(script: string, options: ShellOptions): Promise<ShellResult> {
  const started = Date.now();
  const child = execa('bash', ['-c', script], {
    cwd: options.cwd,
    env: options.env,
    stdin: 'ignore',
    detached: true,
    stripFinalNewline: false,
    reject: false,
  });

  let timedOut = false;
  let aborted = false;
  const timer = setTimeout(() => {
    timedOut = true;
    killProcessGroup(child.pid);
  }, options.timeoutMs);
  const onAbort = (): void => {
    aborted = true;
    killProcessGroup(child.pid);
  };
  options.signal?.addEventListener('abort', onAbort, { once: true });
  if (options.signal?.aborted) onAbort();
  // Reap anything bash left running in the background; otherwise its open
  // stdout pipe would keep the call waiting until the timeout.
  child.on('exit', () => killProcessGroup(child.pid));

  try {
    const result = await child;
    if (result.failed && typeof result.exitCode !== 'number' && !result.signal) {
      throw new OracleError(OracleErrorCode.ENVIRONMENT_FAILURE, 'Command failed to spawn: bash', {
        command: result.command,
      });
    }
    return {
      stdout: result.stdout ?? '',
      stderr: result.stderr ?? '',
      // killed by us: timeout or abort
      exitCode: timedOut || aborted ? TIMEOUT_EXIT_CODE : signalledExitCode(result.exitCode, result.signal),
      signal: result.signal ?? undefined,
      timedOut,
      aborted,
      durationMs: Date.now() - started,
    };
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener('abort', onAbort);
  }
}

function signalledExitCode(exitCode: number | null | undefined, signal: string | null | undefined): number {
  if (typeof exitCode === 'number') return exitCode;
  if (signal) return 128 + (SIGNAL_NUMBERS.get(signal) ?? 0);
  return 1;
}

function killProcessGroup(pid: number | undefined): void {
  if (pid === undefined) return;
  try {
    process.kill(-pid, 'SIGKILL');
  } catch (err) {
    // ESRCH: the group is already gone.
    if ((err as NodeJS.ErrnoException).code !== 'ESRCH') {
      logger.warn({ pid, error: describeError(err) }, 'failed to kill process group');
    }
  }
}
