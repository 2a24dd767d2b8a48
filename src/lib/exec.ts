import { spawn, spawnSync, type ChildProcess } from 'node:child_process';

import type { Logger } from '../core/types.js';

export interface RunShellOptions {
  cwd?: string;
  /** Seconds to wait for the command; 0 waits just long enough for trivial commands. */
  timeout?: number;
  /** Returned instead of stdout on timeout or non-zero exit. */
  fallback?: string;
  /** Return stdout even when the command exits with a non-zero code. */
  allowErrorCodes?: boolean;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
}

export interface ShellOutcome {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  timedOut: boolean;
}

// Processes whose timeout expired but which are still running.
const abandoned = new Set<ChildProcess>();

function timeoutMilliseconds(timeout: number | undefined): number {
  const seconds = timeout ?? 0;
  return seconds <= 0 ? 100 : seconds * 1000;
}

/**
 * Spawns `command` in a shell and waits for it to exit or for the timeout to expire.
 * An expired process is left running and tracked until it exits or
 * `terminateRunningProcesses()` is called.
 */
export function spawnShell(command: string, options: RunShellOptions = {}): Promise<ShellOutcome> {
  return new Promise<ShellOutcome>((resolve) => {
    const child = spawn(command, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      shell: true,
      detached: true,
    });
    let stdoutBuf = '';
    let stderrBuf = '';
    let settled = false;

    const settle = (outcome: ShellOutcome) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve(outcome);
    };

    child.stdout?.on('data', (data: Buffer) => {
      stdoutBuf += data.toString();
    });
    child.stderr?.on('data', (data: Buffer) => {
      stderrBuf += data.toString();
    });
    child.on('error', (error) => {
      settle({ stdout: '', stderr: error.message, exitCode: null, timedOut: false });
    });
    child.on('close', (code) => {
      abandoned.delete(child);
      settle({ stdout: stdoutBuf, stderr: stderrBuf, exitCode: code, timedOut: false });
    });

    const timer = setTimeout(() => {
      if (settled) return;
      abandoned.add(child);
      child.unref();
      child.stdout?.destroy();
      child.stderr?.destroy();
      settle({ stdout: stdoutBuf, stderr: stderrBuf, exitCode: null, timedOut: true });
    }, timeoutMilliseconds(options.timeout));
  });
}

function report(command: string, outcome: ShellOutcome, options: RunShellOptions): string {
  const fallback = options.fallback ?? '';
  const { logger } = options;

  if (outcome.timedOut) {
    logger?.warn(
      { command, timeout: options.timeout ?? 0 },
      `The command "${command}" used more than ${options.timeout ?? 0} seconds in order to finish. ` +
        'The exit code can not be verified. This might be intentional for background processes and daemons.',
    );
    return fallback;
  }

  for (const line of outcome.stderr.split('\n')) {
    if (line.trim()) logger?.error({ command }, line);
  }

  if (outcome.exitCode !== 0 && !options.allowErrorCodes) {
    logger?.error(
      { command, exitCode: outcome.exitCode },
      `Command "${command}" exited with non-zero return code: ${String(outcome.exitCode)}`,
    );
    return fallback;
  }

  const stdout = outcome.stdout.trim();
  if (stdout) logger?.info({ command }, stdout);
  return stdout;
}

/**
 * Returns the trimmed standard output of a shell command, or `fallback` on
 * timeout and non-zero exit. Never throws.
 */
export async function runShell(command: string, options: RunShellOptions = {}): Promise<string> {
  const outcome = await spawnShell(command, options);
  return report(command, outcome, options);
}

export function spawnShellSync(command: string, options: RunShellOptions = {}): ShellOutcome {
  const result = spawnSync(command, {
    cwd: options.cwd,
    env: options.env ?? process.env,
    shell: true,
    encoding: 'utf8',
    timeout: timeoutMilliseconds(options.timeout),
  });
  const timedOut =
    result.error !== undefined && 'code' in result.error && result.error.code === 'ETIMEDOUT';
  return {
    stdout: result.stdout || '',
    stderr: result.stderr || (result.error && !timedOut ? result.error.message : ''),
    exitCode: result.status,
    timedOut,
  };
}

/**
 * Synchronous variant of `runShell`, used where the caller cannot await
 * (template helpers, configuration preprocessing, requirement checks).
 */
export function runShellSync(command: string, options: RunShellOptions = {}): string {
  return report(command, spawnShellSync(command, options), options);
}

export function runningProcessCount(): number {
  return abandoned.size;
}

export function terminateRunningProcesses(logger?: Logger): void {
  for (const child of abandoned) {
    abandoned.delete(child);
    if (child.pid === undefined || child.exitCode !== null) continue;
    try {
      // Negative pid addresses the whole process group started by the shell.
      process.kill(-child.pid, 'SIGTERM');
      logger?.info({ pid: child.pid }, 'Terminated process left running by a timed out command');
    } catch (error) {
      logger?.debug({ pid: child.pid, error }, 'Process already exited');
    }
  }
}
