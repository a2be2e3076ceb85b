/**
 * @module step-executor
 * Runs one bound command as a child process and captures its output.
 *
 * Children are spawned `detached` so each leads its own process group; a
 * timeout or cancellation sends SIGKILL to the whole group. The executor
 * always waits for `close` so that no pipe outlives the step; if the pipes
 * stay open after a kill (a grandchild escaped the group) they are
 * destroyed once the grace period elapses.
 */

import { spawn as nodeSpawn } from 'node:child_process';
import type { ChildProcess, SpawnOptions } from 'node:child_process';
import { errorMessage, systemErrorCode } from './errors.js';
import type { StepFailure } from './types.js';

/** A command with every template resolved, ready to spawn */
export interface BoundCommand {
  file: string;
  args: string[];
  /** Human-readable command line used in results */
  display: string;
  cwd: string;
  env: Record<string, string>;
  input?: string;
}

export type SpawnFn = (file: string, args: readonly string[], options: SpawnOptions) => ChildProcess;

export interface ExecuteOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  spawn?: SpawnFn;
  /** Time to wait for `close` after a kill or exit before destroying the pipes */
  killGraceMs?: number;
}

export interface ExecutionOutcome {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  pid?: number;
  durationMs: number;
  failure?: StepFailure;
  /** Non-fatal problems seen while running (e.g. stdin closed early) */
  notes: string[];
}

const DEFAULT_KILL_GRACE_MS = 2000;
const RESOURCE_CODES = new Set(['EAGAIN', 'EMFILE', 'ENFILE', 'ENOMEM']);

/** Classify an error raised while spawning a process */
export function spawnFailure(err: unknown, file: string): StepFailure {
  const code = systemErrorCode(err);
  if (code !== undefined && RESOURCE_CODES.has(code)) {
    return { kind: 'resource_exhausted', message: `Cannot start ${file}: ${code} (${errorMessage(err)})` };
  }
  return { kind: 'spawn_failed', message: `Failed to start ${file}: ${errorMessage(err)}` };
}

/**
 * Kill a child and every process in its group.
 * Falls back to killing the child alone when it does not lead a group.
 */
export function killProcessGroup(child: ChildProcess, signal: NodeJS.Signals = 'SIGKILL'): void {
  if (child.pid === undefined) return;
  try {
    process.kill(-child.pid, signal);
  } catch (err) {
    if (systemErrorCode(err) === 'ESRCH') return;
    child.kill(signal);
  }
}

export function spawnOptions(command: BoundCommand): SpawnOptions {
  return {
    cwd: command.cwd,
    env: command.env,
    detached: true,
    stdio: ['pipe', 'pipe', 'pipe'],
  };
}

/**
 * Execute a command to completion.
 *
 * Never rejects: spawn failures, timeouts and cancellation are reported as
 * {@link ExecutionOutcome.failure}.
 */
export function executeCommand(command: BoundCommand, options: ExecuteOptions): Promise<ExecutionOutcome> {
  const started = Date.now();
  const spawnFn = options.spawn ?? nodeSpawn;
  const graceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
  const { signal } = options;

  return new Promise<ExecutionOutcome>((resolve) => {
    const notes: string[] = [];
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let failure: StepFailure | undefined;
    let settled = false;
    let exitCode: number | null = null;
    let exitSignal: NodeJS.Signals | null = null;
    let timer: NodeJS.Timeout | undefined;
    let graceTimer: NodeJS.Timeout | undefined;

    if (signal?.aborted) {
      resolve({
        stdout: '',
        stderr: '',
        exitCode: null,
        signal: null,
        durationMs: 0,
        failure: { kind: 'cancelled', message: 'Cancelled before the command started' },
        notes,
      });
      return;
    }

    let child: ChildProcess;
    try {
      child = spawnFn(command.file, command.args, spawnOptions(command));
    } catch (err) {
      resolve({
        stdout: '',
        stderr: '',
        exitCode: null,
        signal: null,
        durationMs: Date.now() - started,
        failure: spawnFailure(err, command.file),
        notes,
      });
      return;
    }

    const finish = (): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      clearTimeout(graceTimer);
      signal?.removeEventListener('abort', onAbort);
      resolve({
        stdout: Buffer.concat(stdout).toString('utf8'),
        stderr: Buffer.concat(stderr).toString('utf8'),
        exitCode,
        signal: exitSignal,
        pid: child.pid,
        durationMs: Date.now() - started,
        failure,
        notes,
      });
    };

    const armGrace = (after: 'kill' | 'exit'): void => {
      if (graceTimer) return;
      graceTimer = setTimeout(() => {
        if (after === 'exit') {
          // a background child still holds the pipes
          killProcessGroup(child);
        }
        notes.push(`Output pipes still open ${graceMs}ms after ${after}; destroyed`);
        child.stdin?.destroy();
        child.stdout?.destroy();
        child.stderr?.destroy();
        finish();
      }, graceMs);
    };

    const terminate = (reason: StepFailure): void => {
      failure ??= reason;
      killProcessGroup(child);
      armGrace('kill');
    };

    function onAbort(): void {
      terminate({ kind: 'cancelled', message: 'Cancelled while running' });
    }

    timer = setTimeout(() => {
      terminate({ kind: 'timeout', message: `Timed out after ${options.timeoutMs}ms` });
    }, options.timeoutMs);
    signal?.addEventListener('abort', onAbort, { once: true });

    child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

    child.on('error', (err) => {
      if (child.pid === undefined) {
        failure ??= spawnFailure(err, command.file);
        armGrace('kill');
        return;
      }
      notes.push(`Process error: ${errorMessage(err)}`);
    });

    child.on('exit', (code, sig) => {
      exitCode = code;
      exitSignal = sig;
      armGrace('exit');
    });

    child.on('close', (code, sig) => {
      exitCode = code;
      exitSignal = sig;
      finish();
    });

    if (child.stdin) {
      child.stdin.on('error', (err) => {
        notes.push(`stdin: ${errorMessage(err)}`);
      });
      if (command.input !== undefined) {
        child.stdin.end(command.input);
      } else {
        child.stdin.end();
      }
    }
  });
}
