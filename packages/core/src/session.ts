/**
 * @module session
 * Long-lived interactive processes driven across several steps.
 *
 * A session keeps stdin open; each step may write to it and then reads
 * output until the step's expectation is satisfied, the process exits, or
 * the step times out. Output is consumed as a window: every read returns
 * only what arrived since the previous read.
 */

import { spawn as nodeSpawn } from 'node:child_process';
import type { ChildProcess } from 'node:child_process';
import { ExecutionError, errorMessage } from './errors.js';
import { killProcessGroup, spawnFailure, spawnOptions } from './step-executor.js';
import type { BoundCommand, SpawnFn } from './step-executor.js';

/** Unread output of a session */
export interface OutputWindow {
  stdout: string;
  stderr: string;
}

export interface SessionRead extends OutputWindow {
  /** `until` never reported a match before the deadline */
  timedOut: boolean;
  cancelled: boolean;
  /** The process has exited (its exit code is then known) */
  exited: boolean;
  exitCode: number | null;
  durationMs: number;
}

export interface ReadOptions {
  input?: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface SessionStartOptions {
  spawn?: SpawnFn;
  signal?: AbortSignal;
}

const CLOSE_GRACE_MS = 2000;

export class InteractiveSession {
  private stdoutText = '';
  private stderrText = '';
  private stdoutOffset = 0;
  private stderrOffset = 0;
  private exitCode: number | null = null;
  private closed = false;
  private readonly listeners = new Set<() => void>();
  private readonly problems: string[] = [];

  private constructor(
    public readonly name: string,
    public readonly command: BoundCommand,
    private readonly child: ChildProcess,
  ) {
    child.stdout?.setEncoding('utf8');
    child.stderr?.setEncoding('utf8');
    child.stdout?.on('data', (chunk: string) => {
      this.stdoutText += chunk;
      this.notify();
    });
    child.stderr?.on('data', (chunk: string) => {
      this.stderrText += chunk;
      this.notify();
    });
    child.stdin?.on('error', (err) => {
      this.problems.push(`stdin: ${errorMessage(err)}`);
    });
    child.on('error', (err) => {
      this.problems.push(`process: ${errorMessage(err)}`);
    });
    child.on('close', (code) => {
      this.exitCode = code;
      this.closed = true;
      this.notify();
    });
  }

  /**
   * Spawn the session process and wait until it is running.
   *
   * @throws {ExecutionError} when the process cannot be started
   */
  static async start(name: string, command: BoundCommand, options: SessionStartOptions = {}): Promise<InteractiveSession> {
    if (options.signal?.aborted) {
      throw new ExecutionError('cancelled', `Session "${name}" cancelled before start`);
    }
    const spawnFn = options.spawn ?? nodeSpawn;
    let child: ChildProcess;
    try {
      child = spawnFn(command.file, command.args, spawnOptions(command));
    } catch (err) {
      const failure = spawnFailure(err, command.file);
      throw new ExecutionError(failure.kind === 'resource_exhausted' ? 'resource_exhausted' : 'spawn_failed', failure.message);
    }

    await new Promise<void>((resolve, reject) => {
      const onSpawn = (): void => {
        child.off('error', onError);
        resolve();
      };
      const onError = (err: Error): void => {
        child.off('spawn', onSpawn);
        const failure = spawnFailure(err, command.file);
        reject(new ExecutionError(failure.kind === 'resource_exhausted' ? 'resource_exhausted' : 'spawn_failed', failure.message));
      };
      child.once('spawn', onSpawn);
      child.once('error', onError);
    });

    return new InteractiveSession(name, command, child);
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  get exited(): boolean {
    return this.closed;
  }

  /** Problems seen on the session's pipes since the last call */
  drainProblems(): string[] {
    return this.problems.splice(0);
  }

  /**
   * Write `input` (if any) and read until `until` accepts the unread
   * window, the process exits, the timeout elapses or `signal` aborts.
   * The returned window is consumed either way.
   */
  async read(until: (window: OutputWindow) => boolean, options: ReadOptions): Promise<SessionRead> {
    const started = Date.now();
    if (options.input !== undefined) {
      this.write(options.input);
    }

    const outcome = await this.waitFor(() => until(this.peek()), options.timeoutMs, options.signal);
    return {
      ...this.consume(),
      timedOut: outcome === 'timeout',
      cancelled: outcome === 'cancelled',
      exited: this.closed,
      exitCode: this.exitCode,
      durationMs: Date.now() - started,
    };
  }

  /**
   * End stdin (after writing `input`) and wait for the process to exit.
   * On timeout or cancellation the process group is killed.
   */
  async close(options: ReadOptions): Promise<SessionRead> {
    const started = Date.now();
    if (this.child.stdin && !this.child.stdin.writableEnded) {
      if (options.input !== undefined) {
        this.child.stdin.end(options.input);
      } else {
        this.child.stdin.end();
      }
    }

    const outcome = await this.waitFor(() => this.closed, options.timeoutMs, options.signal);
    if (outcome !== 'done') {
      await this.terminate();
    }
    return {
      ...this.consume(),
      timedOut: outcome === 'timeout',
      cancelled: outcome === 'cancelled',
      exited: this.closed,
      exitCode: this.exitCode,
      durationMs: Date.now() - started,
    };
  }

  /** Kill the process group and wait briefly for the pipes to close */
  async terminate(): Promise<void> {
    if (this.closed) return;
    killProcessGroup(this.child);
    const outcome = await this.waitFor(() => this.closed, CLOSE_GRACE_MS);
    if (outcome !== 'done') {
      this.child.stdin?.destroy();
      this.child.stdout?.destroy();
      this.child.stderr?.destroy();
      this.closed = true;
    }
  }

  private write(input: string): void {
    const stdin = this.child.stdin;
    if (!stdin || stdin.writableEnded || stdin.destroyed) {
      this.problems.push(`stdin of session "${this.name}" is closed; input discarded`);
      return;
    }
    stdin.write(input);
  }

  private peek(): OutputWindow {
    return {
      stdout: this.stdoutText.slice(this.stdoutOffset),
      stderr: this.stderrText.slice(this.stderrOffset),
    };
  }

  private consume(): OutputWindow {
    const window = this.peek();
    this.stdoutOffset = this.stdoutText.length;
    this.stderrOffset = this.stderrText.length;
    return window;
  }

  private notify(): void {
    for (const listener of [...this.listeners]) {
      listener();
    }
  }

  private waitFor(
    condition: () => boolean,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<'done' | 'timeout' | 'cancelled'> {
    return new Promise((resolve) => {
      if (condition() || this.closed) {
        resolve('done');
        return;
      }
      if (signal?.aborted) {
        resolve('cancelled');
        return;
      }

      const settle = (outcome: 'done' | 'timeout' | 'cancelled'): void => {
        clearTimeout(timer);
        this.listeners.delete(check);
        signal?.removeEventListener('abort', onAbort);
        resolve(outcome);
      };
      const check = (): void => {
        if (condition() || this.closed) settle('done');
      };
      const onAbort = (): void => settle('cancelled');
      const timer = setTimeout(() => settle('timeout'), timeoutMs);

      this.listeners.add(check);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
