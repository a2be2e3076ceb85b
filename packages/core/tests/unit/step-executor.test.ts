/**
 * Unit tests for step-executor module.
 *
 * Runs short-lived `sh` processes; nothing outlives a test.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { executeCommand, spawnFailure } from '../../src/step-executor.js';
import type { BoundCommand } from '../../src/step-executor.js';

function shell(script: string, extra: Partial<BoundCommand> = {}): BoundCommand {
  return {
    file: 'sh',
    args: ['-c', script],
    display: script,
    cwd: os.tmpdir(),
    env: { PATH: process.env.PATH ?? '/usr/bin:/bin' },
    ...extra,
  };
}

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

describe('step-executor', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'crosscheck-exec-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('should capture stdout, stderr and the exit code', async () => {
    const outcome = await executeCommand(shell("printf 'out\\n'; printf 'err\\n' >&2; exit 3"), { timeoutMs: 5000 });

    expect(outcome.stdout).toBe('out\n');
    expect(outcome.stderr).toBe('err\n');
    expect(outcome.exitCode).toBe(3);
    expect(outcome.failure).toBeUndefined();
  });

  it('should write input to stdin', async () => {
    const outcome = await executeCommand(shell('cat', { input: 'hello\n' }), { timeoutMs: 5000 });

    expect(outcome.stdout).toBe('hello\n');
    expect(outcome.exitCode).toBe(0);
  });

  it('should pass only the given environment', async () => {
    const outcome = await executeCommand(
      shell('printf "%s|%s" "$GREETING" "$CROSSCHECK_UNSET"', {
        env: { PATH: process.env.PATH ?? '/usr/bin:/bin', GREETING: 'hi' },
      }),
      { timeoutMs: 5000 },
    );

    expect(outcome.stdout).toBe('hi|');
  });

  it('should run in the given working directory', async () => {
    const outcome = await executeCommand(shell('pwd -P', { cwd: tmpDir }), { timeoutMs: 5000 });

    expect(outcome.stdout.trim()).toBe(await fs.realpath(tmpDir));
  });

  it('should kill the process on timeout', async () => {
    const started = Date.now();
    const outcome = await executeCommand(shell('sleep 30'), { timeoutMs: 200 });

    expect(outcome.failure).toEqual({ kind: 'timeout', message: 'Timed out after 200ms' });
    expect(outcome.exitCode).toBeNull();
    expect(Date.now() - started).toBeLessThan(5000);
  });

  it('should kill background children together with the command', async () => {
    const marker = path.join(tmpDir, 'late');
    const outcome = await executeCommand(
      shell(`(sleep 1; touch "${marker}") & sleep 30`),
      { timeoutMs: 200, killGraceMs: 500 },
    );
    expect(outcome.failure?.kind).toBe('timeout');

    await sleep(1500);
    await expect(fs.access(marker)).rejects.toThrow();
  });

  it('should finish when the command exits but a background child keeps the pipes open', async () => {
    const marker = path.join(tmpDir, 'late');
    const started = Date.now();
    const outcome = await executeCommand(
      shell(`(sleep 1; touch "${marker}") & echo started; exit 0`),
      { timeoutMs: 10_000, killGraceMs: 200 },
    );

    expect(outcome.failure).toBeUndefined();
    expect(outcome.exitCode).toBe(0);
    expect(outcome.stdout).toBe('started\n');
    expect(outcome.notes).toEqual(['Output pipes still open 200ms after exit; destroyed']);
    expect(Date.now() - started).toBeLessThan(5000);

    await sleep(1500);
    await expect(fs.access(marker)).rejects.toThrow();
  });

  it('should stop when the signal aborts', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 100);

    const outcome = await executeCommand(shell('sleep 30'), { timeoutMs: 10_000, signal: controller.signal });

    expect(outcome.failure).toEqual({ kind: 'cancelled', message: 'Cancelled while running' });
  });

  it('should not start when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const outcome = await executeCommand(shell('echo never'), { timeoutMs: 5000, signal: controller.signal });

    expect(outcome.stdout).toBe('');
    expect(outcome.failure).toEqual({ kind: 'cancelled', message: 'Cancelled before the command started' });
  });

  it('should report a missing executable as spawn_failed', async () => {
    const outcome = await executeCommand(
      { ...shell(''), file: path.join(tmpDir, 'no-such-binary'), args: [] },
      { timeoutMs: 5000, killGraceMs: 100 },
    );

    expect(outcome.failure?.kind).toBe('spawn_failed');
    expect(outcome.failure?.message).toMatch(/^Failed to start .*no-such-binary: /);
  });

  describe('spawnFailure', () => {
    it('should classify descriptor exhaustion as resource_exhausted', () => {
      const err = Object.assign(new Error('too many open files'), { code: 'EMFILE' });

      expect(spawnFailure(err, 'sh')).toEqual({
        kind: 'resource_exhausted',
        message: 'Cannot start sh: EMFILE (too many open files)',
      });
    });

    it('should classify other errors as spawn_failed', () => {
      const err = Object.assign(new Error('spawn nope ENOENT'), { code: 'ENOENT' });

      expect(spawnFailure(err, 'nope')).toEqual({
        kind: 'spawn_failed',
        message: 'Failed to start nope: spawn nope ENOENT',
      });
    });
  });
});
