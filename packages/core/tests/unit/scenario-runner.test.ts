/**
 * Unit tests for scenario-runner module.
 *
 * Suites are parsed from YAML and run against real `sh` processes in
 * temporary directories.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { createRunEmitter } from '../../src/events.js';
import { runScenario } from '../../src/scenario-runner.js';
import type { RunScenarioOptions } from '../../src/scenario-runner.js';
import { parseSuiteSources } from '../../src/suite-loader.js';
import type { RunEvent, ScenarioResult, Suite } from '../../src/types.js';

const ENVIRONMENT = `
environments:
  local:
    placeholders:
      greeting: hello
    workdir:
      mode: fresh
`;

describe('scenario-runner', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'crosscheck-runner-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  function load(content: string): Suite {
    return parseSuiteSources([{ source: 'suite.yaml', content }], { baseDir: tmpDir });
  }

  async function run(suite: Suite, name: string, options: Partial<RunScenarioOptions> = {}): Promise<ScenarioResult> {
    const scenario = suite.scenarios.find((s) => s.name === name);
    const environment = suite.environments[0];
    if (!scenario || !environment) throw new Error(`no scenario ${name}`);
    return runScenario(scenario, environment, { defaults: suite.defaults, index: 0, ...options });
  }

  describe('steps and variables', () => {
    it('should pass captured variables to later steps', async () => {
      const suite = load(`${ENVIRONMENT}
scenarios:
  capture:
    - run: echo id=42
      expect:
        - regex: 'id=(?<id>[0-9]+)'
    - run: echo {{greeting}} {{var.id}}
      expect:
        - literal: hello 42
          mode: line
`);

      const result = await run(suite, 'capture');

      expect(result.status).toBe('passed');
      expect(result.variables).toEqual({ id: '42' });
      expect(result.steps[0]?.captures).toEqual({ id: '42' });
      expect(result.steps[1]?.command).toBe('echo hello 42');
      expect(result.steps[1]?.stdout).toBe('hello 42\n');
    });

    it('should fail when a later step captures a different value', async () => {
      const suite = load(`${ENVIRONMENT}
scenarios:
  consistency:
    - run: echo id=42
      expect:
        - regex: 'id=(?<id>[0-9]+)'
    - run: echo id=43
      expect:
        - regex: 'id=(?<id>[0-9]+)'
`);

      const result = await run(suite, 'consistency');

      expect(result.status).toBe('failed');
      expect(result.steps[1]?.failure).toEqual({
        kind: 'inconsistent_capture',
        message: 'Inconsistent capture for "id": previously bound to "42", /id=(?<id>[0-9]+)/ captured "43" on line 1',
      });
      expect(result.variables).toEqual({ id: '42' });
    });

    it('should commit captures only when the step passes', async () => {
      const suite = load(`${ENVIRONMENT}
scenarios:
  partial:
    continueOnFailure: true
    steps:
      - run: echo id=1
        expect:
          - regex: 'id=(?<id>[0-9]+)'
          - missing
      - run: echo {{var.id}}
`);

      const result = await run(suite, 'partial');

      expect(result.steps[0]?.status).toBe('failed');
      expect(result.steps[0]?.captures).toEqual({});
      expect(result.steps[1]?.failure).toEqual({
        kind: 'binding',
        message: 'Unresolved template reference(s): {{var.id}}',
      });
      expect(result.status).toBe('errored');
    });

    it('should apply setEnv and chdir to later steps', async () => {
      const suite = load(`${ENVIRONMENT}
scenarios:
  state:
    - run: mkdir -p sub && echo token=abc
      expect:
        - regex: 'token=(?<token>[a-z]+)'
      setEnv:
        TOKEN: '{{var.token}}'
    - name: enter
      run: 'true'
      chdir: sub
    - run: 'printf "%s\\n" "$TOKEN"; basename "$(pwd -P)"'
      expect:
        - ordered:
            - literal: abc
              mode: line
            - literal: sub
              mode: line
              adjacent: true
`);

      const result = await run(suite, 'state');

      expect(result.steps.map((s) => s.status)).toEqual(['passed', 'passed', 'passed']);
      expect(result.steps[2]?.stdout).toBe('abc\nsub\n');
    });
  });

  describe('failure handling', () => {
    it('should stop at the first failing step', async () => {
      const suite = load(`${ENVIRONMENT}
scenarios:
  failfast:
    - run: echo a
      expect: [b]
    - run: echo c
`);

      const result = await run(suite, 'failfast');

      expect(result.status).toBe('failed');
      expect(result.failure).toEqual({ kind: 'pattern_mismatch', message: 'No line in the output matches "b"' });
      expect(result.steps[1]?.status).toBe('skipped');
      expect(result.steps[1]?.skipReason).toBe('Step "echo a" failed');
    });

    it('should continue after failures when the scenario allows it', async () => {
      const suite = load(`${ENVIRONMENT}
scenarios:
  keepgoing:
    continueOnFailure: true
    steps:
      - run: echo a
        expect: [b]
      - run: echo c
        expect: [c]
`);

      const result = await run(suite, 'keepgoing');

      expect(result.status).toBe('failed');
      expect(result.steps.map((s) => s.status)).toEqual(['failed', 'passed']);
    });

    it('should let a step override the scenario setting', async () => {
      const suite = load(`${ENVIRONMENT}
scenarios:
  override:
    continueOnFailure: true
    steps:
      - run: echo a
        expect: [b]
        continueOnFailure: false
      - run: echo c
`);

      const result = await run(suite, 'override');

      expect(result.steps.map((s) => s.status)).toEqual(['failed', 'skipped']);
    });

    it('should stop on binding errors even when continuing on failure', async () => {
      const suite = load(`${ENVIRONMENT}
scenarios:
  binding:
    continueOnFailure: true
    steps:
      - run: echo {{var.never}}
      - run: echo c
`);

      const result = await run(suite, 'binding');

      expect(result.status).toBe('errored');
      expect(result.steps[0]?.failure?.kind).toBe('binding');
      expect(result.steps[1]?.skipReason).toBe('Binding error in step "echo {{var.never}}"');
    });

    it('should check the exit code', async () => {
      const suite = load(`${ENVIRONMENT}
scenarios:
  exits:
    continueOnFailure: true
    steps:
      - run: exit 3
      - run: exit 3
        exitCode: 3
      - run: exit 5
        exitCode: any
`);

      const result = await run(suite, 'exits');

      expect(result.steps.map((s) => s.status)).toEqual(['failed', 'passed', 'passed']);
      expect(result.steps[0]?.failure?.message).toBe('Expected exit code 0, got 3');
      expect(result.steps[0]?.exitCode).toBe(3);
    });

    it('should error a step that exceeds its timeout', async () => {
      const suite = load(`${ENVIRONMENT}
scenarios:
  slow:
    timeout: 200ms
    steps:
      - run: sleep 30
`);

      const result = await run(suite, 'slow');

      expect(result.status).toBe('errored');
      expect(result.steps[0]?.failure).toEqual({ kind: 'timeout', message: 'Timed out after 200ms' });
    });

    it('should retry a step under an explicit policy', async () => {
      const suite = load(`${ENVIRONMENT}
scenarios:
  flaky:
    - run: 'n=$(cat count 2>/dev/null || echo 0); n=$((n+1)); echo $n > count; echo attempt=$n'
      expect: [attempt=3]
      retry:
        maxAttempts: 3
        delay: 10ms
`);

      const result = await run(suite, 'flaky');

      expect(result.status).toBe('passed');
      expect(result.steps[0]?.attempts.map((a) => a.passed)).toEqual([false, false, true]);
      expect(result.steps[0]?.stdout).toBe('attempt=3\n');
    });
  });

  describe('skipping and cancellation', () => {
    it('should skip a scenario marked skip', async () => {
      const suite = load(`${ENVIRONMENT}
scenarios:
  later:
    skip: not ready
    steps:
      - run: echo a
`);

      const result = await run(suite, 'later');

      expect(result.status).toBe('skipped');
      expect(result.skipReason).toBe('not ready');
      expect(result.steps[0]?.status).toBe('skipped');
    });

    it('should skip a scenario in the environments it excludes', async () => {
      const suite = load(`${ENVIRONMENT}
scenarios:
  elsewhere:
    skipIn: [local]
    steps:
      - run: echo a
`);

      const result = await run(suite, 'elsewhere');

      expect(result.skipReason).toBe('Skipped in environment "local"');
    });

    it('should not start when already cancelled', async () => {
      const suite = load(`${ENVIRONMENT}
scenarios:
  any:
    - run: echo a
`);
      const controller = new AbortController();
      controller.abort();

      const result = await run(suite, 'any', { signal: controller.signal });

      expect(result.status).toBe('cancelled');
      expect(result.failure).toEqual({ kind: 'cancelled', message: 'Cancelled before the run started' });
    });

    it('should cancel the running step and skip the rest', async () => {
      const suite = load(`${ENVIRONMENT}
scenarios:
  long:
    - run: sleep 30
    - run: echo after
`);
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 100);

      const result = await run(suite, 'long', { signal: controller.signal });

      expect(result.status).toBe('cancelled');
      expect(result.steps[0]?.status).toBe('cancelled');
      expect(result.steps[1]?.skipReason).toBe('Run cancelled');
    });
  });

  describe('isolated environments', () => {
    it('should run setup and teardown around each run', async () => {
      const suite = load(`
environments:
  local:
    scope: isolated
    workdir:
      mode: fresh
    setup:
      - echo ready > marker
    teardown:
      - rm marker
scenarios:
  uses-setup:
    - run: cat marker
      expect:
        - literal: ready
          mode: line
`);

      const result = await run(suite, 'uses-setup');

      expect(result.status).toBe('passed');
      expect(result.setup.map((s) => s.status)).toEqual(['passed']);
      expect(result.teardown.map((s) => s.status)).toEqual(['passed']);
    });

    it('should not run the steps when setup fails', async () => {
      const suite = load(`
environments:
  local:
    scope: isolated
    workdir:
      mode: fresh
    setup:
      - exit 1
    teardown:
      - echo bye
scenarios:
  blocked:
    - run: echo a
`);

      const result = await run(suite, 'blocked');

      expect(result.status).toBe('errored');
      expect(result.failure).toEqual({
        kind: 'setup_failed',
        message: 'Setup step "exit 1" failed: Expected exit code 0, got 1',
      });
      expect(result.steps[0]?.skipReason).toBe('Environment setup failed');
      expect(result.teardown[0]?.status).toBe('passed');
    });

    it('should keep teardown failures out of the run status', async () => {
      const suite = load(`
environments:
  local:
    scope: isolated
    workdir:
      mode: fresh
    teardown:
      - exit 2
scenarios:
  fine:
    - run: echo a
`);
      const events: RunEvent[] = [];

      const result = await run(suite, 'fine', { emitter: createRunEmitter({ onEvent: (e) => events.push(e) }) });

      expect(result.status).toBe('passed');
      expect(result.teardown[0]?.status).toBe('failed');
      const warnings = events.flatMap((e) => (e.type === 'log' && e.level === 'warn' ? [e.message] : []));
      expect(warnings).toEqual(['[local/fine] teardown step "exit 2" failed: Expected exit code 0, got 2']);
    });
  });

  describe('sessions', () => {
    it('should drive an interactive process across steps', async () => {
      const suite = load(`${ENVIRONMENT}
scenarios:
  repl:
    - session: { name: echo, start: cat }
    - session: { name: echo, send: "{{greeting}} there\\n" }
      expect: [hello there]
    - session: { name: echo, close: true }
`);

      const result = await run(suite, 'repl');

      expect(result.status).toBe('passed');
      expect(result.steps[1]?.stdout).toBe('hello there\n');
      expect(result.steps[2]?.exitCode).toBe(0);
    });

    it('should fail a read that never sees the expected output', async () => {
      const suite = load(`${ENVIRONMENT}
scenarios:
  quiet:
    - session: { name: echo, start: cat }
    - session: { name: echo, send: "ping\\n" }
      expect: [pong]
      timeout: 200ms
`);

      const result = await run(suite, 'quiet');

      expect(result.steps[1]?.failure).toEqual({
        kind: 'pattern_mismatch',
        message: 'No line in the output matches "pong" (no matching output within 200ms)',
      });
    });

    it('should kill sessions left running at run end', async () => {
      const suite = load(`${ENVIRONMENT}
scenarios:
  leak:
    - session: { name: echo, start: cat }
`);
      const events: RunEvent[] = [];

      const result = await run(suite, 'leak', { emitter: createRunEmitter({ onEvent: (e) => events.push(e) }) });

      expect(result.status).toBe('passed');
      const warnings = events.flatMap((e) => (e.type === 'log' && e.level === 'warn' ? [e.message] : []));
      expect(warnings).toEqual(['[local/leak] Session "echo" was still running at run end; killed']);
    });

    it('should error a send to a session that was never started', async () => {
      const suite = load(`${ENVIRONMENT}
scenarios:
  orphan:
    - session: { name: ghost, send: "hi\\n" }
`);

      const result = await run(suite, 'orphan');

      expect(result.steps[0]?.failure).toEqual({ kind: 'binding', message: 'No session named "ghost" is running' });
    });
  });

  describe('events', () => {
    it('should emit run_start, step_end and run_end in order', async () => {
      const suite = load(`${ENVIRONMENT}
scenarios:
  two:
    - echo one
    - echo two
`);
      const events: RunEvent[] = [];

      await run(suite, 'two', { emitter: createRunEmitter({ onEvent: (e) => events.push(e) }) });

      expect(events.filter((e) => e.type !== 'log').map((e) => e.type)).toEqual(['run_start', 'step_end', 'step_end', 'run_end']);
    });
  });
});
