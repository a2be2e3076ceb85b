/**
 * Unit tests for environment-binder and execution-context modules.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {
  bindCommand,
  bindSetEnv,
  bindStep,
  prepareWorkdir,
  releaseWorkdir,
  templateScope,
} from '../../src/environment-binder.js';
import { BindingError } from '../../src/errors.js';
import { createExecutionContext, disposeExecutionContext } from '../../src/execution-context.js';
import type { ExecutionContext } from '../../src/execution-context.js';
import type { Environment, Step } from '../../src/types.js';
import type { TemplateScope } from '../../src/variable-resolver.js';

function scope(overrides: Partial<TemplateScope> = {}): TemplateScope {
  return {
    placeholders: {},
    variables: new Map(),
    env: {},
    builtins: { environment: 'local', scenario: 'demo', workdir: '/work', root: '/work' },
    ...overrides,
  };
}

function step(overrides: Partial<Step> = {}): Step {
  return {
    name: 'step',
    action: { kind: 'exec', command: { kind: 'shell', template: 'true' } },
    expect: { stream: 'stdout', blocks: [], reject: [], exitCode: 0 },
    env: {},
    setEnv: {},
    ...overrides,
  };
}

describe('environment-binder', () => {
  let tmpDir: string;
  const contexts: ExecutionContext[] = [];

  function environment(overrides: Partial<Environment> = {}): Environment {
    return {
      name: 'local',
      placeholders: {},
      env: {},
      workdir: { root: tmpDir, mode: 'shared' },
      setup: [],
      teardown: [],
      ...overrides,
    };
  }

  async function context(env: Environment = environment()): Promise<ExecutionContext> {
    const ctx = await createExecutionContext({ scenario: 'demo', environment: env, signal: new AbortController().signal });
    contexts.push(ctx);
    return ctx;
  }

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'crosscheck-binder-test-'));
  });

  afterEach(async () => {
    for (const ctx of contexts.splice(0)) {
      await disposeExecutionContext(ctx);
    }
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  describe('bindCommand', () => {
    it('should run shell templates through sh -c', () => {
      const bound = bindCommand(
        { kind: 'shell', template: 'echo {{greeting}} {{var.id}}' },
        scope({ placeholders: { greeting: 'hi' }, variables: new Map([['id', '42']]) }),
        '/work',
        {},
      );

      expect(bound.file).toBe('sh');
      expect(bound.args).toEqual(['-c', 'echo hi 42']);
      expect(bound.display).toBe('echo hi 42');
    });

    it('should spawn argv templates directly and quote the display', () => {
      const bound = bindCommand(
        { kind: 'argv', templates: ['{{tool}}', 'say', 'two words'] },
        scope({ placeholders: { tool: 'printf' } }),
        '/work',
        {},
      );

      expect(bound.file).toBe('printf');
      expect(bound.args).toEqual(['say', 'two words']);
      expect(bound.display).toBe("printf say 'two words'");
    });

    it('should reject an argument vector that resolves to an empty command', () => {
      expect(() => bindCommand({ kind: 'argv', templates: ['{{empty}}'] }, scope({ placeholders: { empty: '' } }), '/work', {}))
        .toThrow('Argument vector resolved to an empty command');
    });
  });

  describe('templateScope', () => {
    it('should layer run overrides over the environment env', async () => {
      const ctx = await context(environment({
        placeholders: { mode: 'fast' },
        env: { MODE: '{{mode}}-env', SHARED: 'env' },
      }));
      ctx.env.SHARED = 'run';

      const resolved = templateScope(ctx);

      expect(resolved.env.MODE).toBe('fast-env');
      expect(resolved.env.SHARED).toBe('run');
      expect(resolved.builtins).toEqual({ environment: 'local', scenario: 'demo', workdir: tmpDir, root: tmpDir });
    });
  });

  describe('bindStep', () => {
    it('should list every unresolved reference', async () => {
      const ctx = await context();
      const unresolved = step({ action: { kind: 'exec', command: { kind: 'shell', template: 'run {{missing}} {{var.nope}}' } } });

      const error = await bindStep(unresolved, ctx).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(BindingError);
      if (!(error instanceof BindingError)) return;
      expect(error.message).toBe('Unresolved template reference(s): {{missing}}, {{var.nope}}');
      expect(error.missing).toEqual(['{{missing}}', '{{var.nope}}']);
    });

    it('should apply chdir before cwd', async () => {
      await fs.mkdir(path.join(tmpDir, 'sub', 'inner'), { recursive: true });
      const ctx = await context();

      const bound = await bindStep(step({ chdir: 'sub', cwd: 'inner' }), ctx);

      expect(bound.nextCwd).toBe(path.join(tmpDir, 'sub'));
      expect(bound.command?.cwd).toBe(path.join(tmpDir, 'sub', 'inner'));
      expect(ctx.cwd).toBe(tmpDir);
    });

    it('should reject a working directory that does not exist', async () => {
      const ctx = await context();

      await expect(bindStep(step({ cwd: 'nowhere' }), ctx)).rejects.toThrow(/^Working directory .*nowhere is not accessible/);
    });

    it('should resolve step env and stdin input', async () => {
      const ctx = await context();
      const withInput = step({
        action: { kind: 'exec', command: { kind: 'shell', template: 'cat' }, input: 'in {{scenario}}' },
        env: { EXTRA: 'x-{{environment}}' },
      });

      const bound = await bindStep(withInput, ctx);

      expect(bound.command?.env.EXTRA).toBe('x-local');
      expect(bound.command?.input).toBe('in demo');
    });

    it('should resolve session input without a command', async () => {
      const ctx = await context();
      ctx.variables.set('id', '9');

      const bound = await bindStep(step({ action: { kind: 'session-send', session: 'repl', input: 'get {{var.id}}\n' } }), ctx);

      expect(bound.command).toBeUndefined();
      expect(bound.input).toBe('get 9\n');
    });
  });

  describe('bindSetEnv', () => {
    it('should see the captures of the step itself', async () => {
      const ctx = await context();

      const env = bindSetEnv(step({ setEnv: { TOKEN: 'tok-{{var.id}}' } }), ctx, { id: '7' });

      expect(env).toEqual({ TOKEN: 'tok-7' });
      expect(ctx.variables.has('id')).toBe(false);
    });
  });

  describe('workdirs', () => {
    it('should work in the root itself in shared mode', async () => {
      const prepared = await prepareWorkdir(environment(), { label: 'local-demo' });

      expect(prepared).toEqual({ root: tmpDir });
    });

    it('should copy the root in copy mode', async () => {
      await fs.writeFile(path.join(tmpDir, 'fixture.txt'), 'data', 'utf-8');

      const prepared = await prepareWorkdir(environment({ workdir: { root: tmpDir, mode: 'copy' } }), { label: 'local-demo' });

      expect(prepared.tempDir).toBe(prepared.root);
      expect(path.basename(prepared.root)).toMatch(/^crosscheck-local-demo-/);
      await expect(fs.readFile(path.join(prepared.root, 'fixture.txt'), 'utf-8')).resolves.toBe('data');

      await releaseWorkdir(prepared.root, false);
      await expect(fs.access(prepared.root)).rejects.toThrow();
    });

    it('should start from an empty directory in fresh mode', async () => {
      await fs.writeFile(path.join(tmpDir, 'fixture.txt'), 'data', 'utf-8');

      const prepared = await prepareWorkdir(environment({ workdir: { root: tmpDir, mode: 'fresh' } }), { label: 'x' });

      await expect(fs.readdir(prepared.root)).resolves.toEqual([]);
      await releaseWorkdir(prepared.root, true);
      await expect(fs.access(prepared.root)).resolves.toBeUndefined();
      await fs.rm(prepared.root, { recursive: true, force: true });
    });

    it('should reject a root that does not exist', async () => {
      const env = environment({ workdir: { root: path.join(tmpDir, 'missing'), mode: 'shared' } });

      await expect(prepareWorkdir(env, { label: 'x' })).rejects.toBeInstanceOf(BindingError);
    });

    it('should remove the temp workdir when the context is disposed', async () => {
      const ctx = await createExecutionContext({
        scenario: 'demo',
        environment: environment({ workdir: { root: tmpDir, mode: 'fresh' } }),
        signal: new AbortController().signal,
      });
      expect(ctx.tempDir).toBeDefined();

      const problems = await disposeExecutionContext(ctx);

      expect(problems).toEqual([]);
      await expect(fs.access(ctx.root)).rejects.toThrow();
    });
  });
});
