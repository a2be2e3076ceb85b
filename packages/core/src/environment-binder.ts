/**
 * @module environment-binder
 * Binds abstract steps to concrete invocations for one environment.
 *
 * Step templates are resolved strictly against the environment's
 * placeholders, the run's captured variables, the process environment and
 * the built-ins. Working directories are resolved against the run's
 * current directory and must exist.
 */

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { BindingError, errorMessage } from './errors.js';
import type { ExecutionContext } from './execution-context.js';
import type { BoundCommand } from './step-executor.js';
import type { CommandTemplate, Environment, Step } from './types.js';
import { resolveRecord, resolveTemplate } from './variable-resolver.js';
import type { TemplateScope } from './variable-resolver.js';

/** Everything a step needs after binding */
export interface BoundStep {
  /** Process to spawn (exec and session-start steps) */
  command?: BoundCommand;
  /** Text written to an existing session */
  input?: string;
  /** New context cwd when the step has `chdir` */
  nextCwd?: string;
}

export interface PreparedWorkdir {
  root: string;
  /** Set when the run works in a temp dir that must be released */
  tempDir?: string;
}

// =====================================================================
// Scope
// =====================================================================

function inheritedEnv(): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) env[key] = value;
  }
  return env;
}

/**
 * Template scope of a run. `{{env.X}}` sees the inherited process env,
 * then the environment's `env`, then the run's `setEnv` overrides.
 */
export function templateScope(ctx: ExecutionContext): TemplateScope {
  const base: TemplateScope = {
    placeholders: ctx.environment.placeholders,
    variables: ctx.variables,
    env: { ...inheritedEnv(), ...ctx.env },
    builtins: {
      environment: ctx.environment.name,
      scenario: ctx.scenario,
      workdir: ctx.root,
      root: ctx.environment.workdir.root,
    },
  };
  return {
    ...base,
    env: { ...inheritedEnv(), ...resolveRecord(ctx.environment.env, base), ...ctx.env },
  };
}

function processEnv(scope: TemplateScope, extra: Record<string, string>): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(scope.env)) {
    if (value !== undefined) env[key] = value;
  }
  return { ...env, ...extra };
}

// =====================================================================
// Binding
// =====================================================================

async function resolveDirectory(base: string, target: string): Promise<string> {
  const dir = path.resolve(base, target);
  const stat = await fs.stat(dir).catch((err: unknown) => {
    throw new BindingError(`Working directory ${dir} is not accessible: ${errorMessage(err)}`, [dir]);
  });
  if (!stat.isDirectory()) {
    throw new BindingError(`Working directory ${dir} is not a directory`, [dir]);
  }
  return dir;
}

function shellQuote(arg: string): string {
  return /^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`;
}

/** Resolve a command template into the file and arguments to spawn */
export function bindCommand(
  template: CommandTemplate,
  scope: TemplateScope,
  cwd: string,
  env: Record<string, string>,
  input?: string,
): BoundCommand {
  if (template.kind === 'shell') {
    const line = resolveTemplate(template.template, scope);
    return { file: 'sh', args: ['-c', line], display: line, cwd, env, input };
  }

  const argv = template.templates.map((part) => resolveTemplate(part, scope));
  const [file, ...args] = argv;
  if (file === undefined || file === '') {
    throw new BindingError('Argument vector resolved to an empty command');
  }
  return { file, args, display: argv.map(shellQuote).join(' '), cwd, env, input };
}

/**
 * Bind a step against the current state of its run.
 *
 * @throws {BindingError} on any unresolved reference or missing directory
 */
export async function bindStep(step: Step, ctx: ExecutionContext): Promise<BoundStep> {
  const scope = templateScope(ctx);

  let base = ctx.cwd;
  let nextCwd: string | undefined;
  if (step.chdir !== undefined) {
    nextCwd = await resolveDirectory(ctx.cwd, resolveTemplate(step.chdir, scope));
    base = nextCwd;
  }
  const cwd = step.cwd !== undefined ? await resolveDirectory(base, resolveTemplate(step.cwd, scope)) : base;
  const env = processEnv(scope, resolveRecord(step.env, scope));

  const { action } = step;
  switch (action.kind) {
    case 'exec': {
      const input = action.input !== undefined ? resolveTemplate(action.input, scope) : undefined;
      return { command: bindCommand(action.command, scope, cwd, env, input), nextCwd };
    }
    case 'session-start':
      return { command: bindCommand(action.command, scope, cwd, env), nextCwd };
    case 'session-send':
      return { input: resolveTemplate(action.input, scope), nextCwd };
    case 'session-close':
      return { input: action.input !== undefined ? resolveTemplate(action.input, scope) : undefined, nextCwd };
  }
}

/**
 * Resolve `setEnv` after a step passed; its templates may use the
 * variables the step itself captured.
 */
export function bindSetEnv(
  step: Step,
  ctx: ExecutionContext,
  captures: Readonly<Record<string, string>>,
): Record<string, string> {
  const scope = templateScope(ctx);
  const variables = new Map(ctx.variables);
  for (const [name, value] of Object.entries(captures)) {
    variables.set(name, value);
  }
  return resolveRecord(step.setEnv, { ...scope, variables });
}

// =====================================================================
// Workdirs
// =====================================================================

function tempPrefix(label: string): string {
  return path.join(os.tmpdir(), `crosscheck-${label.replace(/[^A-Za-z0-9_.-]+/g, '_')}-`);
}

/**
 * Prepare the working root of a run according to the environment's
 * workdir mode: `shared` works in the root itself, `fresh` in an empty
 * temp dir and `copy` in a temp copy of the root.
 */
export async function prepareWorkdir(
  environment: Environment,
  options: { label: string; useRoot?: boolean },
): Promise<PreparedWorkdir> {
  const { root, mode } = environment.workdir;
  if (mode !== 'fresh' || options.useRoot) {
    await resolveDirectory(root, '.');
  }
  if (options.useRoot || mode === 'shared') {
    return { root };
  }

  const tempDir = await fs.mkdtemp(tempPrefix(options.label));
  if (mode === 'copy') {
    await fs.cp(root, tempDir, { recursive: true });
  }
  return { root: tempDir, tempDir };
}

/** Remove a temp workdir unless workdirs are kept for inspection */
export async function releaseWorkdir(tempDir: string, keep: boolean): Promise<void> {
  if (keep) return;
  await fs.rm(tempDir, { recursive: true, force: true });
}
