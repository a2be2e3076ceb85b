/**
 * @module execution-context
 * Per-run mutable state, created at run start and disposed at run end.
 *
 * A context belongs to exactly one (scenario, environment) run, or to one
 * shared environment activation. Nothing in it is shared between runs.
 */

import crypto from 'node:crypto';
import { prepareWorkdir, releaseWorkdir } from './environment-binder.js';
import { errorMessage } from './errors.js';
import type { InteractiveSession } from './session.js';
import type { Environment } from './types.js';

export interface ExecutionContext {
  readonly runId: string;
  /** Scenario name, or the activation label for shared setup */
  readonly scenario: string;
  readonly environment: Environment;
  /** Working root of this run (the environment root or a temp dir) */
  readonly root: string;
  /** Current directory for the next step */
  cwd: string;
  readonly variables: Map<string, string>;
  /** Process env overrides accumulated through `setEnv` */
  readonly env: Record<string, string>;
  readonly sessions: Map<string, InteractiveSession>;
  readonly signal: AbortSignal;
  readonly tempDir?: string;
  readonly keepWorkdir: boolean;
}

export interface CreateContextOptions {
  scenario: string;
  environment: Environment;
  signal: AbortSignal;
  keepWorkdirs?: boolean;
  /** Run in the environment root regardless of its workdir mode */
  useRoot?: boolean;
  /** Variables and env overrides produced by a shared activation */
  seedVariables?: Readonly<Record<string, string>>;
  seedEnv?: Readonly<Record<string, string>>;
}

export async function createExecutionContext(options: CreateContextOptions): Promise<ExecutionContext> {
  const runId = crypto.randomUUID();
  const workdir = await prepareWorkdir(options.environment, {
    label: `${options.environment.name}-${options.scenario}`,
    useRoot: options.useRoot ?? false,
  });

  return {
    runId,
    scenario: options.scenario,
    environment: options.environment,
    root: workdir.root,
    cwd: workdir.root,
    variables: new Map(Object.entries(options.seedVariables ?? {})),
    env: { ...options.seedEnv },
    sessions: new Map(),
    signal: options.signal,
    tempDir: workdir.tempDir,
    keepWorkdir: options.keepWorkdirs ?? false,
  };
}

/**
 * Terminate leftover sessions and remove the temp workdir.
 *
 * @returns Problems encountered; disposal never throws
 */
export async function disposeExecutionContext(ctx: ExecutionContext): Promise<string[]> {
  const problems: string[] = [];

  for (const [name, session] of ctx.sessions) {
    if (!session.exited) {
      problems.push(`Session "${name}" was still running at run end; killed`);
    }
    await session.terminate();
  }
  ctx.sessions.clear();

  if (ctx.tempDir) {
    try {
      await releaseWorkdir(ctx.tempDir, ctx.keepWorkdir);
    } catch (err) {
      problems.push(`Failed to remove ${ctx.tempDir}: ${errorMessage(err)}`);
    }
  }
  return problems;
}

/** Variables of a context as a plain record */
export function snapshotVariables(ctx: ExecutionContext): Record<string, string> {
  return Object.fromEntries(ctx.variables);
}
